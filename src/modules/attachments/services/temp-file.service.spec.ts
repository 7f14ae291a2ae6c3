import { ConfigService } from '@nestjs/config';
import { existsSync } from 'node:fs';
import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { Readable } from 'node:stream';
import { TempFileService } from './temp-file.service';

describe('TempFileService', () => {
  let workDir: string;
  let service: TempFileService;

  beforeEach(async () => {
    workDir = await mkdtemp(path.join(tmpdir(), 'temp-file-service-'));
    service = new TempFileService(
      new ConfigService({ attachments: { tempfilePath: path.join(workDir, 'staging') } }),
    );
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('should create the temp directory on first write', async () => {
    const tempPath = await service.writeToTempFile(Buffer.from('hello'), 'note.txt');

    expect(path.dirname(tempPath)).toBe(path.join(workDir, 'staging'));
    expect(path.basename(tempPath)).toMatch(/^\d+-[0-9a-f]{8}-note\.txt$/);
    await expect(readFile(tempPath, 'utf8')).resolves.toBe('hello');
  });

  it('should write streams', async () => {
    const tempPath = await service.writeToTempFile(Readable.from([Buffer.from('ab'), Buffer.from('cd')]), 'data');

    await expect(service.read(tempPath)).resolves.toEqual(Buffer.from('abcd'));
    await expect(service.size(tempPath)).resolves.toBe(4);
  });

  it('should remove a partly written file when the source stream fails', async () => {
    async function* aborted() {
      yield Buffer.from('partial');
      throw new Error('client aborted');
    }

    await expect(service.writeToTempFile(Readable.from(aborted()), 'x.txt')).rejects.toThrow('client aborted');
    await expect(readdir(path.join(workDir, 'staging'))).resolves.toEqual([]);
  });

  it('should leave nothing behind when the copy source is missing', async () => {
    await expect(service.copyToTempFile(path.join(workDir, 'missing.bin'), 'missing.bin')).rejects.toThrow(
      'ENOENT',
    );
    await expect(readdir(path.join(workDir, 'staging'))).resolves.toEqual([]);
  });

  it('should give every temp file its own name', async () => {
    const first = await service.writeToTempFile(Buffer.from('1'), 'same.txt');
    const second = await service.writeToTempFile(Buffer.from('2'), 'same.txt');

    expect(first).not.toBe(second);
  });

  it('should copy files', async () => {
    const source = path.join(workDir, 'source.bin');
    await writeFile(source, 'original');

    const tempPath = await service.copyToTempFile(source, 'source.bin');

    expect(tempPath).not.toBe(source);
    await expect(readFile(tempPath, 'utf8')).resolves.toBe('original');
  });

  it('should read the head of a file', async () => {
    const tempPath = await service.writeToTempFile(Buffer.from('0123456789'), 'digits');

    await expect(service.readHead(tempPath, 4)).resolves.toEqual(Buffer.from('0123'));
    await expect(service.readHead(tempPath)).resolves.toEqual(Buffer.from('0123456789'));
  });

  it('should report whether a path is a file', async () => {
    const tempPath = await service.writeToTempFile(Buffer.from('x'), 'x');

    await expect(service.isFile(tempPath)).resolves.toBe(true);
    await expect(service.isFile(path.join(workDir, 'missing'))).resolves.toBe(false);
    await expect(service.isFile(workDir)).resolves.toBe(false);
  });

  it('should remove files and ignore missing ones', async () => {
    const tempPath = await service.writeToTempFile(Buffer.from('x'), 'x');

    await service.remove([tempPath, path.join(workDir, 'missing')]);

    expect(existsSync(tempPath)).toBe(false);
  });
});
