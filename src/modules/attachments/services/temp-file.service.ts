import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomBytes } from 'node:crypto';
import { copyFile, mkdir, open, readFile, rm, stat } from 'node:fs/promises';
import * as path from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { DEFAULT_TEMPFILE_PATH } from '../constants/attachment.constants';

/**
 * Creates and removes the temporary files that hold staged attachment data.
 * Every file lives under the configured temp directory, which is created on
 * first use.
 */
@Injectable()
export class TempFileService {
  private readonly logger = new Logger(TempFileService.name);
  private readonly directory: string;
  private ensured?: Promise<void>;

  constructor(private readonly configService: ConfigService) {
    this.directory = path.resolve(
      this.configService.get<string>('attachments.tempfilePath', DEFAULT_TEMPFILE_PATH),
    );
  }

  /**
   * Writes the given data to a new temp file and returns its path. A partly
   * written file is removed when the source fails.
   */
  async writeToTempFile(data: Buffer | Readable, baseName: string): Promise<string> {
    const target = await this.allocate(baseName);
    const handle = await open(target, 'w');
    return this.removeOnFailure(target, () =>
      pipeline(Buffer.isBuffer(data) ? Readable.from([data]) : data, handle.createWriteStream()),
    );
  }

  /**
   * Copies an existing file to a new temp file and returns its path.
   */
  async copyToTempFile(source: string, baseName: string): Promise<string> {
    const target = await this.allocate(baseName);
    return this.removeOnFailure(target, () => copyFile(source, target));
  }

  async read(filePath: string): Promise<Buffer> {
    return readFile(filePath);
  }

  /**
   * Reads at most `length` bytes from the start of the file.
   */
  async readHead(filePath: string, length = 4100): Promise<Buffer> {
    const handle = await open(filePath, 'r');
    try {
      const buffer = Buffer.alloc(length);
      const { bytesRead } = await handle.read(buffer, 0, length, 0);
      return buffer.subarray(0, bytesRead);
    } finally {
      await handle.close();
    }
  }

  async size(filePath: string): Promise<number> {
    return (await stat(filePath)).size;
  }

  async isFile(filePath: string): Promise<boolean> {
    try {
      return (await stat(filePath)).isFile();
    } catch (error) {
      if (isMissingFileError(error)) return false;
      throw error;
    }
  }

  async remove(filePaths: readonly string[]): Promise<void> {
    await Promise.all(filePaths.map((filePath) => rm(filePath, { force: true })));
    if (filePaths.length > 0) {
      this.logger.debug(`Removed ${filePaths.length} temp file(s)`);
    }
  }

  private async removeOnFailure(target: string, write: () => Promise<void>): Promise<string> {
    try {
      await write();
    } catch (error) {
      await rm(target, { force: true });
      throw error;
    }
    return target;
  }

  private async allocate(baseName: string): Promise<string> {
    if (!this.ensured) {
      this.ensured = mkdir(this.directory, { recursive: true }).then(() => undefined);
    }
    await this.ensured;
    return path.join(this.directory, `${Date.now()}-${randomBytes(4).toString('hex')}-${baseName}`);
  }
}

export function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
