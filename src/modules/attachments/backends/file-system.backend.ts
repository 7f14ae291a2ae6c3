import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createReadStream } from 'node:fs';
import { copyFile, mkdir, readdir, rm, rmdir, stat } from 'node:fs/promises';
import * as path from 'node:path';
import { Readable } from 'node:stream';
import { AttachmentError } from '../../../common/exceptions';
import { DEFAULT_STORAGE_ROOT } from '../constants/attachment.constants';
import { StorageBackend, StoreOptions } from './storage-backend.interface';

/**
 * Stores attachments as plain files below a root directory. A storage key maps
 * to a relative path under that root.
 */
@Injectable()
export class FileSystemBackend implements StorageBackend {
  private readonly logger = new Logger(FileSystemBackend.name);
  private readonly root: string;

  constructor(private readonly configService: ConfigService) {
    this.root = path.resolve(
      this.configService.get<string>('attachments.storageRoot', DEFAULT_STORAGE_ROOT),
    );
  }

  async store(sourcePath: string, destinationKey: string, _options?: StoreOptions): Promise<void> {
    const destination = this.fullPath(destinationKey);
    await mkdir(path.dirname(destination), { recursive: true });
    await copyFile(sourcePath, destination);
    this.logger.log(`Stored file: ${destinationKey}`);
  }

  async delete(destinationKey: string): Promise<void> {
    const destination = this.fullPath(destinationKey);
    await rm(destination, { force: true });
    await this.pruneEmptyDirectories(path.dirname(destination));
    this.logger.log(`Deleted file: ${destinationKey}`);
  }

  async retrieve(destinationKey: string): Promise<Readable> {
    const destination = this.fullPath(destinationKey);
    // Fail here rather than on the first read of the stream
    await stat(destination);
    return createReadStream(destination);
  }

  /**
   * Absolute path of a storage key. The key must resolve inside the root at
   * its own depth, so `.`, `..` and empty segments are refused.
   */
  fullPath(destinationKey: string): string {
    const resolved = path.resolve(this.root, destinationKey);
    if (!resolved.startsWith(`${this.root}${path.sep}`)) {
      throw new AttachmentError(`Storage key escapes the storage root: ${destinationKey}`);
    }
    const depth = path.relative(this.root, resolved).split(path.sep).length;
    if (depth !== destinationKey.split('/').length) {
      throw new AttachmentError(`Storage key is not a plain relative path: ${destinationKey}`);
    }
    return resolved;
  }

  private async pruneEmptyDirectories(directory: string): Promise<void> {
    let current = directory;
    while (current.startsWith(`${this.root}${path.sep}`)) {
      const entries = await readdir(current).catch(() => null);
      if (entries === null || entries.length > 0) return;
      await rmdir(current);
      current = path.dirname(current);
    }
  }
}
