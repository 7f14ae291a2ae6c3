import { Inject, Injectable } from '@nestjs/common';
import { AttachmentLifecycle, AttachmentSnapshot } from '../attachment-lifecycle';
import { FileSystemBackend } from '../backends/file-system.backend';
import { S3Backend } from '../backends/s3.backend';
import { StorageBackend } from '../backends/storage-backend.interface';
import { ATTACHMENT_OPTIONS } from '../constants/attachment.constants';
import { ResolvedAttachmentOptions } from '../interfaces/attachment-options.interface';
import { TempFileService } from './temp-file.service';

/**
 * Builds lifecycle instances bound to the module's constraint set and the
 * storage backend it selects.
 */
@Injectable()
export class AttachmentLifecycleFactory {
  constructor(
    @Inject(ATTACHMENT_OPTIONS)
    private readonly options: ResolvedAttachmentOptions,
    private readonly tempFileService: TempFileService,
    private readonly fileSystemBackend: FileSystemBackend,
    private readonly s3Backend: S3Backend,
  ) {}

  get backend(): StorageBackend {
    return this.options.storage === 's3' ? this.s3Backend : this.fileSystemBackend;
  }

  create(id: string | number | null = null): AttachmentLifecycle {
    return new AttachmentLifecycle(this.options, this.backend, this.tempFileService, { id });
  }

  fromRecord(record: AttachmentSnapshot): AttachmentLifecycle {
    return new AttachmentLifecycle(this.options, this.backend, this.tempFileService, record);
  }
}
