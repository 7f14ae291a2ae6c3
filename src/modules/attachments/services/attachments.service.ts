import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { randomUUID } from 'node:crypto';
import { DataSource, Repository } from 'typeorm';
import {
  AttachmentError,
  AttachmentNotFoundError,
  AttachmentValidationError,
} from '../../../common/exceptions';
import { AttachmentLifecycle } from '../attachment-lifecycle';
import { Attachment } from '../entities/attachment.entity';
import { UploadInput } from '../interfaces/upload-input.interface';
import { AttachmentLifecycleFactory } from './attachment-lifecycle.factory';

@Injectable()
export class AttachmentsService {
  private readonly logger = new Logger(AttachmentsService.name);

  constructor(
    @InjectRepository(Attachment)
    private readonly attachmentRepository: Repository<Attachment>,
    private readonly dataSource: DataSource,
    private readonly lifecycleFactory: AttachmentLifecycleFactory,
  ) {}

  /**
   * Stage, validate and store an upload as a new attachment
   */
  async create(input: UploadInput): Promise<Attachment> {
    const lifecycle = this.lifecycleFactory.create(randomUUID());
    await lifecycle.assignUpload(input);

    const attachment = await this.persist(lifecycle, this.attachmentRepository.create());
    this.logger.log(`Created attachment ${attachment.id} -> ${attachment.storageKey}`);
    return attachment;
  }

  /**
   * Replace the data of an existing attachment. Empty input leaves it untouched.
   */
  async replace(id: string, input: UploadInput): Promise<Attachment> {
    const attachment = await this.findOne(id);
    const lifecycle = this.lifecycleFactory.fromRecord(attachment);

    const assigned = await lifecycle.assignUpload(input);
    if (!assigned) {
      return attachment;
    }

    const updated = await this.persist(lifecycle, attachment);
    this.logger.log(`Replaced data of attachment ${updated.id}`);
    return updated;
  }

  async findAll(): Promise<Attachment[]> {
    return this.attachmentRepository.find({
      order: { createdAt: 'DESC' },
    });
  }

  async findOne(id: string): Promise<Attachment> {
    const attachment = await this.attachmentRepository.findOne({
      where: { id },
    });
    if (!attachment) {
      throw new AttachmentNotFoundError(id);
    }
    return attachment;
  }

  /**
   * Read the stored bytes of an attachment
   */
  async readData(id: string): Promise<Buffer> {
    const attachment = await this.findOne(id);
    const lifecycle = this.lifecycleFactory.fromRecord(attachment);
    try {
      const data = await lifecycle.tempData();
      if (data === null) {
        throw new AttachmentError(`Attachment ${id} has no stored data`);
      }
      return data;
    } finally {
      await lifecycle.discard();
    }
  }

  /**
   * Delete an attachment, then its stored file once the row is gone
   */
  async remove(id: string): Promise<void> {
    const attachment = await this.findOne(id);
    const lifecycle = this.lifecycleFactory.fromRecord(attachment);

    await this.dataSource.transaction((manager) => manager.remove(Attachment, attachment));
    await lifecycle.transition('destroy');
    this.logger.log(`Removed attachment ${id}`);
  }

  /**
   * Writes the row and the staged data in one transaction, so a failed
   * backend write rolls the row back. A file replaced under another key is
   * deleted only after the commit; a failed commit deletes the new file.
   */
  private async persist(lifecycle: AttachmentLifecycle, attachment: Attachment): Promise<Attachment> {
    const validation = await lifecycle.transition('validate');
    if (!validation.ok) {
      await lifecycle.discard();
      throw new AttachmentValidationError(validation.errors);
    }

    const { id, filename, contentType, size } = lifecycle.toSnapshot();
    if (typeof id !== 'string' || filename === null || contentType === null || size === null) {
      throw new AttachmentError('Validated attachment is missing attributes');
    }

    attachment.id = id;
    attachment.filename = filename;
    attachment.contentType = contentType;
    attachment.size = size;
    attachment.storageKey = lifecycle.resolveStorageKey();

    const previousKey = lifecycle.storageKey;
    let saved: Attachment;
    try {
      saved = await this.dataSource.transaction(async (manager) => {
        const row = await manager.save(Attachment, attachment);
        await lifecycle.transition('save');
        return row;
      });
    } catch (error) {
      try {
        await lifecycle.revertSave();
      } catch (cleanupError) {
        this.logger.warn(`Failed to delete uncommitted file from storage: ${attachment.storageKey}`, cleanupError);
      }
      await lifecycle.discard();
      throw error;
    }

    try {
      await lifecycle.releaseSupersededData();
    } catch (error) {
      this.logger.warn(`Failed to delete replaced file from storage: ${previousKey}`, error);
    }
    return saved;
  }
}
