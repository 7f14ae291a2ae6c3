import { Logger } from '@nestjs/common';
import { Readable } from 'stream';
import { ValidationMessages } from '../../common/constants/validation-messages';
import {
  AttachmentError,
  AttachmentFieldError,
  InvalidAttachmentTransitionError,
} from '../../common/exceptions';
import { StorageBackend } from './backends/storage-backend.interface';
import { ResolvedAttachmentOptions } from './interfaces/attachment-options.interface';
import { isRawUploadInput, isUploadedFileInput, UploadInput } from './interfaces/upload-input.interface';
import { TempFileService } from './services/temp-file.service';
import { isImageContentType } from './utils/attachment-options.util';
import { isReservedFilename, sanitizeFilename } from './utils/filename.util';
import { MimeTypeUtil } from './utils/mime-type.util';
import { buildStorageKey } from './utils/storage-key.util';

export enum AttachmentState {
  UNMODIFIED = 'unmodified',
  STAGED = 'staged',
  VALIDATED = 'validated',
  PERSISTED = 'persisted',
  DELETED = 'deleted',
}

export type AttachmentEvent = 'validate' | 'save' | 'destroy';

export interface TransitionSuccess {
  ok: true;
  state: AttachmentState;
  /** Whether the backend received a write during this transition */
  stored: boolean;
}

export interface TransitionFailure {
  ok: false;
  state: AttachmentState;
  errors: AttachmentFieldError[];
}

export type TransitionResult = TransitionSuccess | TransitionFailure;

export interface AttachmentSnapshot {
  id: string | number | null;
  filename: string | null;
  contentType: string | null;
  size: number | null;
  storageKey: string | null;
}

const LIVE_STATES: readonly AttachmentState[] = [
  AttachmentState.UNMODIFIED,
  AttachmentState.STAGED,
  AttachmentState.VALIDATED,
  AttachmentState.PERSISTED,
];

/**
 * Attachment Lifecycle Manager
 *
 * Holds the attributes of one attachment together with the temp files that
 * stage its data, and moves it through
 * `unmodified -> staged -> validated -> persisted -> deleted`.
 *
 * The owning code drives it explicitly:
 * ```typescript
 * await lifecycle.assignUpload(file);
 * const result = await lifecycle.transition('validate');
 * if (result.ok) await lifecycle.transition('save');
 * ```
 *
 * Staged temp files are kept most-recent-first; the first one is the current
 * version of the data. The list is emptied (and the files removed) once the
 * data reaches the backend.
 */
export class AttachmentLifecycle {
  private readonly logger = new Logger(AttachmentLifecycle.name);

  id: string | number | null;
  size: number | null;
  storageKey: string | null;

  private filenameValue: string | null = null;
  private contentTypeValue: string | null = null;
  private currentState: AttachmentState;
  // null until first read for records whose data only lives in the backend
  private tempPathList: string[] | null;
  private staged = false;
  private savedAttachment = false;
  // key written by the last save and the key it replaced, until released or reverted
  private lastWrite: { key: string; previousKey: string | null } | null = null;

  constructor(
    readonly options: ResolvedAttachmentOptions,
    private readonly backend: StorageBackend,
    private readonly tempFiles: TempFileService,
    snapshot: Partial<AttachmentSnapshot> = {},
  ) {
    this.id = snapshot.id ?? null;
    this.size = snapshot.size ?? null;
    this.storageKey = snapshot.storageKey ?? null;
    this.filename = snapshot.filename ?? null;
    this.contentType = snapshot.contentType ?? null;

    this.currentState = this.storageKey ? AttachmentState.PERSISTED : AttachmentState.UNMODIFIED;
    this.tempPathList = this.storageKey ? null : [];
  }

  get state(): AttachmentState {
    return this.currentState;
  }

  get filename(): string | null {
    return this.filenameValue;
  }

  set filename(value: string | null) {
    this.filenameValue = sanitizeFilename(value);
  }

  get contentType(): string | null {
    return this.contentTypeValue;
  }

  set contentType(value: string | null) {
    this.contentTypeValue = value === null ? null : value.trim();
  }

  isImage(): boolean {
    return isImageContentType(this.contentType);
  }

  /**
   * Path of the current temp file, or null when nothing has been staged or
   * loaded yet.
   */
  get tempPath(): string | null {
    return this.tempPathList?.[0] ?? null;
  }

  /**
   * Temp files of this instance, most recent first. For a persisted record the
   * list starts with a copy of the stored data.
   */
  async tempPaths(): Promise<readonly string[]> {
    if (this.tempPathList === null) {
      this.tempPathList = [];
      if (this.storageKey) {
        const stored = await this.backend.retrieve(this.storageKey);
        this.tempPathList.unshift(await this.tempFiles.writeToTempFile(stored, this.tempBaseName()));
      }
    }
    return this.tempPathList;
  }

  /**
   * Whether the next save writes data to the backend.
   */
  async hasStagedData(): Promise<boolean> {
    const current = this.tempPath;
    if (!this.staged || current === null) {
      return false;
    }
    return this.tempFiles.isFile(current);
  }

  /**
   * Reads the current temp file into memory.
   */
  async tempData(): Promise<Buffer | null> {
    const [current] = await this.tempPaths();
    if (current === undefined || !(await this.tempFiles.isFile(current))) {
      return null;
    }
    return this.tempFiles.read(current);
  }

  /**
   * Writes the data to a new temp file and makes it the current version.
   */
  async setTempData(data: Buffer | null | undefined): Promise<void> {
    if (data === null || data === undefined) {
      return;
    }
    await this.stage(data);
  }

  /**
   * Accepts upload input and stages its bytes. Returns false without touching
   * any attribute when the input is empty.
   */
  async assignUpload(input: UploadInput | null | undefined): Promise<boolean> {
    this.assertState('assign', LIVE_STATES);
    if (input === null || input === undefined) {
      return false;
    }

    if (Buffer.isBuffer(input)) {
      if (input.length === 0) return false;
      const tempPath = await this.stage(input);
      this.contentType = await this.detectContentType(null, tempPath);
      return true;
    }

    let declaredType: string;
    let filename: string;
    let source: string | Buffer | Readable | undefined;
    if (isUploadedFileInput(input)) {
      if (input.size === 0) return false;
      declaredType = input.mimetype;
      source = input.buffer ?? input.stream ?? input.path;
      filename = sanitizeFilename(input.originalname);
    } else if (isRawUploadInput(input)) {
      if (input.size === 0) return false;
      declaredType = input.content_type;
      source = input.tempfile;
      filename = sanitizeFilename(input.filename);
    } else {
      throw new AttachmentError('Unsupported upload input');
    }

    if (source === undefined) {
      throw new AttachmentError(`Upload ${filename} carries no data`);
    }

    const tempPath = await this.stage(source, filename || undefined);
    this.filename = filename;
    this.contentType = await this.detectContentType(declaredType, tempPath);
    return true;
  }

  /**
   * Applies a lifecycle event.
   *
   * - `validate`: refreshes `size` from the current temp file and checks the
   *   constraint set. Failures leave the state unchanged.
   * - `save`: validates first when needed, then stores the staged data once and
   *   clears the temp files. Without staged data no backend write happens. A
   *   file stored under a previous key stays until `releaseSupersededData`.
   * - `destroy`: removes the stored file and any temp files.
   */
  async transition(event: AttachmentEvent): Promise<TransitionResult> {
    switch (event) {
      case 'validate':
        return this.validate();
      case 'save':
        return this.save();
      case 'destroy':
        return this.destroy();
    }
  }

  /**
   * Deletes the stored file replaced by the last save. Owning code that saves
   * inside a database transaction calls this once the transaction commits.
   */
  async releaseSupersededData(): Promise<void> {
    const write = this.lastWrite;
    this.lastWrite = null;
    if (write?.previousKey && write.previousKey !== write.key) {
      await this.backend.delete(write.previousKey);
    }
  }

  /**
   * Undoes the last save after its database transaction failed: the newly
   * written file is deleted and the previous key restored.
   */
  async revertSave(): Promise<void> {
    const write = this.lastWrite;
    this.lastWrite = null;
    if (write === null) {
      return;
    }
    this.storageKey = write.previousKey;
    if (write.key !== write.previousKey) {
      await this.backend.delete(write.key);
    }
  }

  /**
   * Removes every temp file of an instance that will not be saved.
   */
  async discard(): Promise<void> {
    await this.clearTempPaths();
    this.savedAttachment = false;
    if (this.currentState !== AttachmentState.DELETED) {
      this.currentState = this.storageKey ? AttachmentState.PERSISTED : AttachmentState.UNMODIFIED;
    }
  }

  /**
   * Storage key the current data is written to on save.
   */
  resolveStorageKey(): string {
    if (this.id === null || !this.filename) {
      throw new AttachmentError('An attachment needs an id and a filename before it can be stored');
    }
    return buildStorageKey(this.options.pathPrefix, this.id, this.filename);
  }

  toSnapshot(): AttachmentSnapshot {
    return {
      id: this.id,
      filename: this.filename,
      contentType: this.contentType,
      size: this.size,
      storageKey: this.storageKey,
    };
  }

  private async validate(): Promise<TransitionResult> {
    this.assertState('validate', LIVE_STATES);

    const staged = await this.hasStagedData();
    const current = this.tempPath;
    if (staged && current !== null) {
      this.size = await this.tempFiles.size(current);
    }

    const errors = this.collectErrors();
    if (errors.length > 0) {
      this.logger.debug(`Attachment ${this.filename ?? '(unnamed)'} failed validation: ${errors.length} error(s)`);
      return { ok: false, state: this.currentState, errors };
    }

    this.savedAttachment = staged;
    if (staged || this.currentState !== AttachmentState.PERSISTED) {
      this.currentState = AttachmentState.VALIDATED;
    }
    return { ok: true, state: this.currentState, stored: false };
  }

  private async save(): Promise<TransitionResult> {
    this.assertState('save', LIVE_STATES);

    if (this.currentState === AttachmentState.UNMODIFIED || this.currentState === AttachmentState.STAGED) {
      const validation = await this.validate();
      if (!validation.ok) {
        return validation;
      }
    }

    const source = this.tempPath;
    let stored = false;
    if (this.savedAttachment && source !== null) {
      const key = this.resolveStorageKey();
      const pending = this.lastWrite;
      const previousKey = pending ? pending.previousKey : this.storageKey;

      await this.backend.store(source, key, { contentType: this.contentType ?? undefined });
      this.storageKey = key;
      this.lastWrite = { key, previousKey };
      stored = true;

      // an earlier unreleased write under another key is dropped outright
      if (pending && pending.key !== key && pending.key !== pending.previousKey) {
        await this.backend.delete(pending.key);
      }

      await this.clearTempPaths();
      this.savedAttachment = false;
    }

    this.currentState = AttachmentState.PERSISTED;
    return { ok: true, state: this.currentState, stored };
  }

  private async destroy(): Promise<TransitionResult> {
    this.assertState('destroy', LIVE_STATES);

    if (this.storageKey) {
      await this.backend.delete(this.storageKey);
    }
    await this.releaseSupersededData();
    await this.clearTempPaths();
    this.savedAttachment = false;
    this.currentState = AttachmentState.DELETED;
    return { ok: true, state: this.currentState, stored: false };
  }

  private collectErrors(): AttachmentFieldError[] {
    const errors: AttachmentFieldError[] = [];

    if (this.size === null) {
      errors.push(blank('size'));
    }
    if (!this.contentType) {
      errors.push(blank('content_type'));
    }
    if (!this.filename) {
      errors.push(blank('filename'));
    } else if (isReservedFilename(this.filename)) {
      errors.push({
        attribute: 'filename',
        code: ValidationMessages.attachment.reservedName,
        message: `filename ${this.filename} is reserved`,
      });
    }

    const { size, contentTypes } = this.options;
    if (this.size !== null && (this.size < size.min || this.size > size.max)) {
      errors.push({
        attribute: 'size',
        code: ValidationMessages.attachment.notIncluded,
        message: `size is not included in the list (${size.min}..${size.max})`,
        allowed: { min: size.min, max: size.max },
      });
    }
    if (contentTypes !== null && this.contentType && !contentTypes.includes(this.contentType)) {
      errors.push({
        attribute: 'content_type',
        code: ValidationMessages.attachment.notIncluded,
        message: `content_type is not included in the list (${contentTypes.join(', ')})`,
        allowed: [...contentTypes],
      });
    }

    return errors;
  }

  private async stage(source: string | Buffer | Readable, baseName = this.tempBaseName()): Promise<string> {
    const tempPath =
      typeof source === 'string'
        ? await this.tempFiles.copyToTempFile(source, baseName)
        : await this.tempFiles.writeToTempFile(source, baseName);

    this.tempPathList = [tempPath, ...(this.tempPathList ?? [])];
    this.staged = true;
    this.currentState = AttachmentState.STAGED;
    return tempPath;
  }

  private async clearTempPaths(): Promise<void> {
    await this.tempFiles.remove(this.tempPathList ?? []);
    this.tempPathList = this.storageKey ? null : [];
    this.staged = false;
  }

  private detectContentType(declaredType: string | null, tempPath: string): Promise<string | null> {
    return MimeTypeUtil.detect(declaredType, this.filename, () => this.tempFiles.readHead(tempPath));
  }

  private tempBaseName(): string {
    return this.filename || 'attachment';
  }

  private assertState(event: string, allowed: readonly AttachmentState[]): void {
    if (!allowed.includes(this.currentState)) {
      throw new InvalidAttachmentTransitionError(this.currentState, event);
    }
  }
}

function blank(attribute: AttachmentFieldError['attribute']): AttachmentFieldError {
  return {
    attribute,
    code: ValidationMessages.attachment.blank,
    message: `${attribute} can't be blank`,
  };
}
