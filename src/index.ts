export * from './common/exceptions';
export { ValidationMessages } from './common/constants/validation-messages';
export { LoggerModule, createLoggerOptions } from './common/logger/logger.module';
export { default as attachmentsConfig } from './config/attachments.config';
export { validate as validateEnvironment } from './config/env-validation';
export * from './modules/attachments/attachment-lifecycle';
export { AttachmentsModule } from './modules/attachments/attachments.module';
export { FileSystemBackend } from './modules/attachments/backends/file-system.backend';
export { S3Backend } from './modules/attachments/backends/s3.backend';
export * from './modules/attachments/backends/storage-backend.interface';
export * from './modules/attachments/constants/attachment.constants';
export { Attachment } from './modules/attachments/entities/attachment.entity';
export * from './modules/attachments/interfaces/attachment-options.interface';
export * from './modules/attachments/interfaces/upload-input.interface';
export { AttachmentLifecycleFactory } from './modules/attachments/services/attachment-lifecycle.factory';
export { AttachmentsService } from './modules/attachments/services/attachments.service';
export { TempFileService } from './modules/attachments/services/temp-file.service';
export { resolveAttachmentOptions, isImageContentType } from './modules/attachments/utils/attachment-options.util';
export { isReservedFilename, sanitizeFilename } from './modules/attachments/utils/filename.util';
