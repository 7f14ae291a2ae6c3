import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import attachmentsConfig from '../../config/attachments.config';
import { FileSystemBackend } from './backends/file-system.backend';
import { S3Backend } from './backends/s3.backend';
import { ATTACHMENT_OPTIONS } from './constants/attachment.constants';
import { Attachment } from './entities/attachment.entity';
import { AttachmentOptions } from './interfaces/attachment-options.interface';
import { AttachmentLifecycleFactory } from './services/attachment-lifecycle.factory';
import { AttachmentsService } from './services/attachments.service';
import { TempFileService } from './services/temp-file.service';
import { resolveAttachmentOptions } from './utils/attachment-options.util';

@Module({})
export class AttachmentsModule {
  static register(options: AttachmentOptions = {}): DynamicModule {
    return {
      module: AttachmentsModule,
      imports: [ConfigModule.forFeature(attachmentsConfig), TypeOrmModule.forFeature([Attachment])],
      providers: [
        {
          provide: ATTACHMENT_OPTIONS,
          inject: [ConfigService],
          useFactory: (configService: ConfigService) =>
            resolveAttachmentOptions(options, {
              pathPrefix: configService.get<string>('attachments.pathPrefix'),
              storage: configService.get<string>('attachments.storage'),
            }),
        },
        TempFileService,
        FileSystemBackend,
        S3Backend,
        AttachmentLifecycleFactory,
        AttachmentsService,
      ],
      exports: [ATTACHMENT_OPTIONS, AttachmentLifecycleFactory, AttachmentsService, TempFileService],
    };
  }
}
