import {
    DeleteObjectCommand,
    GetObjectCommand,
    PutObjectCommand,
    S3Client,
} from '@aws-sdk/client-s3';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFile } from 'fs/promises';
import { Readable } from 'stream';
import { AttachmentError } from '../../../common/exceptions';
import { StorageBackend, StoreOptions } from './storage-backend.interface';

@Injectable()
export class S3Backend implements StorageBackend {
    private readonly logger = new Logger(S3Backend.name);
    private readonly s3Client: S3Client;
    private readonly bucket: string;

    constructor(private readonly configService: ConfigService) {
        const endpoint = this.configService.get<string>('MINIO_ENDPOINT', 'http://localhost:9000');
        this.bucket = this.configService.get<string>('MINIO_BUCKET', 'attachments');

        this.s3Client = new S3Client({
            endpoint,
            region: this.configService.get<string>('MINIO_REGION', 'us-east-1'),
            credentials: {
                accessKeyId: this.configService.get<string>('MINIO_ACCESS_KEY', 'minioadmin'),
                secretAccessKey: this.configService.get<string>('MINIO_SECRET_KEY', 'minioadmin'),
            },
            forcePathStyle: true, // Required for MinIO
        });

        this.logger.log(`S3 storage configured with endpoint: ${endpoint}`);
    }

    /**
     * Upload a staged file
     */
    async store(sourcePath: string, destinationKey: string, options: StoreOptions = {}): Promise<void> {
        const command = new PutObjectCommand({
            Bucket: this.bucket,
            Key: destinationKey,
            Body: await readFile(sourcePath),
            ContentType: options.contentType,
        });

        await this.s3Client.send(command);
        this.logger.log(`Stored object: ${destinationKey}`);
    }

    /**
     * Delete an object
     */
    async delete(destinationKey: string): Promise<void> {
        const command = new DeleteObjectCommand({
            Bucket: this.bucket,
            Key: destinationKey,
        });

        await this.s3Client.send(command);
        this.logger.log(`Deleted object: ${destinationKey}`);
    }

    /**
     * Get an object stream
     */
    async retrieve(destinationKey: string): Promise<Readable> {
        const command = new GetObjectCommand({
            Bucket: this.bucket,
            Key: destinationKey,
        });

        const response = await this.s3Client.send(command);
        if (!(response.Body instanceof Readable)) {
            throw new AttachmentError(`Object ${destinationKey} has no readable body`);
        }
        return response.Body;
    }
}
