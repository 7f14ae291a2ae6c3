import { Readable } from 'stream';

/**
 * Multer-style uploaded file. The bytes come from exactly one of
 * `buffer`, `path` or `stream`.
 */
export interface UploadedFileInput {
  originalname: string;
  mimetype: string;
  size: number;
  buffer?: Buffer;
  path?: string;
  stream?: Readable;
}

/**
 * Plain hash posted by clients that do not go through a multipart parser.
 */
export interface RawUploadInput {
  size: number;
  content_type: string;
  filename: string;
  tempfile: string | Buffer | Readable;
}

export type UploadInput = UploadedFileInput | RawUploadInput | Buffer;

export function isUploadedFileInput(input: UploadInput): input is UploadedFileInput {
  return !Buffer.isBuffer(input) && 'mimetype' in input;
}

export function isRawUploadInput(input: UploadInput): input is RawUploadInput {
  return !Buffer.isBuffer(input) && 'tempfile' in input;
}
