/**
 * MIME types accepted by the `image` content-type shorthand.
 */
export const IMAGE_CONTENT_TYPES: readonly string[] = [
  'image/jpeg',
  'image/pjpeg',
  'image/jpg',
  'image/gif',
  'image/png',
  'image/x-png',
  'image/x-ms-bmp',
  'image/bmp',
  'image/x-bmp',
  'image/x-bitmap',
  'image/x-xbitmap',
  'image/x-win-bitmap',
  'image/x-windows-bmp',
  'image/ms-bmp',
  'application/bmp',
  'application/x-bmp',
  'application/x-win-bitmap',
  'application/preview',
  'image/jp_',
  'application/jpg',
  'application/x-jpg',
  'image/pipeg',
  'image/vnd.swiftview-jpeg',
  'application/png',
  'application/x-png',
  'image/gi_',
  'image/x-citrix-pjpeg',
];

export const OCTET_STREAM = 'application/octet-stream';

export const DEFAULT_MIN_SIZE = 1;
export const DEFAULT_MAX_SIZE = 1024 * 1024;
export const DEFAULT_PATH_PREFIX = 'attachments';
export const DEFAULT_TEMPFILE_PATH = 'tmp/attachments';
export const DEFAULT_STORAGE_ROOT = 'storage';

/** Injection token for the resolved per-model options */
export const ATTACHMENT_OPTIONS = Symbol('ATTACHMENT_OPTIONS');
