import { AttachmentError } from '../../../common/exceptions';
import {
  DEFAULT_MAX_SIZE,
  DEFAULT_MIN_SIZE,
  DEFAULT_PATH_PREFIX,
  IMAGE_CONTENT_TYPES,
} from '../constants/attachment.constants';
import {
  AttachmentOptions,
  ResolvedAttachmentOptions,
  SizeRange,
  StorageKind,
} from '../interfaces/attachment-options.interface';

const STORAGE_KINDS: readonly StorageKind[] = ['file_system', 's3'];

export function isStorageKind(value: string): value is StorageKind {
  return STORAGE_KINDS.some((kind) => kind === value);
}

export interface AttachmentOptionDefaults {
  pathPrefix?: string;
  storage?: string;
}

/**
 * Normalizes per-model options into an immutable constraint set.
 *
 * An explicit `size` range wins over `minSize`/`maxSize`. When only one bound
 * is given, the other keeps its default.
 */
export function resolveAttachmentOptions(
  options: AttachmentOptions = {},
  defaults: AttachmentOptionDefaults = {},
): ResolvedAttachmentOptions {
  const size: SizeRange = options.size ?? {
    min: options.minSize ?? DEFAULT_MIN_SIZE,
    max: options.maxSize ?? DEFAULT_MAX_SIZE,
  };

  if (!Number.isInteger(size.min) || !Number.isInteger(size.max) || size.min < 0 || size.min > size.max) {
    throw new AttachmentError(`Invalid attachment size range ${size.min}..${size.max}`);
  }

  const storage: string = options.storage ?? defaults.storage ?? 'file_system';
  if (!isStorageKind(storage)) {
    throw new AttachmentError(`Unknown attachment storage: ${storage}`);
  }

  const pathPrefix = (options.pathPrefix ?? defaults.pathPrefix ?? DEFAULT_PATH_PREFIX).replace(/^\/+|\/+$/g, '');

  return Object.freeze({
    contentTypes: expandContentTypes(options.contentType),
    size: Object.freeze({ ...size }),
    pathPrefix,
    storage,
  });
}

function expandContentTypes(contentType: string | string[] | undefined): readonly string[] | null {
  if (contentType === undefined) {
    return null;
  }

  const expanded = [contentType]
    .flat()
    .flatMap((type) => (type === 'image' ? IMAGE_CONTENT_TYPES : [type]));

  return Object.freeze([...new Set(expanded)]);
}

export function isImageContentType(contentType: string | null): boolean {
  return contentType !== null && IMAGE_CONTENT_TYPES.includes(contentType);
}
