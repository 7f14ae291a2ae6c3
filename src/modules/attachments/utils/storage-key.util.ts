import { AttachmentError } from '../../../common/exceptions';
import { isReservedFilename } from './filename.util';

/**
 * Splits a record id into directory segments. Numeric ids are zero-padded to
 * eight digits and cut into groups of four (`42` -> `0000/0042`); other ids
 * form a single segment.
 */
export function partitionId(id: string | number): string[] {
  const value = String(id);
  if (!/^\d+$/.test(value)) {
    return [value];
  }

  const padded = value.padStart(8, '0');
  return padded.match(/.{1,4}/g) ?? [padded];
}

export function buildStorageKey(pathPrefix: string, id: string | number, filename: string): string {
  const segments = [...partitionId(id), filename];
  if (segments.some((segment) => segment === '' || isReservedFilename(segment))) {
    throw new AttachmentError(`Cannot build a storage key for ${String(id)}/${filename}`);
  }
  return [pathPrefix, ...segments].filter((segment) => segment !== '').join('/');
}
