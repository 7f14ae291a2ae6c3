/**
 * Common Exceptions Module
 *
 * Re-exports all typed exception classes for easy imports.
 *
 * @example
 * ```typescript
 * import { AttachmentError, ThumbnailError } from '../../common/exceptions';
 * ```
 */

export * from './domain.exceptions';
