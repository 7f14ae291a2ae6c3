/**
 * Typed Attachment Exception Classes
 *
 * Processing failures extend `DomainException`; request-level failures extend the
 * matching NestJS HTTP exception so a host application's exception filter can map
 * them to responses without extra wiring.
 *
 * @example
 * ```typescript
 * throw new AttachmentError('Temp file could not be staged');
 * throw new AttachmentNotFoundError('5f0c...');
 * ```
 */

import { BadRequestException, NotFoundException, UnprocessableEntityException } from '@nestjs/common';

// ==================== Base Domain Exceptions ====================

/**
 * Base class for domain-specific errors.
 */
export abstract class DomainException extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      statusCode: this.statusCode,
      error: this.name,
      code: this.code,
      message: this.message,
    };
  }
}

/**
 * Generic attachment-processing failure. Not retried.
 */
export class AttachmentError extends DomainException {
  readonly code = 'attachment.processing_failed';
  readonly statusCode = 500;
}

/**
 * Raised by image processors when a thumbnail cannot be produced.
 */
export class ThumbnailError extends DomainException {
  readonly code = 'attachment.thumbnail_failed';
  readonly statusCode = 500;
}

// ==================== Not Found Exceptions ====================

export class AttachmentNotFoundError extends NotFoundException {
  constructor(attachmentId: string) {
    super({
      code: 'attachment.not_found',
      message: `Attachment with ID ${attachmentId} not found`,
    });
  }
}

// ==================== Business Rule Exceptions ====================

export class InvalidAttachmentTransitionError extends BadRequestException {
  constructor(from: string, event: string) {
    super({
      code: 'attachment.invalid_transition',
      message: `Cannot apply ${event} to an attachment in state ${from}`,
    });
  }
}

export interface AttachmentFieldError {
  attribute: 'size' | 'content_type' | 'filename';
  code: string;
  message: string;
  allowed?: string[] | { min: number; max: number };
}

export class AttachmentValidationError extends UnprocessableEntityException {
  readonly errors: AttachmentFieldError[];

  constructor(errors: AttachmentFieldError[]) {
    super({
      code: 'attachment.invalid',
      message: errors.map((error) => error.message).join('; '),
      errors,
    });
    this.errors = errors;
  }
}
