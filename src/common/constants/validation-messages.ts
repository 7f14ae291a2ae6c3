/**
 * Validation Messages
 *
 * Error codes reported on attachment fields.
 * Following i18n naming convention: {module}.{error_type}
 *
 * ## Usage:
 * ```typescript
 * import { ValidationMessages } from '../../common/constants/validation-messages';
 *
 * errors.push({ attribute: 'size', code: ValidationMessages.attachment.notIncluded, ... });
 * ```
 */

export const ValidationMessages = {
  attachment: {
    blank: 'attachment.blank',
    notIncluded: 'attachment.not_included',
    reservedName: 'attachment.reserved_name',
  },
} as const;
