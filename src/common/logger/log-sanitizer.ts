/**
 * Log Sanitizer - Redacts storage credentials from log output
 */
import * as winston from 'winston';

// Sensitive keys to redact (case-insensitive substring match)
const SENSITIVE_KEYS = [
  'password',
  'secret',
  'token',
  'authorization',
  'accessKey',
  'access_key',
  'credentials',
  'signature',
];

const REDACTED = '[REDACTED]';

function isSensitiveKey(key: string): boolean {
  const lowerKey = key.toLowerCase();
  return SENSITIVE_KEYS.some((sensitive) =>
    lowerKey.includes(sensitive.toLowerCase()),
  );
}

/**
 * Recursively sanitize an object, redacting sensitive values
 */
export function sanitizeObject(obj: unknown, depth = 0): unknown {
  if (depth > 10) {
    return '[MAX_DEPTH]';
  }

  if (typeof obj === 'string') {
    // Pre-signed URLs carry their credentials in the query string
    return obj.replace(/([?&]X-Amz-(?:Credential|Signature|Security-Token)=)[^&\s]+/g, `$1${REDACTED}`);
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => sanitizeObject(item, depth + 1));
  }

  if (obj !== null && typeof obj === 'object') {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      sanitized[key] = isSensitiveKey(key) ? REDACTED : sanitizeObject(value, depth + 1);
    }
    return sanitized;
  }

  return obj;
}

/**
 * Winston format transformer that sanitizes logs
 */
export const sanitizeFormat = winston.format((info) => {
  for (const key of Object.keys(info)) {
    info[key] = isSensitiveKey(key) ? REDACTED : sanitizeObject(info[key], 1);
  }
  return info;
});
