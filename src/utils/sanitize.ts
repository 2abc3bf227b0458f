/**
 * String Sanitization Utilities
 *
 * Error messages and log lines can carry request details from the SDK.
 * These helpers strip control characters and redact credentials before
 * anything leaves the process.
 */

/**
 * Remove control characters, trim, and cap length (ellipsis included).
 * Returns null for null/undefined input.
 */
export function sanitizeString(
  input: string | null | undefined,
  maxLength: number = 500
): string | null {
  if (input === null || input === undefined) {
    return null;
  }

  const limit = Math.max(1, Math.floor(Number(maxLength) || 500));

  // ASCII and C1 controls (tab, newline and CR survive), zero-width
  // characters and the U+2028/U+2029 separators
  // eslint-disable-next-line no-control-regex
  const cleaned = input.replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F\x80-\x9F\u200B-\u200F\u2028\u2029\uFEFF]/g, '');
  const trimmed = cleaned.trim();

  if (trimmed.length <= limit) {
    return trimmed;
  }
  return limit <= 3 ? trimmed.substring(0, limit) : trimmed.substring(0, limit - 3) + '...';
}

const SENSITIVE_PATTERNS: { pattern: RegExp; replacement: string }[] = [
  { pattern: /Bearer\s+[A-Za-z0-9\-._~+/]+=*/gi, replacement: 'Bearer [REDACTED]' },
  { pattern: /access[_-]?token[=:]\s*["']?[A-Za-z0-9\-._~+/]+["']?/gi, replacement: 'access_token=[REDACTED]' },
  { pattern: /token[=:]\s*["']?[A-Za-z0-9\-._~+/]+["']?/gi, replacement: 'token=[REDACTED]' },
  { pattern: /api[_-]?key[=:]\s*["']?[A-Za-z0-9\-._~+/]+["']?/gi, replacement: 'api_key=[REDACTED]' },
  { pattern: /authorization[=:]\s*["']?[A-Za-z0-9\-._~+/]+["']?/gi, replacement: 'authorization=[REDACTED]' },
  { pattern: /\/(?:Users|home|var|etc|tmp)\/[^\s"']+/gi, replacement: '[PATH_REDACTED]' },
  { pattern: /[A-Z]:\\(?:Users|Windows|Program Files)[^\s"']*/gi, replacement: '[PATH_REDACTED]' },
  { pattern: /at\s+[^\s]+\s+\([^)]+:\d+:\d+\)/g, replacement: 'at [STACK_REDACTED]' },
];

/**
 * Extract a message from an unknown error and redact tokens, file paths
 * and stack frames.
 */
export function sanitizeErrorMessage(error: unknown, maxLength: number = 500): string {
  let message: string;
  if (error instanceof Error) {
    message = error.message;
  } else if (typeof error === 'string') {
    message = error;
  } else {
    message = 'An error occurred';
  }

  let redacted = message;
  for (const { pattern, replacement } of SENSITIVE_PATTERNS) {
    redacted = redacted.replace(pattern, replacement);
  }

  return sanitizeString(redacted, maxLength) ?? '';
}
