/**
 * Formatting Utilities
 *
 * Helpers for rendering durations in logs,
 * and for scrubbing secrets from log metadata.
 */

// =============================================================================
// TIME FORMATTING
// =============================================================================

/**
 * Formats a duration in milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) {
    return `${seconds}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  if (minutes < 60) {
    return remainingSeconds > 0 ? `${minutes}m ${remainingSeconds}s` : `${minutes}m`;
  }

  const hours = Math.floor(minutes / 60);
  const remainingMinutes = minutes % 60;
  return remainingMinutes > 0 ? `${hours}h ${remainingMinutes}m` : `${hours}h`;
}

// =============================================================================
// SANITIZATION
// =============================================================================

/**
 * Sanitizes an object for logging, replacing sensitive fields
 */
export function sanitizeObject(
  obj: Record<string, unknown>,
  sensitiveKeys: string[] = ['password', 'apiKey', 'token', 'secret', 'credential']
): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    const lowerKey = key.toLowerCase();
    const isSensitive = sensitiveKeys.some(
      sk => lowerKey.includes(sk.toLowerCase())
    );

    if (isSensitive && typeof value === 'string') {
      result[key] = '[REDACTED]';
    } else if (isPlainObject(value)) {
      result[key] = sanitizeObject(value, sensitiveKeys);
    } else {
      result[key] = value;
    }
  }

  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
