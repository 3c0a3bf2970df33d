/**
 * Log context redaction.
 * Strips credentials and customer contact details from structured data before it is logged.
 */

/** Keys whose values never reach a log line. */
const DENYLIST_KEYS = new Set([
  'password',
  'secret',
  'token',
  'api_key',
  'apikey',
  'access_token',
  'authorization',
  'bearer',
  'credential',
  'credentials',
  'email',
  'to',
  'customer_name',
]);

const REDACTED = '[REDACTED]';

export const DEFAULT_MAX_STRING_LENGTH = 500;

/**
 * Recursively redact denylisted keys and truncate long strings.
 * Returns a deep copy and never mutates the input.
 */
export function redactObject(value: unknown, maxStringLength: number = DEFAULT_MAX_STRING_LENGTH): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  if (typeof value === 'string') {
    return value.length > maxStringLength
      ? `${value.slice(0, maxStringLength)}... (${value.length - maxStringLength} more chars)`
      : value;
  }

  if (Array.isArray(value)) {
    return value.map(item => redactObject(item, maxStringLength));
  }

  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }

  if (typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      result[key] = DENYLIST_KEYS.has(key.toLowerCase()) ? REDACTED : redactObject(val, maxStringLength);
    }
    return result;
  }

  return value;
}

export function redactContext(
  context: Record<string, unknown>,
  maxStringLength?: number,
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, val] of Object.entries(context)) {
    result[key] = DENYLIST_KEYS.has(key.toLowerCase()) ? REDACTED : redactObject(val, maxStringLength);
  }
  return result;
}
