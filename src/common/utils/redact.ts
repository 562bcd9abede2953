const SENSITIVE_FIELDS = [
  'password',
  'token',
  'secret',
  'authorization',
  'apikey',
  'hash',
];

export const REDACTED = '[REDACTED]';

function isSensitive(key: string): boolean {
  const lower = key.toLowerCase();
  return SENSITIVE_FIELDS.some(field => lower.includes(field));
}

/**
 * Deep copy of a log payload with credential-like fields masked.
 * Matching is by substring, so `access_token` and `passwordHash` are caught.
 */
export function redactSensitive(value: unknown): unknown {
  if (!value || typeof value !== 'object') return value;
  if (Array.isArray(value)) return value.map(item => redactSensitive(item));

  const sanitized: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    sanitized[key] = isSensitive(key) ? REDACTED : redactSensitive(entry);
  }
  return sanitized;
}
