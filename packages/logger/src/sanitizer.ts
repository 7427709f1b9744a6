/**
 * @stackwright/logger - Sensitive Data Sanitizer
 * Masks sensitive fields in log output
 */

export const SENSITIVE_KEYS = [
  'password',
  'secret',
  'token',
  'api_key',
  'apikey',
  'authorization',
  'encryption_key',
  'mongo_uri',
  'database_url',
  'private_key',
] as const;

function isSensitiveKey(key: string): boolean {
  const lowerKey = key.toLowerCase();
  return SENSITIVE_KEYS.some((k) => lowerKey.includes(k));
}

/**
 * Mask one entry: the whole value when the key is sensitive, otherwise
 * whatever sensitive keys nest inside it.
 * Long values keep their first and last 4 chars.
 */
export function maskValue(key: string, value: unknown): unknown {
  if (isSensitiveKey(key)) {
    return typeof value === 'string' && value.length > 8
      ? `${value.slice(0, 4)}****${value.slice(-4)}`
      : '****';
  }
  return maskSensitiveData(value);
}

/** Recursively mask sensitive data in objects. */
export function maskSensitiveData(obj: unknown): unknown {
  if (!obj || typeof obj !== 'object') return obj;

  if (Array.isArray(obj)) {
    return obj.map(maskSensitiveData);
  }

  const masked: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    masked[key] = maskValue(key, value);
  }
  return masked;
}
