const SENSITIVE_FIELDS = new Set([
  'authorization', 'token', 'access_token', 'accesstoken', 'refresh_token',
  'client_secret', 'clientsecret', 'password', 'secret', 'cookie',
]);

const SENSITIVE_PATTERNS: RegExp[] = [
  /Bearer\s+[A-Za-z0-9._~+/-]+=*/g,
  /eyJ[a-zA-Z0-9_-]{10,}\.[a-zA-Z0-9_-]{10,}\.[a-zA-Z0-9_-]{10,}/g, // JWTs
  /(client_secret|access_token|refresh_token)=[^&\s]+/gi,
];

const REDACTED = '[REDACTED]';

export function redactString(value: string): string {
  let result = value;
  for (const pattern of SENSITIVE_PATTERNS) {
    result = result.replace(pattern, REDACTED);
  }
  return result;
}

function sanitizeValue(key: string, value: unknown): unknown {
  if (value === null || value === undefined) return value;

  if (SENSITIVE_FIELDS.has(key.toLowerCase())) return REDACTED;

  if (typeof value === 'string') return redactString(value);

  if (Array.isArray(value)) {
    return value.map((item, i) => sanitizeValue(String(i), item));
  }

  if (typeof value === 'object') {
    return sanitize(value as Record<string, unknown>);
  }

  return value;
}

export function sanitize(params: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(params)) {
    result[key] = sanitizeValue(key, value);
  }
  return result;
}
