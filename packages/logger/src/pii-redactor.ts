/**
 * Redaction of secrets and personal data in log output.
 */

const REDACTED = "[REDACTED]";

/** Matched case-insensitively against property names. */
const SENSITIVE_KEYS = [
  "password",
  "secret",
  "token",
  "apiKey",
  "api_key",
  "authorization",
  "cookie",
  "accessToken",
  "refreshToken",
] as const;

const SENSITIVE_KEY_SET: ReadonlySet<string> = new Set(SENSITIVE_KEYS.map((k) => k.toLowerCase()));

const EMAIL_PATTERN = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;

/**
 * Redact a single key/value pair: sensitive keys lose their value entirely,
 * other string values lose any embedded email addresses.
 */
export function redactValue(key: string, value: unknown): unknown {
  if (SENSITIVE_KEY_SET.has(key.toLowerCase())) {
    return REDACTED;
  }

  if (typeof value === "string") {
    return value.replace(EMAIL_PATTERN, REDACTED);
  }

  return value;
}

/**
 * Apply {@link redactValue} to every top-level property of a log record.
 */
export function redactRecord(record: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    out[key] = redactValue(key, value);
  }
  return out;
}

/**
 * Paths for pino's `redact` option: every sensitive key at the top level and
 * one level down (e.g. `config.password`, `headers.authorization`).
 */
export const REDACT_PATHS: string[] = [
  ...SENSITIVE_KEYS,
  ...SENSITIVE_KEYS.map((key) => `*.${key}`),
];
