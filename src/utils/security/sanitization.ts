/**
 * @fileoverview Redaction of credential-like values before they reach logs.
 * @module src/utils/security/sanitization
 */

const REDACTED = "[REDACTED]";

const SENSITIVE_KEYS = [
  "api_key",
  "apikey",
  "email",
  "password",
  "secret",
  "token",
  "authorization",
];

const isSensitiveKey = (key: string): boolean => {
  const lowered = key.toLowerCase();
  return SENSITIVE_KEYS.some((sensitive) => lowered.includes(sensitive));
};

const redact = (value: unknown, seen: WeakSet<object>): unknown => {
  if (value === null || typeof value !== "object") {
    return value;
  }
  if (seen.has(value)) {
    return "[Circular]";
  }
  seen.add(value);

  if (Array.isArray(value)) {
    return value.map((item) => redact(item, seen));
  }

  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    result[key] = isSensitiveKey(key) ? REDACTED : redact(entry, seen);
  }
  return result;
};

/**
 * Returns a deep copy of `input` with the values of credential-like keys
 * (API keys, emails, tokens) replaced by `[REDACTED]`. Primitives are
 * returned as-is.
 */
export function sanitizeInputForLogging(input: unknown): unknown {
  return redact(input, new WeakSet());
}
