/**
 * Secret redaction for log payloads.
 *
 * Any object key that looks like key material is replaced before the
 * payload reaches a console stream.
 */

const SECRET_KEY_PATTERN = /secret|private|seed|passphrase/i;

export const REDACTED = "[REDACTED]";

export function redactSecrets(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redactSecrets(item));
  }
  if (typeof value === "object" && value !== null) {
    const out: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      out[key] = SECRET_KEY_PATTERN.test(key) ? REDACTED : redactSecrets(inner);
    }
    return out;
  }
  return value;
}
