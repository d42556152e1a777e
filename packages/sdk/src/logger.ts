/**
 * Structured Logging Utility
 *
 * Provides structured JSON logging when DECAY_LOG_JSON=1 is set.
 * Otherwise, uses standard console logging.
 *
 * Secrets are redacted from logged data.
 */

import { redactSecrets } from "./security/redact";

export type LogLevel = "info" | "warn" | "error" | "debug";

/**
 * Log a message with optional data.
 *
 * If DECAY_LOG_JSON=1, outputs JSON lines:
 *   { ts_ms, level, message, data }
 *
 * Otherwise, uses standard console logging.
 */
export function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  // Check env var at runtime (not module load time) to support test environment changes
  const jsonMode = process.env.DECAY_LOG_JSON === "1";

  const sanitizedData = data ? redactSecrets(data) : undefined;

  if (jsonMode) {
    const logLine = {
      ts_ms: Date.now(),
      level,
      message,
      ...(sanitizedData !== undefined && { data: sanitizedData }),
    };
    console.log(JSON.stringify(logLine));
    return;
  }

  const prefix = `[${level.toUpperCase()}]`;
  const write = level === "error" ? console.error : level === "warn" ? console.warn : console.log;
  if (sanitizedData !== undefined) {
    write(prefix, message, sanitizedData);
  } else {
    write(prefix, message);
  }
}
