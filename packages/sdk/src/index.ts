// packages/sdk/src/index.ts

// Protocol
export * from "./protocol/index";

// Logging
export { log } from "./logger";
export type { LogLevel } from "./logger";

// Security
export { redactSecrets, REDACTED } from "./security/redact";
