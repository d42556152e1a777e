// Type-safe error codes
export type ProtocolErrorCode =
  | "MALFORMED_MESSAGE"
  | "INVALID_LISTING"
  | "ALREADY_LISTED"
  | "INVALID_CONFIG"
  | "TRANSPORT_CLOSED"
  | "REPLY_TIMEOUT";

/**
 * Raised at the outer surfaces only (listing creation, message parsing,
 * configuration). Protocol outcomes such as a refused inquiry are replies.
 */
export class ProtocolError extends Error {
  constructor(
    message: string,
    public readonly code: ProtocolErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ProtocolError";
  }
}

export function isProtocolError(err: unknown): err is ProtocolError {
  return err instanceof ProtocolError;
}
