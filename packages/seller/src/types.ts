import type { InboundMessage, ReplyMessage } from "@decay-market/sdk";

/**
 * Typed inbound filter, the seller's equivalent of a message template.
 */
export type MessageFilter<T extends InboundMessage = InboundMessage> = (
  message: InboundMessage
) => message is T;

/**
 * What the seller needs from the hosting transport.
 */
export interface SellerTransport {
  readonly closed: boolean;
  /** Non-blocking: the first queued message matching `filter`, or undefined. */
  receive<T extends InboundMessage>(filter: MessageFilter<T>): T | undefined;
  /** Resolves on the next delivery or when the transport closes. */
  block(): Promise<void>;
  send(message: ReplyMessage): void;
  close(): void;
}

export interface UserNotifier {
  notifyUser(text: string): void;
}

export type CancelSchedule = () => void;

export interface Scheduler {
  schedulePeriodic(intervalMs: number, callback: () => void): CancelSchedule;
}

export type Clock = () => number;

/**
 * linear: proportional decay from initial to floor price over the listing's life.
 * legacy_truncated: initial - range * trunc(elapsed / total), which holds the
 * initial price until the deadline. Kept for literal compatibility only.
 */
export type DecayMode = "linear" | "legacy_truncated";

export interface ListingTerms {
  title: string;
  initialPrice: number;
  floorPrice: number;
  /** Epoch ms */
  deadline: number;
}

export interface ListingSnapshot {
  title: string;
  initial_price: number;
  floor_price: number;
  current_price: number;
  start_ms: number;
  deadline_ms: number;
}

/**
 * Live view of a listing held by the catalogue. Readers always see the
 * current price, never a copy.
 */
export interface PriceAccessor {
  readonly title: string;
  currentPrice(): number;
  stop(): void;
  snapshot(): ListingSnapshot;
}
