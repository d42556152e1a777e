/**
 * In-process mailbox transport.
 *
 * Inbound messages queue until a server picks them up with receive(); servers
 * with nothing to do park on block(). request() pairs an inbound message with
 * the reply that carries its conversation id, which is how the HTTP front
 * turns the seller's asynchronous replies back into responses.
 */

import { ProtocolError } from "@decay-market/sdk";
import type { InboundMessage, InboundPerformative, ReplyMessage } from "@decay-market/sdk";
import type { MessageFilter, SellerTransport } from "./types";

type PendingReply = {
  resolve: (reply: ReplyMessage) => void;
  reject: (err: Error) => void;
  timer?: ReturnType<typeof setTimeout>;
};

export type SendListener = (message: ReplyMessage) => void;

export function matchPerformative<P extends InboundPerformative>(
  type: P
): MessageFilter<Extract<InboundMessage, { type: P }>> {
  return (message): message is Extract<InboundMessage, { type: P }> => message.type === type;
}

export class MemoryTransport implements SellerTransport {
  private inbox: InboundMessage[] = [];
  private wakers: Array<() => void> = [];
  private listeners = new Set<SendListener>();
  private pendingReplies = new Map<string, PendingReply>();
  private isClosed = false;

  get closed(): boolean {
    return this.isClosed;
  }

  /** Number of inbound messages not yet received. */
  get queued(): number {
    return this.inbox.length;
  }

  deliver(message: InboundMessage): void {
    if (this.isClosed) {
      throw new ProtocolError("Transport is closed", "TRANSPORT_CLOSED");
    }
    this.inbox.push(message);
    this.wakeAll();
  }

  receive<T extends InboundMessage>(filter: MessageFilter<T>): T | undefined {
    for (let i = 0; i < this.inbox.length; i++) {
      const message = this.inbox[i];
      if (filter(message)) {
        this.inbox.splice(i, 1);
        return message;
      }
    }
    return undefined;
  }

  block(): Promise<void> {
    if (this.isClosed) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.wakers.push(resolve);
    });
  }

  send(message: ReplyMessage): void {
    for (const listener of this.listeners) {
      listener(message);
    }

    const pending = this.pendingReplies.get(message.in_reply_to);
    if (pending) {
      this.pendingReplies.delete(message.in_reply_to);
      if (pending.timer) clearTimeout(pending.timer);
      pending.resolve(message);
    }
  }

  onSend(listener: SendListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Deliver `message` and wait for the reply in its conversation.
   * Rejects with REPLY_TIMEOUT after `timeoutMs` (if given) or TRANSPORT_CLOSED on close().
   */
  request(message: InboundMessage, timeoutMs?: number): Promise<ReplyMessage> {
    return new Promise<ReplyMessage>((resolve, reject) => {
      const pending: PendingReply = { resolve, reject };
      if (timeoutMs !== undefined) {
        pending.timer = setTimeout(() => {
          this.pendingReplies.delete(message.conversation_id);
          reject(
            new ProtocolError(`No reply within ${timeoutMs}ms`, "REPLY_TIMEOUT", {
              conversation_id: message.conversation_id,
            })
          );
        }, timeoutMs);
      }
      this.pendingReplies.set(message.conversation_id, pending);

      try {
        this.deliver(message);
      } catch (err) {
        this.pendingReplies.delete(message.conversation_id);
        if (pending.timer) clearTimeout(pending.timer);
        reject(err instanceof Error ? err : new Error(String(err)));
      }
    });
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.inbox = [];

    for (const pending of this.pendingReplies.values()) {
      if (pending.timer) clearTimeout(pending.timer);
      pending.reject(new ProtocolError("Transport closed before reply", "TRANSPORT_CLOSED"));
    }
    this.pendingReplies.clear();
    this.wakeAll();
  }

  private wakeAll(): void {
    const wakers = this.wakers;
    this.wakers = [];
    for (const wake of wakers) {
      wake();
    }
  }
}
