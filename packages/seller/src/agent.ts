/**
 * Seller Agent
 *
 * Owns the catalogue and runs three kinds of cooperative task on the event
 * loop: one decay timer per listing, the inquiry server and the acceptance
 * server. Servers take one message at a time and park on the transport when
 * their queue is empty.
 */

import { log, ProtocolError } from "@decay-market/sdk";
import type { InboundMessage, ReplyMessage } from "@decay-market/sdk";
import { Catalogue } from "./catalogue";
import { handleAcceptance, handleInquiry, type HandlerContext } from "./handlers";
import { validateListingTerms } from "./listing";
import { ConsoleNotifier } from "./notifier";
import { DEFAULT_TICK_INTERVAL_MS, PriceDecayTimer } from "./price_decay_timer";
import { IntervalScheduler } from "./scheduler";
import { matchPerformative } from "./transport";
import type {
  Clock,
  DecayMode,
  ListingSnapshot,
  MessageFilter,
  Scheduler,
  SellerTransport,
  UserNotifier,
} from "./types";

export interface SellerAgentOptions {
  transport: SellerTransport;
  name?: string;
  notifier?: UserNotifier;
  scheduler?: Scheduler;
  now?: Clock;
  tickIntervalMs?: number;
  decayMode?: DecayMode;
}

export class SellerAgent {
  readonly name: string;
  readonly catalogue = new Catalogue();
  private readonly transport: SellerTransport;
  private readonly notifier: UserNotifier;
  private readonly scheduler: Scheduler;
  private readonly ownScheduler?: IntervalScheduler;
  private readonly now: Clock;
  private readonly tickIntervalMs: number;
  private readonly decayMode: DecayMode;
  private running = false;
  private shutDown = false;
  private serving?: Promise<void>;

  constructor(opts: SellerAgentOptions) {
    this.name = opts.name ?? "seller";
    this.transport = opts.transport;
    this.notifier = opts.notifier ?? new ConsoleNotifier();
    if (opts.scheduler) {
      this.scheduler = opts.scheduler;
    } else {
      this.ownScheduler = new IntervalScheduler();
      this.scheduler = this.ownScheduler;
    }
    this.now = opts.now ?? (() => Date.now());
    this.tickIntervalMs = opts.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
    this.decayMode = opts.decayMode ?? "linear";
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Launch the inquiry and acceptance servers.
   */
  start(): void {
    if (this.running || this.shutDown) return;
    this.running = true;

    const ctx: HandlerContext = {
      catalogue: this.catalogue,
      notifier: this.notifier,
      now: this.now,
    };

    this.serving = Promise.all([
      this.serve("inquiry", matchPerformative("CFP"), (msg) => handleInquiry(msg, ctx)),
      this.serve("acceptance", matchPerformative("ACCEPT_PROPOSAL"), (msg) => handleAcceptance(msg, ctx)),
    ]).then(() => undefined);

    log("info", `Seller ${this.name} started`, { decay_mode: this.decayMode, tick_interval_ms: this.tickIntervalMs });
  }

  /**
   * Put an item up for sale and start its decay timer.
   * Throws INVALID_LISTING or ALREADY_LISTED, and TRANSPORT_CLOSED after shutdown().
   */
  putForSale(
    title: string,
    initialPrice: number,
    floorPrice: number,
    deadline: Date | number
  ): PriceDecayTimer {
    if (this.shutDown) {
      throw new ProtocolError(`Seller ${this.name} has shut down`, "TRANSPORT_CLOSED", { title });
    }
    const nowMs = this.now();
    const terms = validateListingTerms(
      {
        title,
        initialPrice,
        floorPrice,
        deadline: deadline instanceof Date ? deadline.getTime() : deadline,
      },
      nowMs
    );

    const timer = new PriceDecayTimer(terms, {
      catalogue: this.catalogue,
      scheduler: this.scheduler,
      notifier: this.notifier,
      now: this.now,
      tickIntervalMs: this.tickIntervalMs,
      decayMode: this.decayMode,
    });
    timer.start();
    return timer;
  }

  listings(): ListingSnapshot[] {
    return this.catalogue.snapshot();
  }

  /**
   * Stop every timer, close the transport and wait for both servers to end.
   * Withdrawn listings produce no notification. Also valid before start().
   */
  async shutdown(): Promise<void> {
    if (this.shutDown) return;
    this.shutDown = true;
    this.running = false;

    for (const listing of this.catalogue.accessors()) {
      listing.stop();
      this.catalogue.remove(listing.title);
    }
    this.ownScheduler?.cancelAll();
    this.transport.close();

    if (this.serving) {
      await this.serving;
      this.serving = undefined;
    }
    log("info", `Seller ${this.name} terminating.`);
  }

  private async serve<T extends InboundMessage>(
    label: string,
    filter: MessageFilter<T>,
    handle: (message: T) => ReplyMessage
  ): Promise<void> {
    while (this.running && !this.transport.closed) {
      const message = this.transport.receive(filter);
      if (!message) {
        await this.transport.block();
        continue;
      }

      try {
        this.transport.send(handle(message));
      } catch (err) {
        log("error", `The ${label} server failed on a message`, {
          conversation_id: message.conversation_id,
          error: err instanceof Error ? err.message : String(err),
        });
      }
      // let the other server and pending callbacks take a turn
      await Promise.resolve();
    }
  }
}
