/**
 * Price Decay Timer
 *
 * Owns the price trajectory and expiry of one listing. It is the only writer
 * of the listing's current price.
 *
 *   idle --start()--> running --stop()--> stopped
 *                        |
 *                        +--deadline passed--> expired
 *
 * stopped and expired are terminal. A stopped timer never reaches its expiry
 * branch, so a sold item is never reported as unsold.
 */

import { log } from "@decay-market/sdk";
import type { Catalogue } from "./catalogue";
import { decayedPrice } from "./listing";
import type {
  CancelSchedule,
  Clock,
  DecayMode,
  ListingSnapshot,
  ListingTerms,
  PriceAccessor,
  Scheduler,
  UserNotifier,
} from "./types";

export const DEFAULT_TICK_INTERVAL_MS = 60_000;

export type TimerState = "idle" | "running" | "stopped" | "expired";

export interface PriceDecayTimerDeps {
  catalogue: Catalogue;
  scheduler: Scheduler;
  notifier: UserNotifier;
  now: Clock;
  tickIntervalMs?: number;
  decayMode?: DecayMode;
}

export function expiryNotice(title: string): string {
  return `Cannot sell the item "${title}".`;
}

export class PriceDecayTimer implements PriceAccessor {
  private state: TimerState = "idle";
  private price: number;
  private startMs: number;
  private cancelTick?: CancelSchedule;

  constructor(
    private readonly terms: ListingTerms,
    private readonly deps: PriceDecayTimerDeps
  ) {
    this.price = terms.initialPrice;
    this.startMs = deps.now();
  }

  get title(): string {
    return this.terms.title;
  }

  getState(): TimerState {
    return this.state;
  }

  /**
   * Register in the catalogue and begin ticking. Throws ALREADY_LISTED (from
   * the catalogue) without starting if the title is taken.
   */
  start(): void {
    if (this.state !== "idle") return;

    this.deps.catalogue.register(this);
    this.startMs = this.deps.now();
    this.state = "running";
    this.cancelTick = this.deps.scheduler.schedulePeriodic(
      this.deps.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS,
      () => this.tick()
    );

    log("info", "Listing started", {
      title: this.terms.title,
      initial_price: this.terms.initialPrice,
      floor_price: this.terms.floorPrice,
      deadline_ms: this.terms.deadline,
    });
  }

  /**
   * One scheduled step. Public so hosts without a scheduler can drive it.
   */
  tick(): void {
    if (this.state !== "running") return;

    const nowMs = this.deps.now();
    if (nowMs > this.terms.deadline) {
      this.expire();
      return;
    }
    this.price = decayedPrice(this.terms, this.startMs, nowMs, this.deps.decayMode);
  }

  currentPrice(): number {
    return this.price;
  }

  /**
   * External cancellation (sale or shutdown). Idempotent; never notifies.
   * Removing the title from the catalogue is the caller's job.
   */
  stop(): void {
    if (this.state === "stopped" || this.state === "expired") return;
    this.state = "stopped";
    this.cancelSchedule();
  }

  snapshot(): ListingSnapshot {
    return {
      title: this.terms.title,
      initial_price: this.terms.initialPrice,
      floor_price: this.terms.floorPrice,
      current_price: this.price,
      start_ms: this.startMs,
      deadline_ms: this.terms.deadline,
    };
  }

  private expire(): void {
    this.state = "expired";
    this.cancelSchedule();
    this.deps.catalogue.remove(this.terms.title);
    this.deps.notifier.notifyUser(expiryNotice(this.terms.title));
    log("warn", "Listing expired unsold", { title: this.terms.title, deadline_ms: this.terms.deadline });
  }

  private cancelSchedule(): void {
    if (this.cancelTick) {
      this.cancelTick();
      this.cancelTick = undefined;
    }
  }
}
