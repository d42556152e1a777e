/**
 * Deterministic stand-ins for the clock and the scheduler.
 */

import type { CancelSchedule, Scheduler } from "../types";

export class ManualClock {
  constructor(public ms = 0) {}

  now = (): number => this.ms;

  set(ms: number): void {
    this.ms = ms;
  }
}

export class ManualScheduler implements Scheduler {
  readonly intervals: number[] = [];
  private tasks = new Map<number, () => void>();
  private nextId = 0;

  schedulePeriodic(intervalMs: number, callback: () => void): CancelSchedule {
    const id = this.nextId++;
    this.intervals.push(intervalMs);
    this.tasks.set(id, callback);
    return () => {
      this.tasks.delete(id);
    };
  }

  get active(): number {
    return this.tasks.size;
  }

  /** Fire every live callback once. */
  fire(): void {
    for (const callback of [...this.tasks.values()]) {
      callback();
    }
  }
}
