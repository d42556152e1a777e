import type { CancelSchedule, Scheduler } from "./types";

/**
 * setInterval-backed scheduler. Cancelling twice is harmless.
 */
export class IntervalScheduler implements Scheduler {
  private handles = new Set<ReturnType<typeof setInterval>>();

  schedulePeriodic(intervalMs: number, callback: () => void): CancelSchedule {
    const handle = setInterval(callback, intervalMs);
    this.handles.add(handle);
    return () => {
      if (this.handles.delete(handle)) {
        clearInterval(handle);
      }
    };
  }

  cancelAll(): void {
    for (const handle of this.handles) {
      clearInterval(handle);
    }
    this.handles.clear();
  }

  get active(): number {
    return this.handles.size;
  }
}
