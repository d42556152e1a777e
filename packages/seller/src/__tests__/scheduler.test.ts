import { describe, it, expect, afterEach, vi } from "vitest";
import { IntervalScheduler } from "../scheduler";

describe("IntervalScheduler", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("fires periodically until cancelled", () => {
    vi.useFakeTimers();
    const scheduler = new IntervalScheduler();
    const callback = vi.fn();

    const cancel = scheduler.schedulePeriodic(1_000, callback);
    vi.advanceTimersByTime(3_500);
    expect(callback).toHaveBeenCalledTimes(3);

    cancel();
    cancel();
    vi.advanceTimersByTime(5_000);
    expect(callback).toHaveBeenCalledTimes(3);
    expect(scheduler.active).toBe(0);
  });

  it("cancelAll() clears every interval", () => {
    vi.useFakeTimers();
    const scheduler = new IntervalScheduler();
    const first = vi.fn();
    const second = vi.fn();
    scheduler.schedulePeriodic(1_000, first);
    const cancelSecond = scheduler.schedulePeriodic(2_000, second);

    scheduler.cancelAll();
    cancelSecond();
    vi.advanceTimersByTime(10_000);

    expect(first).not.toHaveBeenCalled();
    expect(second).not.toHaveBeenCalled();
    expect(vi.getTimerCount()).toBe(0);
  });
});
