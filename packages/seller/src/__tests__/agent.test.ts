import { describe, it, expect, afterEach, vi } from "vitest";
import { createAcceptProposal, createCfp } from "@decay-market/sdk";
import { SellerAgent } from "../agent";
import { ConsoleNotifier } from "../notifier";
import { MemoryTransport } from "../transport";
import { ManualClock, ManualScheduler } from "./helpers";

function setup() {
  const transport = new MemoryTransport();
  const notifier = new ConsoleNotifier();
  const clock = new ManualClock(0);
  const scheduler = new ManualScheduler();
  const agent = new SellerAgent({ transport, notifier, scheduler, now: clock.now, name: "test-seller" });
  agent.start();
  return { transport, notifier, clock, scheduler, agent };
}

describe("SellerAgent", () => {
  let agent: SellerAgent | null = null;

  afterEach(async () => {
    if (agent) {
      await agent.shutdown();
      agent = null;
    }
    vi.useRealTimers();
  });

  it("serves inquiries and acceptances over the transport", async () => {
    const ctx = setup();
    agent = ctx.agent;
    agent.putForSale("Dune", 100, 40, 60_000);

    await expect(ctx.transport.request(createCfp("Dune", "buyer-1"))).resolves.toMatchObject({
      type: "PROPOSE",
      price: 100,
    });
    await expect(
      ctx.transport.request(createAcceptProposal({ title: "Dune", offered_price: 100 }, "buyer-1"))
    ).resolves.toMatchObject({ type: "CONFIRM", price: 100 });
    await expect(ctx.transport.request(createCfp("Dune", "buyer-1"))).resolves.toMatchObject({
      type: "REFUSE",
    });
    expect(ctx.notifier.notifications).toEqual(['Item "Dune" has been sold for 100.']);
  });

  it("confirms exactly one of two simultaneous acceptances", async () => {
    const ctx = setup();
    agent = ctx.agent;
    agent.putForSale("Dune", 100, 40, 60_000);

    const [first, second] = await Promise.all([
      ctx.transport.request(createAcceptProposal({ title: "Dune", offered_price: 100 }, "buyer-1")),
      ctx.transport.request(createAcceptProposal({ title: "Dune", offered_price: 120 }, "buyer-2")),
    ]);

    expect([first.type, second.type]).toEqual(["CONFIRM", "DISCONFIRM"]);
    expect(ctx.notifier.notifications).toHaveLength(1);
  });

  it("answers an undecodable acceptance with NOT_UNDERSTOOD", async () => {
    const ctx = setup();
    agent = ctx.agent;
    agent.putForSale("Dune", 100, 40, 60_000);

    const reply = await ctx.transport.request(createAcceptProposal(42, "buyer-1"));
    expect(reply.type).toBe("NOT_UNDERSTOOD");
    expect(agent.listings().map((l) => l.title)).toEqual(["Dune"]);
  });

  it("keeps serving inquiries while acceptances queue up", async () => {
    const ctx = setup();
    agent = ctx.agent;
    agent.putForSale("Dune", 100, 40, 60_000);
    agent.putForSale("Emma", 30, 10, 60_000);

    const replies = await Promise.all([
      ctx.transport.request(createAcceptProposal({ title: "Emma", offered_price: 5 }, "buyer-1")),
      ctx.transport.request(createCfp("Dune", "buyer-2")),
      ctx.transport.request(createCfp("Emma", "buyer-3")),
    ]);

    expect(replies.map((r) => r.type)).toEqual(["DISCONFIRM", "PROPOSE", "PROPOSE"]);
  });

  it("rejects duplicate and invalid listings", () => {
    const ctx = setup();
    agent = ctx.agent;
    agent.putForSale("Dune", 100, 40, 60_000);

    expect(() => ctx.agent.putForSale("Dune", 90, 40, 60_000)).toThrow('Item "Dune" is already on sale');
    expect(() => ctx.agent.putForSale("Emma", 10, 20, 60_000)).toThrow(/floorPrice/);
    expect(() => ctx.agent.putForSale("Emma", 30, 10, new Date(0))).toThrow(/deadline/);
    expect(ctx.agent.listings()).toHaveLength(1);
  });

  it("expires an unsold listing on the default scheduler", async () => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    const transport = new MemoryTransport();
    const notifier = new ConsoleNotifier();
    agent = new SellerAgent({ transport, notifier });
    agent.start();
    agent.putForSale("Dune", 100, 40, new Date(60_000));

    await expect(transport.request(createCfp("Dune", "buyer-1"))).resolves.toMatchObject({
      type: "PROPOSE",
      price: 100,
    });

    // ticks at 60s (floor price) and 120s (past the deadline)
    vi.advanceTimersByTime(120_000);

    await expect(transport.request(createCfp("Dune", "buyer-1"))).resolves.toMatchObject({
      type: "REFUSE",
    });
    expect(notifier.notifications).toEqual(['Cannot sell the item "Dune".']);
  });

  it("shuts down without notifying and closes the transport", async () => {
    const ctx = setup();
    const dune = ctx.agent.putForSale("Dune", 100, 40, 60_000);

    await ctx.agent.shutdown();

    expect(ctx.agent.isRunning).toBe(false);
    expect(ctx.agent.listings()).toEqual([]);
    expect(dune.getState()).toBe("stopped");
    expect(ctx.scheduler.active).toBe(0);
    expect(ctx.notifier.notifications).toEqual([]);
    expect(ctx.transport.closed).toBe(true);
    await expect(ctx.transport.request(createCfp("Dune", "buyer-1"))).rejects.toMatchObject({
      code: "TRANSPORT_CLOSED",
    });
  });

  it("withdraws listings made before start() on shutdown", async () => {
    vi.useFakeTimers();
    const notifier = new ConsoleNotifier();
    const idle = new SellerAgent({ transport: new MemoryTransport(), notifier });
    const dune = idle.putForSale("Dune", 100, 40, Date.now() + 60_000);
    expect(vi.getTimerCount()).toBe(1);

    await idle.shutdown();

    expect(vi.getTimerCount()).toBe(0);
    expect(idle.listings()).toEqual([]);
    expect(dune.getState()).toBe("stopped");
    expect(notifier.notifications).toEqual([]);
  });

  it("refuses new listings and ignores start() after shutdown", async () => {
    vi.useFakeTimers();
    const notifier = new ConsoleNotifier();
    const transport = new MemoryTransport();
    const stopped = new SellerAgent({ transport, notifier });
    stopped.start();
    await stopped.shutdown();

    let caught: unknown;
    try {
      stopped.putForSale("Dune", 100, 40, Date.now() + 60_000);
    } catch (err) {
      caught = err;
    }
    expect(caught).toMatchObject({ code: "TRANSPORT_CLOSED", message: "Seller seller has shut down" });

    stopped.start();
    expect(stopped.isRunning).toBe(false);

    vi.advanceTimersByTime(180_000);
    expect(vi.getTimerCount()).toBe(0);
    expect(stopped.listings()).toEqual([]);
    expect(notifier.notifications).toEqual([]);
  });
});
