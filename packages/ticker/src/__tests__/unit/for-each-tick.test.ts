import { FakeClock, settle } from "@metronome/test-utils";
import { describe, expect, it, vi } from "vitest";
import { forEachTick } from "../../for-each-tick.js";
import { createTicker } from "../../ticker.js";
import type { Tick } from "../../types.js";

describe("forEachTick", () => {
  it("runs the handler per tick and resolves when the ticker closes", async () => {
    const clock = new FakeClock();
    const ticker = createTicker(10, { clock });
    const seen: Tick[] = [];
    const run = forEachTick(ticker, (tick) => {
      seen.push(tick);
    });

    await clock.advanceAndSettle(10);
    await clock.advanceAndSettle(10);
    await ticker.close();

    await expect(run).resolves.toEqual({ handled: 2, failed: 0 });
    expect(seen.map((tick) => tick.timestamp)).toEqual([10, 20]);
  });

  it("reports a failing handler and keeps consuming", async () => {
    const clock = new FakeClock();
    const ticker = createTicker(10, { clock, name: "jobs" });
    const onWarning = vi.fn();
    const run = forEachTick(
      ticker,
      (tick) => {
        if (tick.sequence === 1) throw new Error("boom");
      },
      { onWarning },
    );

    await clock.advanceAndSettle(10);
    await clock.advanceAndSettle(10);
    await ticker.close();

    await expect(run).resolves.toEqual({ handled: 1, failed: 1 });
    expect(onWarning).toHaveBeenCalledTimes(1);
    expect(onWarning).toHaveBeenCalledWith('Ticker "jobs": tick #1 handler failed: boom');
  });

  it("awaits async handlers before taking the next tick", async () => {
    const clock = new FakeClock();
    const ticker = createTicker(10, { clock });
    let release: () => void = () => {};
    const blocker = new Promise<void>((resolve) => {
      release = resolve;
    });
    const run = forEachTick(ticker, async (tick) => {
      if (tick.sequence === 1) await blocker;
    });

    await clock.advanceAndSettle(10);
    await clock.advanceAndSettle(100);
    expect(ticker.status().ticksDelivered).toBe(1);

    release();
    await settle();
    expect(ticker.status().ticksDelivered).toBe(2);

    await ticker.close();
    await expect(run).resolves.toEqual({ handled: 2, failed: 0 });
  });
});
