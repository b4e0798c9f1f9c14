import { CancellationScope } from "@metronome/core";
import { describe, expect, it } from "vitest";
import { WakeGate } from "../../gate.js";
import { HandoffChannel } from "../../handoff.js";
import { Latch } from "../../latch.js";

describe("HandoffChannel", () => {
  it("hands a value straight to a parked reader", async () => {
    const channel = new HandoffChannel<string>();
    const scope = new CancellationScope();
    const read = channel.receive();

    await expect(channel.send("x", scope)).resolves.toBe(true);
    await expect(read).resolves.toEqual({ done: false, value: "x" });
  });

  it("keeps the writer waiting until a reader takes the value", async () => {
    const channel = new HandoffChannel<number>();
    const scope = new CancellationScope();
    let taken = false;
    const sent = channel.send(1, scope).then((ok) => {
      taken = ok;
    });

    await Promise.resolve();
    expect(taken).toBe(false);

    await expect(channel.receive()).resolves.toEqual({ done: false, value: 1 });
    await sent;
    expect(taken).toBe(true);
  });

  it("serves readers in arrival order", async () => {
    const channel = new HandoffChannel<number>();
    const scope = new CancellationScope();
    const first = channel.receive();
    const second = channel.receive();

    await channel.send(1, scope);
    await channel.send(2, scope);

    await expect(first).resolves.toEqual({ done: false, value: 1 });
    await expect(second).resolves.toEqual({ done: false, value: 2 });
  });

  it("resolves send false when the scope is cancelled first", async () => {
    const channel = new HandoffChannel<number>();
    const scope = new CancellationScope();
    const sent = channel.send(1, scope);

    scope.cancel();

    await expect(sent).resolves.toBe(false);
    channel.close();
    await expect(channel.receive()).resolves.toEqual({ done: true, value: undefined });
  });

  it("refuses to send on a cancelled scope or closed channel", async () => {
    const cancelled = new CancellationScope();
    cancelled.cancel();
    const open = new HandoffChannel<number>();
    const closed = new HandoffChannel<number>();
    closed.close();

    await expect(open.send(1, cancelled)).resolves.toBe(false);
    await expect(closed.send(1, new CancellationScope())).resolves.toBe(false);
  });

  it("rejects a second concurrent writer", async () => {
    const channel = new HandoffChannel<number>();
    const scope = new CancellationScope();
    const first = channel.send(1, scope);

    await expect(channel.send(2, scope)).rejects.toThrow(
      "HandoffChannel supports a single writer",
    );
    channel.close();
    await expect(first).resolves.toBe(false);
  });

  it("releases parked readers on close, and close is idempotent", async () => {
    const channel = new HandoffChannel<number>();
    const read = channel.receive();

    channel.close();
    channel.close();

    await expect(read).resolves.toEqual({ done: true, value: undefined });
    expect(channel.closed).toBe(true);
    expect(channel.waitingReaders).toBe(0);
  });

  it("withdraws an aborted read", async () => {
    const channel = new HandoffChannel<number>();
    const scope = new CancellationScope();
    const controller = new AbortController();
    const abandoned = channel.receive({ signal: controller.signal });

    controller.abort("gave up");
    await expect(abandoned).rejects.toBe("gave up");
    expect(channel.waitingReaders).toBe(0);

    const next = channel.receive();
    await channel.send(5, scope);
    await expect(next).resolves.toEqual({ done: false, value: 5 });
  });

  it("rejects a read whose signal is already aborted", async () => {
    const channel = new HandoffChannel<number>();

    await expect(channel.receive({ signal: AbortSignal.abort("late") })).rejects.toBe("late");
  });

  it("exposes a read-only side backed by the channel", async () => {
    const channel = new HandoffChannel<number>();
    const reader = channel.readSide();

    expect("send" in reader).toBe(false);
    expect("close" in reader).toBe(false);

    const read = reader.receive();
    await channel.send(3, new CancellationScope());
    await expect(read).resolves.toEqual({ done: false, value: 3 });

    expect(reader.closed).toBe(false);
    channel.close();
    expect(reader.closed).toBe(true);
    await expect(reader.receive()).resolves.toEqual({ done: true, value: undefined });
  });

  it("iterates until closed", async () => {
    const channel = new HandoffChannel<number>();
    const scope = new CancellationScope();
    const seen: number[] = [];
    const consumer = (async () => {
      for await (const value of channel) seen.push(value);
    })();

    await channel.send(1, scope);
    await channel.send(2, scope);
    channel.close();
    await consumer;

    expect(seen).toEqual([1, 2]);
  });
});

describe("WakeGate", () => {
  it("releases a parked waiter", async () => {
    const gate = new WakeGate();
    let woke = false;
    const waiting = gate.wait().then(() => {
      woke = true;
    });

    gate.open();
    await waiting;

    expect(woke).toBe(true);
  });

  it("collapses opens made while nobody waits into one wake", async () => {
    const gate = new WakeGate();
    gate.open();
    gate.open();

    await gate.wait();
    let woke = false;
    void gate.wait().then(() => {
      woke = true;
    });
    await Promise.resolve();
    await Promise.resolve();

    expect(woke).toBe(false);
    gate.open();
  });
});

describe("Latch", () => {
  it("resolves waiters registered before and after release", async () => {
    const latch = new Latch();
    const early = latch.wait();

    latch.release();
    latch.release();

    await expect(early).resolves.toBeUndefined();
    await expect(latch.wait()).resolves.toBeUndefined();
    expect(latch.released).toBe(true);
  });
});
