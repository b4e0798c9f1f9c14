/**
 * Deterministic clock for testing timer-driven state machines.
 *
 * Controls time explicitly: `advance(ms)` fires due timers in order.
 * Use `advanceAndSettle(ms)` to also let async continuations run.
 */

import type { Clock, TimerHandle } from "@metronome/core";

interface PendingTimer {
  readonly id: number;
  readonly fn: () => void;
  readonly at: number;
  readonly delayMs: number;
}

export class FakeClock implements Clock {
  private _now: number;
  private _nextTimerId = 1;
  private readonly _timers = new Map<number, PendingTimer>();
  private _timerWaiters: (() => void)[] = [];

  constructor(start = 0) {
    this._now = start;
  }

  readonly now = (): number => this._now;

  readonly setTimeout = (fn: () => void, ms: number): TimerHandle => {
    const id = this._nextTimerId++;
    this._timers.set(id, { id, fn, at: this._now + ms, delayMs: ms });
    for (const waiter of this._timerWaiters.splice(0)) {
      waiter();
    }
    return id;
  };

  readonly clearTimeout = (id: TimerHandle): void => {
    if (typeof id === "number") {
      this._timers.delete(id);
    }
  };

  /**
   * Advance time by `ms`, firing every timer that falls due on the way,
   * earliest first. Timers scheduled by a callback fire too if they fall due
   * within the window.
   */
  advance(ms: number): void {
    const target = this._now + ms;
    for (;;) {
      const next = this._nextDue(target);
      if (next === undefined) break;
      this._timers.delete(next.id);
      this._now = next.at;
      next.fn();
    }
    this._now = target;
  }

  /** Advance time and wait for async continuations to settle. */
  async advanceAndSettle(ms: number): Promise<void> {
    this.advance(ms);
    await settle();
  }

  /**
   * Wait until a timer is registered.
   * If a timer is already pending, resolves immediately.
   */
  waitForTimer(): Promise<void> {
    if (this._timers.size > 0) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this._timerWaiters.push(resolve);
    });
  }

  /** Number of pending (armed, not cleared, not fired) timers. */
  get pendingTimers(): number {
    return this._timers.size;
  }

  /** Delays of the pending timers, in registration order. */
  get pendingDelays(): readonly number[] {
    return [...this._timers.values()].map((timer) => timer.delayMs);
  }

  private _nextDue(target: number): PendingTimer | undefined {
    let next: PendingTimer | undefined;
    for (const timer of this._timers.values()) {
      if (timer.at <= target && (next === undefined || timer.at < next.at)) {
        next = timer;
      }
    }
    return next;
  }
}

/**
 * Let pending promise continuations run by yielding one real macrotask.
 */
export function settle(): Promise<void> {
  return new Promise<void>((resolve) => {
    globalThis.setTimeout(resolve, 0);
  });
}
