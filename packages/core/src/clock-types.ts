/**
 * Clock abstraction, injectable for deterministic testing.
 *
 * Production code uses globalThis timers via `defaultClock`.
 * Tests inject a fake clock that controls time explicitly.
 */

/** Opaque handle returned by {@link Clock.setTimeout}. */
export type TimerHandle = ReturnType<typeof globalThis.setTimeout> | number;

export interface Clock {
  readonly now: () => number;
  readonly setTimeout: (fn: () => void, ms: number) => TimerHandle;
  readonly clearTimeout: (id: TimerHandle) => void;
}
