/**
 * Type definitions for @metronome/ticker.
 */

import type { CancellationScope, Clock } from "@metronome/core";
import type { ReadChannel } from "./handoff.js";

export type { Clock } from "@metronome/core";

// ---------------------------------------------------------------------------
// Output events
// ---------------------------------------------------------------------------

export interface Tick {
  /** `clock.now()` at the moment the timer fired */
  readonly timestamp: number;
  /** 1-based count of ticks delivered by this ticker */
  readonly sequence: number;
  /** Interval that produced this tick */
  readonly intervalMs: number;
}

/** The ticker's output as consumers see it. */
export type TickChannel = ReadChannel<Tick>;

// ---------------------------------------------------------------------------
// Lifecycle
// ---------------------------------------------------------------------------

export type TickerStateKind = "active" | "paused" | "terminated";

export interface TickerStatus {
  readonly state: TickerStateKind;
  /** Current interval, or the last positive one while paused / terminated */
  readonly intervalMs: number;
  readonly ticksDelivered: number;
  readonly closed: boolean;
}

/** Parent whose cancellation retires the ticker. */
export type ParentScope = CancellationScope | AbortSignal;

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export type WarningHandler = (message: string) => void;

export interface TickerOptions {
  /** Label used in warnings and errors (default: "ticker") */
  readonly name?: string;
  /** Clock abstraction for testable timers (default: globalThis) */
  readonly clock?: Clock;
  /** Receives non-fatal warnings (default: console.warn with a package prefix) */
  readonly onWarning?: WarningHandler;
}

export interface TickerConfig extends TickerOptions {
  readonly intervalMs: number;
  readonly parent?: ParentScope;
}

export interface ResolvedTickerConfig {
  readonly intervalMs: number;
  readonly name: string;
  readonly clock: Clock;
  readonly onWarning: WarningHandler;
  readonly parent?: ParentScope;
}
