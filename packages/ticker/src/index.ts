/**
 * @metronome/ticker
 *
 * A resettable, pausable, closable ticker.
 *
 * Provides:
 * - Runtime interval changes (`reset`) and pause (`stop`)
 * - Deterministic retirement (`close`) that ends every `for await` loop over the output
 * - Retirement by a parent CancellationScope or AbortSignal
 * - Injectable clock for deterministic tests
 */

// Clock
export { defaultClock } from "./clock.js";
// Config
export { clampInterval, resolveTickerConfig, validateResetInterval } from "./config.js";
// Constants
export {
  DEFAULT_TICKER_NAME,
  MAX_TIMER_DELAY_MS,
  MIN_TIMER_RESOLUTION_MS,
  PACKAGE_NAME,
} from "./constants.js";
// Consumer helper
export {
  type ForEachTickOptions,
  type ForEachTickResult,
  forEachTick,
  type TickHandler,
} from "./for-each-tick.js";
// Primitives
export { WakeGate } from "./gate.js";
export { HandoffChannel, type ReadChannel, type ReceiveOptions } from "./handoff.js";
export { Latch } from "./latch.js";
// Ticker
export { createTicker, createTickerWithScope, Ticker } from "./ticker.js";
// Types
export type {
  Clock,
  ParentScope,
  ResolvedTickerConfig,
  Tick,
  TickChannel,
  TickerConfig,
  TickerOptions,
  TickerStateKind,
  TickerStatus,
  WarningHandler,
} from "./types.js";
