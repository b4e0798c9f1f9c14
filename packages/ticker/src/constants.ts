/**
 * Constants for @metronome/ticker.
 */

export const PACKAGE_NAME = "@metronome/ticker";
export const DEFAULT_TICKER_NAME = "ticker";
/** Smallest delay the host timer honours; shorter intervals are clamped up. */
export const MIN_TIMER_RESOLUTION_MS = 1;
/** Longest single delay the host timer accepts; longer intervals are armed in segments. */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;
