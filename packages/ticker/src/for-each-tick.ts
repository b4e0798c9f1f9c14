/**
 * Consumer helper: run a handler for every tick until the ticker closes.
 */

import { getErrorMessage } from "@metronome/errors";
import { PACKAGE_NAME } from "./constants.js";
import type { Ticker } from "./ticker.js";
import type { Tick, WarningHandler } from "./types.js";

export type TickHandler = (tick: Tick) => void | Promise<void>;

export interface ForEachTickOptions {
  /** Receives a warning when the handler throws (default: console.warn) */
  readonly onWarning?: WarningHandler;
}

export interface ForEachTickResult {
  readonly handled: number;
  readonly failed: number;
}

/**
 * Await `handler` for each tick, one at a time. A throwing handler is
 * reported through `onWarning` and consumption continues. Resolves when the
 * output stream ends.
 */
export async function forEachTick(
  ticker: Ticker,
  handler: TickHandler,
  options: ForEachTickOptions = {},
): Promise<ForEachTickResult> {
  const warn =
    options.onWarning ?? ((message: string) => console.warn(`[${PACKAGE_NAME}] ${message}`));
  let handled = 0;
  let failed = 0;

  for await (const tick of ticker.output) {
    try {
      await handler(tick);
      handled++;
    } catch (error) {
      failed++;
      warn(`Ticker "${ticker.name}": tick #${tick.sequence} handler failed: ${getErrorMessage(error)}`);
    }
  }

  return { handled, failed };
}
