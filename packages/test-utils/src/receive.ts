/**
 * Bounded reads from a channel, the test-side equivalent of racing a
 * receive against a timeout. The abandoned read is withdrawn from the
 * channel, so it cannot swallow a later value.
 */

import type { ReadChannel } from "@metronome/ticker";

export type ReceiveOutcome<T> =
  | { readonly kind: "value"; readonly value: T }
  | { readonly kind: "closed" }
  | { readonly kind: "timeout" };

/**
 * Receive one value, giving up after `ms` of real time.
 */
export async function receiveWithin<T>(
  channel: ReadChannel<T>,
  ms: number,
): Promise<ReceiveOutcome<T>> {
  const controller = new AbortController();
  const timer = globalThis.setTimeout(() => {
    controller.abort();
  }, ms);

  try {
    const result = await channel.receive({ signal: controller.signal });
    return result.done ? { kind: "closed" } : { kind: "value", value: result.value };
  } catch (error) {
    if (controller.signal.aborted) return { kind: "timeout" };
    throw error;
  } finally {
    globalThis.clearTimeout(timer);
  }
}

/**
 * Drain a channel until it closes, collecting every value.
 */
export async function collect<T>(channel: ReadChannel<T>): Promise<T[]> {
  const values: T[] = [];
  for await (const value of channel) {
    values.push(value);
  }
  return values;
}
