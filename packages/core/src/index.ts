/**
 * @metronome/core
 *
 * Shared runtime primitives for the Metronome packages: the injectable clock
 * contract and cancellation scopes.
 */

export const PACKAGE_NAME = "@metronome/core" as const;

export { type CancelListener, CancellationScope } from "./cancellation.js";
export type { Clock, TimerHandle } from "./clock-types.js";
