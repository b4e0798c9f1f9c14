/**
 * A periodic emitter that can be reset, paused and retired.
 *
 * Every state transition runs on one async control loop. Callers never touch
 * the timer: `reset()` queues a request and wakes the loop, the timer callback
 * only records that it fired, and cancellation of the lifecycle scope wakes
 * the loop so it can exit. Each pass the loop handles exactly one input, by
 * priority: cancellation, then a reset request, then a recorded fire.
 */

import { CancellationScope, type TimerHandle } from "@metronome/core";
import { getErrorMessage, TickerClosedError, TickerConfigurationError } from "@metronome/errors";
import { clampInterval, resolveTickerConfig, validateResetInterval } from "./config.js";
import { MAX_TIMER_DELAY_MS, PACKAGE_NAME } from "./constants.js";
import { WakeGate } from "./gate.js";
import { HandoffChannel } from "./handoff.js";
import { Latch } from "./latch.js";
import type {
  ParentScope,
  ResolvedTickerConfig,
  Tick,
  TickChannel,
  TickerConfig,
  TickerOptions,
  TickerStatus,
} from "./types.js";

type LoopState =
  | {
      readonly kind: "active";
      readonly intervalMs: number;
      readonly generation: number;
      readonly timer: TimerHandle;
    }
  | { readonly kind: "paused"; readonly intervalMs: number }
  | { readonly kind: "terminated"; readonly intervalMs: number };

interface ResetRequest {
  readonly intervalMs: number;
  readonly accept: () => void;
  readonly discard: (error: unknown) => void;
}

export class Ticker implements AsyncIterable<Tick> {
  readonly name: string;
  /** Tick stream. Ends (without error) once the ticker is closed. */
  readonly output: TickChannel;

  private readonly _channel = new HandoffChannel<Tick>();
  private readonly _config: ResolvedTickerConfig;
  private readonly _scope: CancellationScope;
  private readonly _gate = new WakeGate();
  private readonly _exited = new Latch();
  private readonly _resets: ResetRequest[] = [];
  private _state: LoopState;
  private _generation = 0;
  private _pendingFireAt: number | undefined;
  private _ticksDelivered = 0;
  private _retirement: Promise<void> | undefined;

  /**
   * @throws {TickerConfigurationError} for a non-positive interval or invalid options
   */
  constructor(config: TickerConfig) {
    this._config = resolveTickerConfig(config);
    this.name = this._config.name;
    const intervalMs = clampInterval(this._config.intervalMs, this.name, this._config.onWarning);

    this.output = this._channel.readSide();
    this._scope = deriveScope(this._config.parent);
    this._scope.onCancel(() => {
      this._gate.open();
    });

    this._state = { kind: "paused", intervalMs };
    this._arm(intervalMs);
    this._run().catch((error: unknown) => {
      console.error(
        `[${PACKAGE_NAME}] Ticker "${this.name}": control loop failed: ${getErrorMessage(error)}`,
      );
    });
  }

  // ---------------------------------------------------------------------------
  // Public API
  // ---------------------------------------------------------------------------

  /**
   * Change the interval. The countdown restarts from now; a fired but
   * undelivered tick is discarded. Zero or negative pauses the ticker.
   * Resolves once the control loop has taken the request.
   *
   * @throws {TickerClosedError} if the ticker is, or becomes, closed first
   * @throws {TickerConfigurationError} for NaN or infinite intervals
   */
  async reset(intervalMs: number): Promise<void> {
    if (this._scope.isCancelled) {
      throw new TickerClosedError(this.name);
    }
    const validated = validateResetInterval(intervalMs);
    const effective =
      validated > 0 ? clampInterval(validated, this.name, this._config.onWarning) : validated;

    return new Promise<void>((resolve, reject) => {
      this._resets.push({ intervalMs: effective, accept: resolve, discard: reject });
      this._gate.open();
    });
  }

  /**
   * Pause the ticker; same as `reset(0)`. The output stays open.
   */
  stop(): Promise<void> {
    return this.reset(0);
  }

  /**
   * Retire the ticker: cancel, wait for the control loop to exit, end the
   * output stream and release the timer. Runs once; every later or
   * concurrent call rejects with TickerClosedError after that run finishes.
   */
  close(): Promise<void> {
    if (this._retirement !== undefined) {
      return this._retirement.then(() => {
        throw new TickerClosedError(this.name);
      });
    }
    this._retirement = this._retire();
    return this._retirement;
  }

  /**
   * Whether the lifecycle scope has fired. Loop exit and stream closure
   * follow shortly after; use `wait()` to observe them.
   */
  isClosed(): boolean {
    return this._scope.isCancelled;
  }

  /**
   * Resolves once the control loop has exited. Never rejects.
   */
  wait(): Promise<void> {
    return this._exited.wait();
  }

  status(): TickerStatus {
    return {
      state: this._state.kind,
      intervalMs: this._state.intervalMs,
      ticksDelivered: this._ticksDelivered,
      closed: this.isClosed(),
    };
  }

  [Symbol.asyncIterator](): AsyncIterator<Tick, undefined> {
    return this._channel[Symbol.asyncIterator]();
  }

  // ---------------------------------------------------------------------------
  // Control loop
  // ---------------------------------------------------------------------------

  private async _run(): Promise<void> {
    try {
      for (;;) {
        if (this._scope.isCancelled) return;

        const request = this._resets.shift();
        if (request !== undefined) {
          try {
            this._applyReset(request.intervalMs);
          } catch (error) {
            request.discard(error);
            throw error;
          }
          request.accept();
          continue;
        }

        const firedAt = this._pendingFireAt;
        if (firedAt !== undefined && this._state.kind === "active") {
          this._pendingFireAt = undefined;
          const intervalMs = this._state.intervalMs;
          const tick: Tick = {
            timestamp: firedAt,
            sequence: this._ticksDelivered + 1,
            intervalMs,
          };
          const delivered = await this._channel.send(tick, this._scope);
          if (!delivered) return;
          this._ticksDelivered = tick.sequence;
          this._arm(intervalMs);
          continue;
        }

        await this._gate.wait();
      }
    } finally {
      this._terminate();
      this._exited.release();
      this._retirement ??= this._retire();
    }
  }

  private _applyReset(intervalMs: number): void {
    this._disarm();
    if (intervalMs > 0) {
      this._arm(intervalMs);
      return;
    }
    this._state = { kind: "paused", intervalMs: this._state.intervalMs };
  }

  private _arm(intervalMs: number): void {
    const generation = ++this._generation;
    const timer = this._schedule(generation, intervalMs);
    this._state = { kind: "active", intervalMs, generation, timer };
  }

  /** Host timers cap a single delay, so long intervals run as a chain of segments. */
  private _schedule(generation: number, remainingMs: number): TimerHandle {
    const segmentMs = Math.min(remainingMs, MAX_TIMER_DELAY_MS);
    return this._config.clock.setTimeout(() => {
      this._onTimer(generation, remainingMs - segmentMs);
    }, segmentMs);
  }

  private _onTimer(generation: number, remainingMs: number): void {
    const state = this._state;
    if (state.kind !== "active" || state.generation !== generation) return;

    if (remainingMs > 0) {
      this._state = { ...state, timer: this._schedule(generation, remainingMs) };
      return;
    }
    this._pendingFireAt = this._config.clock.now();
    this._gate.open();
  }

  /** Clear the armed timer and drop any fire not yet delivered. */
  private _disarm(): void {
    if (this._state.kind === "active") {
      this._config.clock.clearTimeout(this._state.timer);
      this._state = { kind: "paused", intervalMs: this._state.intervalMs };
    }
    this._pendingFireAt = undefined;
  }

  private _terminate(): void {
    this._disarm();
    this._state = { kind: "terminated", intervalMs: this._state.intervalMs };
    for (const request of this._resets.splice(0)) {
      request.discard(new TickerClosedError(this.name));
    }
  }

  private async _retire(): Promise<void> {
    this._scope.cancel();
    await this._exited.wait();
    this._channel.close();
    this._disarm();
  }
}

function deriveScope(parent: ParentScope | undefined): CancellationScope {
  if (parent === undefined) return new CancellationScope();
  if (parent instanceof AbortSignal) return CancellationScope.fromSignal(parent);
  return parent.child();
}

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

/**
 * Create a ticker retired by `parent` as well as by `close()`.
 *
 * @throws {TickerConfigurationError} if `parent` is missing or `intervalMs <= 0`
 */
export function createTickerWithScope(
  parent: ParentScope,
  intervalMs: number,
  options: TickerOptions = {},
): Ticker {
  if (!(parent instanceof CancellationScope) && !(parent instanceof AbortSignal)) {
    throw new TickerConfigurationError("a parent CancellationScope or AbortSignal is required", [
      { field: "parent", message: "is required", code: "missing_parent" },
    ]);
  }
  return new Ticker({ ...options, intervalMs, parent });
}

/**
 * Create a ticker with a detached lifecycle; only `close()` retires it.
 *
 * @throws {TickerConfigurationError} if `intervalMs <= 0`
 */
export function createTicker(intervalMs: number, options: TickerOptions = {}): Ticker {
  return new Ticker({ ...options, intervalMs });
}
