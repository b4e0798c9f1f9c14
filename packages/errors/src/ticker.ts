/**
 * Ticker lifecycle errors
 *
 * Abstract base: TickerError
 * Concrete:
 *   - TickerConfigurationError (TICKER_CONFIGURATION_INVALID)
 *   - TickerClosedError (TICKER_CLOSED)
 */

import { MetronomeError } from "./base.js";
import type { ValidationIssue } from "./types.js";

// ---------------------------------------------------------------------------
// Abstract Base
// ---------------------------------------------------------------------------

/**
 * Abstract base class for ticker errors.
 *
 * Enables generic catch: `if (e instanceof TickerError)`
 * while specific subclasses allow precise handling.
 */
export abstract class TickerError extends MetronomeError {}

// ---------------------------------------------------------------------------
// Configuration invalid
// ---------------------------------------------------------------------------

/**
 * Thrown synchronously when a ticker is constructed (or reset) with an
 * invalid interval, a missing parent scope, or malformed options.
 * Not meant to be caught and retried: fix the arguments.
 */
export class TickerConfigurationError extends TickerError {
  readonly _tag = "ValidationError" as const;
  declare readonly code: "TICKER_CONFIGURATION_INVALID";
  readonly issues: readonly ValidationIssue[];

  constructor(message: string, issues: readonly ValidationIssue[] = []) {
    super("TICKER_CONFIGURATION_INVALID", `Invalid ticker configuration: ${message}`);
    this.issues = issues;
  }
}

// ---------------------------------------------------------------------------
// Closed
// ---------------------------------------------------------------------------

/**
 * Raised by reset/stop/close once the ticker has been retired.
 * Expected condition: treat it as "already gone".
 */
export class TickerClosedError extends TickerError {
  readonly _tag = "ConflictError" as const;
  declare readonly code: "TICKER_CLOSED";
  readonly tickerName: string;

  constructor(tickerName: string) {
    super("TICKER_CLOSED", `Ticker "${tickerName}" already closed`, {
      metadata: { tickerName },
    });
    this.tickerName = tickerName;
  }
}
