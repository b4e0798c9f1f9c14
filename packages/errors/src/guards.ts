/**
 * Type guards for the base error categories + code-level discrimination.
 *
 * Category guards match on `_tag`, so domain errors such as
 * `TickerClosedError` (a `ConflictError` by tag) are matched too.
 */

import { MetronomeError } from "./base.js";
import type { BaseErrorType, ErrorCode } from "./catalog.js";

function hasTag<B extends BaseErrorType>(
  error: unknown,
  tag: B,
): error is MetronomeError & { readonly _tag: B } {
  return error instanceof MetronomeError && error._tag === tag;
}

/** Check if an error is validation-class (bad input, config) */
export function isValidationError(
  error: unknown,
): error is MetronomeError & { readonly _tag: "ValidationError" } {
  return hasTag(error, "ValidationError");
}

/** Check if an error is conflict-class (state conflict, closed resource) */
export function isConflictError(
  error: unknown,
): error is MetronomeError & { readonly _tag: "ConflictError" } {
  return hasTag(error, "ConflictError");
}

/**
 * Check if a MetronomeError has a specific error code.
 * Narrows the type to include the specific code literal.
 */
export function hasCode<C extends ErrorCode>(
  error: MetronomeError,
  code: C,
): error is MetronomeError & { readonly code: C } {
  return error.code === code;
}

/**
 * Check if an error represents an expected condition (4xx-class).
 * Returns false for non-Metronome errors.
 */
export function isExpectedError(error: unknown): boolean {
  return error instanceof MetronomeError && error.isExpected;
}
