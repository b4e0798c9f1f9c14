/**
 * Configuration validation and resolution.
 */

import { CancellationScope, type Clock } from "@metronome/core";
import { TickerConfigurationError, type ValidationIssue } from "@metronome/errors";
import { z } from "zod";
import { defaultClock } from "./clock.js";
import { DEFAULT_TICKER_NAME, MIN_TIMER_RESOLUTION_MS, PACKAGE_NAME } from "./constants.js";
import type { ParentScope, ResolvedTickerConfig, TickerConfig, WarningHandler } from "./types.js";

function isClock(value: unknown): value is Clock {
  return (
    typeof value === "object" &&
    value !== null &&
    "now" in value &&
    typeof value.now === "function" &&
    "setTimeout" in value &&
    typeof value.setTimeout === "function" &&
    "clearTimeout" in value &&
    typeof value.clearTimeout === "function"
  );
}

function isParentScope(value: unknown): value is ParentScope {
  return value instanceof CancellationScope || value instanceof AbortSignal;
}

const IntervalSchema = z
  .number({ invalid_type_error: "must be a number" })
  .finite("must be finite");

const TickerConfigSchema = z.object({
  intervalMs: IntervalSchema.positive("must be positive"),
  name: z.string().min(1, "must not be empty").default(DEFAULT_TICKER_NAME),
  clock: z
    .custom<Clock>(isClock, "must implement now, setTimeout and clearTimeout")
    .default(defaultClock),
  onWarning: z
    .custom<WarningHandler>((value) => typeof value === "function", "must be a function")
    .optional(),
  parent: z
    .custom<ParentScope>(isParentScope, "must be a CancellationScope or AbortSignal")
    .optional(),
});

function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.join("."),
    message: issue.message,
    code: issue.code,
  }));
}

function formatIssues(issues: readonly ValidationIssue[]): string {
  return issues.map((issue) => `${issue.field}: ${issue.message}`).join("; ");
}

/**
 * Validates and resolves a {@link TickerConfig} into a fully-resolved config
 * with all defaults applied.
 *
 * @throws {TickerConfigurationError} on invalid input
 */
export function resolveTickerConfig(config: TickerConfig): ResolvedTickerConfig {
  const result = TickerConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = toIssues(result.error);
    throw new TickerConfigurationError(formatIssues(issues), issues);
  }

  const { intervalMs, name, clock, onWarning, parent } = result.data;
  return {
    intervalMs,
    name,
    clock,
    onWarning: onWarning ?? ((message) => console.warn(`[${PACKAGE_NAME}] ${message}`)),
    ...(parent ? { parent } : {}),
  };
}

/**
 * Validates a reset interval. Any finite number is accepted; zero or
 * negative means "pause".
 *
 * @throws {TickerConfigurationError} for NaN, infinities, or non-numbers
 */
export function validateResetInterval(intervalMs: number): number {
  const result = IntervalSchema.safeParse(intervalMs);
  if (!result.success) {
    const issues = toIssues(result.error).map((issue) => ({ ...issue, field: "intervalMs" }));
    throw new TickerConfigurationError(formatIssues(issues), issues);
  }
  return result.data;
}

/**
 * Clamp a positive interval up to the host timer resolution, warning when
 * that changes the value.
 */
export function clampInterval(intervalMs: number, name: string, warn: WarningHandler): number {
  if (intervalMs >= MIN_TIMER_RESOLUTION_MS) return intervalMs;
  warn(
    `Ticker "${name}": interval ${intervalMs}ms is below timer resolution, using ${MIN_TIMER_RESOLUTION_MS}ms`,
  );
  return MIN_TIMER_RESOLUTION_MS;
}
