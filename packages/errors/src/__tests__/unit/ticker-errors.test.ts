import { describe, expect, it } from "vitest";
import {
  isConflictError,
  isExpectedError,
  isValidationError,
  MetronomeError,
  TickerClosedError,
  TickerConfigurationError,
  TickerError,
} from "../../index.js";

describe("TickerClosedError", () => {
  it("should carry catalog properties", () => {
    const error = new TickerClosedError("poller");

    expect(error).toBeInstanceOf(TickerError);
    expect(error).toBeInstanceOf(MetronomeError);
    expect(error.name).toBe("TickerClosedError");
    expect(error.message).toBe('Ticker "poller" already closed');
    expect(error._tag).toBe("ConflictError");
    expect(error.code).toBe("TICKER_CLOSED");
    expect(error.httpStatus).toBe(409);
    expect(error.grpcCode).toBe("FAILED_PRECONDITION");
    expect(error.domain).toBe("ticker");
    expect(error.tickerName).toBe("poller");
    expect(error.metadata).toEqual({ tickerName: "poller" });
  });

  it("should be an expected conflict", () => {
    const error = new TickerClosedError("t");

    expect(isConflictError(error)).toBe(true);
    expect(isExpectedError(error)).toBe(true);
  });
});

describe("TickerConfigurationError", () => {
  it("should prefix the message and keep issues", () => {
    const issues = [{ field: "intervalMs", message: "must be positive", code: "too_small" }];
    const error = new TickerConfigurationError("intervalMs must be positive", issues);

    expect(error.message).toBe("Invalid ticker configuration: intervalMs must be positive");
    expect(error._tag).toBe("ValidationError");
    expect(error.code).toBe("TICKER_CONFIGURATION_INVALID");
    expect(error.httpStatus).toBe(400);
    expect(error.issues).toEqual(issues);
  });

  it("should be a validation fault, not an expected condition", () => {
    const error = new TickerConfigurationError("bad");

    expect(isValidationError(error)).toBe(true);
    expect(isExpectedError(error)).toBe(false);
    expect(error.issues).toEqual([]);
  });
});
