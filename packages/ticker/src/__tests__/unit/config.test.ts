import { CancellationScope } from "@metronome/core";
import { TickerConfigurationError } from "@metronome/errors";
import { FakeClock } from "@metronome/test-utils";
import { describe, expect, it, vi } from "vitest";
import { defaultClock } from "../../clock.js";
import { clampInterval, resolveTickerConfig, validateResetInterval } from "../../config.js";
import { DEFAULT_TICKER_NAME } from "../../constants.js";

describe("resolveTickerConfig", () => {
  it("applies defaults", () => {
    const config = resolveTickerConfig({ intervalMs: 100 });

    expect(config.intervalMs).toBe(100);
    expect(config.name).toBe(DEFAULT_TICKER_NAME);
    expect(config.clock).toBe(defaultClock);
    expect(config.parent).toBeUndefined();
  });

  it("keeps provided options", () => {
    const clock = new FakeClock();
    const parent = new CancellationScope();
    const onWarning = vi.fn();

    const config = resolveTickerConfig({ intervalMs: 5, name: "poll", clock, parent, onWarning });

    expect(config.name).toBe("poll");
    expect(config.clock).toBe(clock);
    expect(config.parent).toBe(parent);
    expect(config.onWarning).toBe(onWarning);
  });

  it("logs warnings through console.warn by default", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    resolveTickerConfig({ intervalMs: 1 }).onWarning("slow down");

    expect(warn).toHaveBeenCalledWith("[@metronome/ticker] slow down");
    warn.mockRestore();
  });

  it("reports every invalid field", () => {
    try {
      resolveTickerConfig({ intervalMs: -1, name: "" });
      expect.unreachable("should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(TickerConfigurationError);
      if (!(error instanceof TickerConfigurationError)) return;
      expect(error.message).toBe(
        "Invalid ticker configuration: intervalMs: must be positive; name: must not be empty",
      );
      expect(error.issues.map((issue) => issue.field)).toEqual(["intervalMs", "name"]);
      expect(error.code).toBe("TICKER_CONFIGURATION_INVALID");
    }
  });

  it("rejects a clock missing timer methods", () => {
    const partialClock = { now: () => 0, setTimeout: defaultClock.setTimeout };

    expect(() =>
      Reflect.apply(resolveTickerConfig, undefined, [{ intervalMs: 1, clock: partialClock }]),
    ).toThrow("clock: must implement now, setTimeout and clearTimeout");
  });
});

describe("validateResetInterval", () => {
  it.each([0, -10, 0.25, 5000])("accepts %s", (ms) => {
    expect(validateResetInterval(ms)).toBe(ms);
  });

  it("rejects NaN", () => {
    expect(() => validateResetInterval(Number.NaN)).toThrow(
      "Invalid ticker configuration: intervalMs: must be a number",
    );
  });

  it("rejects infinities", () => {
    expect(() => validateResetInterval(Number.POSITIVE_INFINITY)).toThrow(
      "Invalid ticker configuration: intervalMs: must be finite",
    );
  });
});

describe("clampInterval", () => {
  it("leaves intervals at or above resolution untouched", () => {
    const warn = vi.fn();

    expect(clampInterval(1, "t", warn)).toBe(1);
    expect(clampInterval(250, "t", warn)).toBe(250);
    expect(warn).not.toHaveBeenCalled();
  });

  it("raises sub-millisecond intervals to 1ms with a warning", () => {
    const warn = vi.fn();

    expect(clampInterval(0.1, "t", warn)).toBe(1);
    expect(warn).toHaveBeenCalledWith(
      'Ticker "t": interval 0.1ms is below timer resolution, using 1ms',
    );
  });
});
