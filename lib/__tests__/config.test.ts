import { describe, it, expect } from "vitest";
import { DEFAULT_DETECTION_CONFIG, loadDetectionConfig } from "../config";
import { ConfigError } from "../errors";

describe("loadDetectionConfig", () => {
  it("should fall back to defaults when nothing is set", () => {
    expect(loadDetectionConfig({})).toEqual({
      alertMinAmount: 500,
      alertSigmaThreshold: 2.0,
      duplicateDayWindow: 7,
      baselineDays: 90,
    });
    expect(loadDetectionConfig({ ALERT_MIN_AMOUNT: "  " })).toEqual(DEFAULT_DETECTION_CONFIG);
  });

  it("should read overrides from the environment", () => {
    const config = loadDetectionConfig({
      ALERT_MIN_AMOUNT: "250.5",
      ALERT_SIGMA_THRESHOLD: "3",
      DUPLICATE_DAY_WINDOW: "14",
      BASELINE_DAYS: "180",
    });

    expect(config).toEqual({
      alertMinAmount: 250.5,
      alertSigmaThreshold: 3,
      duplicateDayWindow: 14,
      baselineDays: 180,
    });
  });

  it("should reject values that are not non-negative numbers", () => {
    expect(() => loadDetectionConfig({ ALERT_MIN_AMOUNT: "lots" })).toThrow(ConfigError);
    expect(() => loadDetectionConfig({ ALERT_SIGMA_THRESHOLD: "-1" })).toThrow(
      'ALERT_SIGMA_THRESHOLD must be a non-negative number, got "-1"'
    );
  });

  it("should reject fractional day counts", () => {
    expect(() => loadDetectionConfig({ DUPLICATE_DAY_WINDOW: "1.5" })).toThrow(
      'DUPLICATE_DAY_WINDOW must be a whole number of days, got "1.5"'
    );
  });
});
