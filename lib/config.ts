import { ConfigError } from "./errors";

export interface DetectionConfig {
  /** Smallest bill amount worth notifying a human about */
  alertMinAmount: number;
  /** Standard deviations above the vendor mean before a bill counts as an outlier */
  alertSigmaThreshold: number;
  /** Max days between two same-vendor, same-amount bills for them to count as duplicates */
  duplicateDayWindow: number;
  /** Length of the trailing window the vendor baselines cover */
  baselineDays: number;
}

export const DEFAULT_DETECTION_CONFIG: DetectionConfig = {
  alertMinAmount: 500,
  alertSigmaThreshold: 2.0,
  duplicateDayWindow: 7,
  baselineDays: 90,
};

type Env = Record<string, string | undefined>;

function readNumber(
  env: Env,
  name: string,
  fallback: number,
  { integer = false }: { integer?: boolean } = {}
): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigError(`${name} must be a non-negative number, got "${raw}"`);
  }
  if (integer && !Number.isInteger(value)) {
    throw new ConfigError(`${name} must be a whole number of days, got "${raw}"`);
  }
  return value;
}

export function loadDetectionConfig(env: Env = process.env): DetectionConfig {
  return {
    alertMinAmount: readNumber(env, "ALERT_MIN_AMOUNT", DEFAULT_DETECTION_CONFIG.alertMinAmount),
    alertSigmaThreshold: readNumber(
      env,
      "ALERT_SIGMA_THRESHOLD",
      DEFAULT_DETECTION_CONFIG.alertSigmaThreshold
    ),
    duplicateDayWindow: readNumber(
      env,
      "DUPLICATE_DAY_WINDOW",
      DEFAULT_DETECTION_CONFIG.duplicateDayWindow,
      { integer: true }
    ),
    baselineDays: readNumber(env, "BASELINE_DAYS", DEFAULT_DETECTION_CONFIG.baselineDays, {
      integer: true,
    }),
  };
}
