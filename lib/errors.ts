import type { AnomalyStatus } from "./types";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Raised when a detection run aborts. The run's writes are rolled back before
 * this reaches the caller. `stage` is the last stage the run completed.
 */
export class DetectionRunError extends Error {
  public readonly tenantId: string;
  public readonly stage: string;

  constructor(opts: { tenantId: string; stage: string; cause: unknown }) {
    const reason = opts.cause instanceof Error ? opts.cause.message : String(opts.cause);
    super(`Detection run for tenant ${opts.tenantId} failed after stage ${opts.stage}: ${reason}`, {
      cause: opts.cause,
    });
    this.name = "DetectionRunError";
    this.tenantId = opts.tenantId;
    this.stage = opts.stage;
  }
}

export class AnomalyNotFoundError extends Error {
  constructor(public readonly anomalyId: string) {
    super(`Anomaly not found: ${anomalyId}`);
    this.name = "AnomalyNotFoundError";
  }
}

export class InvalidReviewError extends Error {
  constructor(message: string, public readonly status?: AnomalyStatus | string) {
    super(message);
    this.name = "InvalidReviewError";
  }
}
