/**
 * Review-side helpers over persisted anomalies: listing, status changes and
 * the alert-candidate query the notifier consumes. Detection runs never call
 * these.
 */

import { AnomalyNotFoundError, InvalidReviewError } from "../errors";
import type { DetectionStore } from "../store/types";
import type { Anomaly, AnomalyStatus } from "../types";

export const ANOMALY_STATUSES: readonly AnomalyStatus[] = ["open", "acknowledged", "dismissed"];
export const MAX_PAGE_SIZE = 500;
export const DEFAULT_PAGE_SIZE = 100;
export const MAX_RESOLUTION_NOTES_LENGTH = 2000;
export const ALERT_BATCH_LIMIT = 50;

export type StatusFilter = AnomalyStatus | "all";

export interface ListAnomaliesOptions {
  status?: StatusFilter;
  limit?: number;
  offset?: number;
}

export interface ReviewInput {
  status: string;
  resolutionNotes?: string | null;
}

export function isAnomalyStatus(value: string): value is AnomalyStatus {
  return ANOMALY_STATUSES.some((s) => s === value);
}

export async function listTenantAnomalies(
  store: DetectionStore,
  tenantId: string,
  options: ListAnomaliesOptions = {}
): Promise<Anomaly[]> {
  const status = options.status ?? "open";
  const limit = options.limit ?? DEFAULT_PAGE_SIZE;
  const offset = options.offset ?? 0;

  if (status !== "all" && !isAnomalyStatus(status)) {
    throw new InvalidReviewError(
      "status must be one of: open, acknowledged, dismissed, all",
      status
    );
  }
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_PAGE_SIZE) {
    throw new InvalidReviewError(`limit must be between 1 and ${MAX_PAGE_SIZE}`);
  }
  if (!Number.isInteger(offset) || offset < 0) {
    throw new InvalidReviewError("offset must be a non-negative integer");
  }

  return store.listAnomalies(tenantId, {
    status: status === "all" ? undefined : status,
    limit,
    offset,
  });
}

/**
 * Moves an anomaly to a new status (user action). Notes are kept as-is when
 * omitted, cleared when null.
 */
export async function reviewAnomaly(
  store: DetectionStore,
  tenantId: string,
  anomalyId: string,
  input: ReviewInput
): Promise<Anomaly> {
  if (!isAnomalyStatus(input.status)) {
    throw new InvalidReviewError(
      "status must be one of: open, acknowledged, dismissed",
      input.status
    );
  }
  const notes = input.resolutionNotes;
  if (typeof notes === "string" && notes.length > MAX_RESOLUTION_NOTES_LENGTH) {
    throw new InvalidReviewError(
      `resolutionNotes must be at most ${MAX_RESOLUTION_NOTES_LENGTH} characters`
    );
  }

  const updated = await store.updateAnomaly(tenantId, anomalyId, {
    status: input.status,
    resolutionNotes: notes,
  });
  if (!updated) {
    throw new AnomalyNotFoundError(anomalyId);
  }
  return updated;
}

/** Open, alert-worthy anomalies, newest first. */
export async function listAlertCandidates(
  store: DetectionStore,
  tenantId: string,
  limit: number = ALERT_BATCH_LIMIT
): Promise<Anomaly[]> {
  return store.listAnomalies(tenantId, { status: "open", shouldAlert: true, limit });
}
