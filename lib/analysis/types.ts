import type { DetectionConfig } from "../config";
import type { DetectionLogger } from "../logger";
import type { DetectionStore } from "../store/types";
import type { AnomalyKind, Bill, VendorBaseline } from "../types";

export type DetectionStage =
  | "start"
  | "baselines_computed"
  | "duplicates_checked"
  | "outliers_checked"
  | "round_numbers_checked"
  | "done";

/**
 * Everything a detector sees during one run. Bills are loaded once per run;
 * baselines are the ones written by this run's baseline pass.
 */
export interface DetectionContext {
  tenantId: string;
  store: DetectionStore;
  config: DetectionConfig;
  bills: Bill[];
  baselines: VendorBaseline[];
  log: DetectionLogger;
}

export interface Detector {
  kind: AnomalyKind;
  /** Stage reached once this detector has finished */
  completes: DetectionStage;
  /** Resolves to the number of anomalies newly inserted */
  detect(ctx: DetectionContext): Promise<number>;
}

export interface DetectionSummary {
  tenantId: string;
  newAnomalyCount: number;
  countsByKind: Record<AnomalyKind, number>;
  baselinesComputed: number;
  stages: DetectionStage[];
  durationMs: number;
}
