import type { DetectionConfig } from "../config";
import { DetectionRunError } from "../errors";
import { consoleLogger, type DetectionLogger } from "../logger";
import type { DetectionStore } from "../store/types";
import type { AnomalyKind } from "../types";
import { computeBaselines } from "./baselines";
import { DETECTORS } from "./detectors";
import type { DetectionContext, DetectionStage, DetectionSummary, Detector } from "./types";

export interface DetectionDeps {
  store: DetectionStore;
  config: DetectionConfig;
  log?: DetectionLogger;
  now?: () => Date; // For testing
  detectors?: readonly Detector[];
}

function emptyCounts(): Record<AnomalyKind, number> {
  return { duplicate: 0, price_creep: 0, round_number: 0 };
}

/**
 * One detection pass for one tenant:
 * start -> baselines_computed -> duplicates_checked -> outliers_checked
 *       -> round_numbers_checked -> done
 *
 * Everything runs inside a single store transaction, so a failure anywhere
 * leaves neither baselines nor anomalies from this run behind.
 */
export async function executeDetection(
  deps: DetectionDeps,
  tenantId: string
): Promise<DetectionSummary> {
  const log = deps.log ?? consoleLogger;
  const detectors = deps.detectors ?? DETECTORS;
  const today = deps.now ? deps.now() : new Date();
  const startedAt = Date.now();

  const stages: DetectionStage[] = ["start"];
  const countsByKind = emptyCounts();
  const advance = (stage: DetectionStage) => {
    stages.push(stage);
    log.info(`[detection] tenant=${tenantId} stage=${stage}`);
  };

  let baselinesComputed = 0;

  try {
    await deps.store.transaction(async (tx) => {
      const bills = await tx.listBills(tenantId);
      const baselines = await computeBaselines(tx, tenantId, deps.config, today, bills);
      baselinesComputed = baselines.length;
      advance("baselines_computed");

      const ctx: DetectionContext = {
        tenantId,
        store: tx,
        config: deps.config,
        bills,
        baselines,
        log,
      };

      for (const detector of detectors) {
        const created = await detector.detect(ctx);
        countsByKind[detector.kind] += created;
        advance(detector.completes);
      }
    });
  } catch (error) {
    const lastStage = stages[stages.length - 1];
    log.error(`[detection] tenant=${tenantId} failed after stage=${lastStage}:`, error);
    throw new DetectionRunError({ tenantId, stage: lastStage, cause: error });
  }

  advance("done");

  const newAnomalyCount = Object.values(countsByKind).reduce((sum, n) => sum + n, 0);
  log.info(
    `[detection] tenant=${tenantId} new anomalies=${newAnomalyCount} ` +
      `(duplicate=${countsByKind.duplicate}, price_creep=${countsByKind.price_creep}, ` +
      `round_number=${countsByKind.round_number})`
  );

  return {
    tenantId,
    newAnomalyCount,
    countsByKind,
    baselinesComputed,
    stages,
    durationMs: Date.now() - startedAt,
  };
}

/** Resolves to the number of anomalies this run created. */
export async function runDetection(deps: DetectionDeps, tenantId: string): Promise<number> {
  const summary = await executeDetection(deps, tenantId);
  return summary.newAnomalyCount;
}
