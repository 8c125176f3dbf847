/**
 * Price Outlier Detector
 *
 * Flags bills priced well above their vendor's historical norm.
 *
 * Rules:
 * - Uses the baselines computed earlier in the same run
 * - Baselines with a zero or missing standard deviation are skipped
 *   (not enough spread in the history to judge)
 * - threshold = mean + sigma * stdDev; a bill must be strictly above it
 * - z >= 3 is high severity, anything else medium
 */

import type { Severity } from "../../types";
import { formatMoney } from "../format";
import type { DetectionContext, Detector } from "../types";

const HIGH_Z_SCORE = 3;
const MAX_CONFIDENCE = 0.99;

export function outlierSeverity(zScore: number): Severity {
  return zScore >= HIGH_Z_SCORE ? "high" : "medium";
}

/** Grows with z, capped below certainty */
export function outlierConfidence(zScore: number): number {
  return Math.min(MAX_CONFIDENCE, 0.5 + zScore / 10);
}

export async function detectPriceOutliers(ctx: DetectionContext): Promise<number> {
  const { tenantId, store, config } = ctx;
  const sigma = config.alertSigmaThreshold;
  let created = 0;

  for (const baseline of ctx.baselines) {
    const stdDev = baseline.stdDevAmount;
    if (stdDev === null || stdDev <= 0) continue;

    const mean = baseline.meanAmount;
    const threshold = mean + sigma * stdDev;

    const outliers = ctx.bills.filter(
      (b) => b.vendorId === baseline.vendorId && b.totalAmount > threshold
    );

    for (const bill of outliers) {
      const amount = bill.totalAmount;
      const zScore = (amount - mean) / stdDev;

      const inserted = await store.insertAnomaly({
        tenantId,
        billId: bill.id,
        kind: "price_creep",
        severity: outlierSeverity(zScore),
        amount,
        confidence: outlierConfidence(zScore),
        description: `Amount ${formatMoney(amount)} is ${zScore.toFixed(1)}σ above vendor baseline (${formatMoney(mean)})`,
        metadata: {
          kind: "price_creep",
          zScore,
          baselineMean: mean,
          baselineStdDev: stdDev,
        },
        shouldAlert: amount >= config.alertMinAmount || zScore >= sigma,
      });
      if (inserted) created++;
    }
  }

  return created;
}

export const priceOutlierDetector: Detector = {
  kind: "price_creep",
  completes: "outliers_checked",
  detect: detectPriceOutliers,
};
