/**
 * Round Number Detector
 *
 * Flags suspiciously round totals entered without line-item detail, a common
 * sign of an estimate or a data-entry shortcut.
 *
 * Rules:
 * - Bill has no known line items
 * - Amount >= alertMinAmount
 * - Amount is an exact multiple of 500 (500, 1,000, 1,500, 7,500, ...)
 */

import { formatWholeMoney } from "../format";
import type { DetectionContext, Detector } from "../types";

const ROUND_UNIT = 500;
const ROUND_NUMBER_CONFIDENCE = 0.6;

export function isRoundAmount(amount: number): boolean {
  return amount % ROUND_UNIT === 0;
}

export async function detectRoundNumbers(ctx: DetectionContext): Promise<number> {
  const { tenantId, store, config } = ctx;
  let created = 0;

  for (const bill of ctx.bills) {
    if (bill.hasLineItems) continue;

    const amount = bill.totalAmount;
    if (amount < config.alertMinAmount) continue;
    if (!isRoundAmount(amount)) continue;

    const inserted = await store.insertAnomaly({
      tenantId,
      billId: bill.id,
      kind: "round_number",
      severity: "low",
      amount,
      confidence: ROUND_NUMBER_CONFIDENCE,
      description: `Round number ($${formatWholeMoney(amount)}) with no line-item detail; verify against the source invoice`,
      metadata: { kind: "round_number", roundValue: amount },
      shouldAlert: amount >= config.alertMinAmount,
    });
    if (inserted) created++;
  }

  return created;
}

export const roundNumberDetector: Detector = {
  kind: "round_number",
  completes: "round_numbers_checked",
  detect: detectRoundNumbers,
};
