/**
 * Duplicate Bill Detector
 *
 * Flags bills that look like a second entry of the same invoice.
 *
 * Rules:
 * - Same vendor + same amount (to the cent)
 * - Transaction dates at most `duplicateDayWindow` days apart
 * - Each pair (A, B) is examined once with A the earlier bill; A is flagged
 *   and B is referenced in the metadata
 * - A bill gets at most one duplicate anomaly: the first qualifying pair wins
 */

import type { Bill, Severity } from "../../types";
import { daysBetween } from "../dates";
import { formatMoney } from "../format";
import type { DetectionContext, Detector } from "../types";

const HIGH_AMOUNT_THRESHOLD = 1000;
const DUPLICATE_CONFIDENCE = 0.95;

function groupKey(bill: Bill): string {
  return `${bill.vendorId}|${Math.round(bill.totalAmount * 100)}`;
}

function byDateThenId(a: Bill, b: Bill): number {
  if (a.txnDate !== b.txnDate) return a.txnDate < b.txnDate ? -1 : 1;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export function duplicateSeverity(amount: number): Severity {
  return amount >= HIGH_AMOUNT_THRESHOLD ? "high" : "medium";
}

export async function detectDuplicateBills(ctx: DetectionContext): Promise<number> {
  const { tenantId, store, config } = ctx;
  const window = config.duplicateDayWindow;

  const groups = new Map<string, Bill[]>();
  for (const bill of ctx.bills) {
    const key = groupKey(bill);
    const group = groups.get(key) ?? [];
    group.push(bill);
    groups.set(key, group);
  }

  let created = 0;
  const flagged = new Set<string>();

  for (const group of groups.values()) {
    if (group.length < 2) continue;

    const sorted = [...group].sort(byDateThenId);

    for (let i = 0; i < sorted.length; i++) {
      for (let j = i + 1; j < sorted.length; j++) {
        const first = sorted[i];
        const second = sorted[j];
        if (flagged.has(first.id)) continue;

        const dayGap = daysBetween(first.txnDate, second.txnDate);
        if (dayGap > window) continue;

        const amount = first.totalAmount;
        const inserted = await store.insertAnomaly({
          tenantId,
          billId: first.id,
          kind: "duplicate",
          severity: duplicateSeverity(amount),
          amount,
          confidence: DUPLICATE_CONFIDENCE,
          description: `Possible duplicate: same vendor and amount (${formatMoney(amount)}) within ${window} days`,
          metadata: {
            kind: "duplicate",
            relatedBillId: second.id,
            duplicateOfBillId: first.id,
            dayGap,
          },
          shouldAlert: amount >= config.alertMinAmount,
        });

        // Either we just flagged it or an earlier run did
        flagged.add(first.id);
        if (inserted) created++;
      }
    }
  }

  return created;
}

export const duplicateDetector: Detector = {
  kind: "duplicate",
  completes: "duplicates_checked",
  detect: detectDuplicateBills,
};
