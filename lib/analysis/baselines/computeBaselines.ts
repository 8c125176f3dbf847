/**
 * Vendor Baseline Calculator
 *
 * Builds each vendor's rolling profile of bill amounts over the trailing
 * `baselineDays` window and upserts it by (vendor, windowStart, windowEnd).
 *
 * Rules:
 * - Bills dated within [today - baselineDays, today], both ends inclusive
 * - Vendors with no bills in the window are skipped (no row written)
 * - Re-running for the same day overwrites the same row
 */

import type { DetectionConfig } from "../../config";
import type { DetectionStore } from "../../store/types";
import type { Bill, VendorBaseline } from "../../types";
import { trailingWindow } from "../dates";
import { summarizeAmounts } from "./stats";

export async function computeBaselines(
  store: DetectionStore,
  tenantId: string,
  config: Pick<DetectionConfig, "baselineDays">,
  today: Date,
  bills?: Bill[]
): Promise<VendorBaseline[]> {
  const { start, end } = trailingWindow(today, config.baselineDays);
  const vendors = await store.listVendors(tenantId);
  const tenantBills = bills ?? (await store.listBills(tenantId));

  // Group in-window amounts by vendor
  const amountsByVendor = new Map<string, number[]>();
  for (const bill of tenantBills) {
    if (bill.txnDate < start || bill.txnDate > end) continue;

    const amounts = amountsByVendor.get(bill.vendorId) ?? [];
    amounts.push(bill.totalAmount);
    amountsByVendor.set(bill.vendorId, amounts);
  }

  const baselines: VendorBaseline[] = [];
  for (const vendor of vendors) {
    const stats = summarizeAmounts(amountsByVendor.get(vendor.id) ?? []);
    if (!stats) continue;

    const baseline = await store.upsertBaseline({
      vendorId: vendor.id,
      windowStart: start,
      windowEnd: end,
      sampleCount: stats.count,
      meanAmount: stats.mean,
      stdDevAmount: stats.stdDev,
      minAmount: stats.min,
      maxAmount: stats.max,
    });
    baselines.push(baseline);
  }

  return baselines;
}
