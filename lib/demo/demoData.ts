/**
 * Demo dataset resembling a small company's payables:
 * - A steady supplier (Acme) with one bill far above its usual range
 * - The same Office Depot invoice entered twice, two days apart
 * - A round consulting fee with no line items
 * - Recurring hosting charges that are equal but a month apart (not duplicates)
 *
 * Dates are relative to the day the demo runs so every bill lands inside the
 * default 90-day baseline window.
 */

import { subDays } from "date-fns";
import { toIsoDate } from "../analysis/dates";
import { MemoryDetectionStore } from "../store/memoryStore";
import type { Bill, Vendor } from "../types";

export const DEMO_TENANT_ID = "demo-tenant";
export const DEMO_COMPANY_NAME = "Demo Company";

export const DEMO_VENDORS: Vendor[] = [
  "Acme Supplies",
  "TechCorp IT",
  "Office Depot",
  "CloudHost Inc",
  "Consulting LLC",
].map((name, i) => ({
  id: `demo-vendor-${i + 1}`,
  tenantId: DEMO_TENANT_ID,
  externalId: `v${i + 1}`,
  name,
}));

interface DemoBill {
  vendorId: string;
  amount: number;
  daysAgo: number;
  hasLineItems: boolean;
}

const ACME = "demo-vendor-1";
const TECHCORP = "demo-vendor-2";
const OFFICE_DEPOT = "demo-vendor-3";
const CLOUDHOST = "demo-vendor-4";
const CONSULTING = "demo-vendor-5";

const DEMO_BILLS: DemoBill[] = [
  // Acme's usual range, 800 to 1,200
  { vendorId: ACME, amount: 1200, daysAgo: 85, hasLineItems: true },
  { vendorId: ACME, amount: 800, daysAgo: 80, hasLineItems: true },
  { vendorId: ACME, amount: 1000, daysAgo: 75, hasLineItems: true },
  { vendorId: ACME, amount: 1100, daysAgo: 70, hasLineItems: true },
  { vendorId: ACME, amount: 900, daysAgo: 65, hasLineItems: true },
  { vendorId: ACME, amount: 1050, daysAgo: 60, hasLineItems: true },
  { vendorId: ACME, amount: 950, daysAgo: 55, hasLineItems: true },
  { vendorId: ACME, amount: 1150, daysAgo: 50, hasLineItems: true },
  { vendorId: ACME, amount: 850, daysAgo: 45, hasLineItems: true },
  { vendorId: ACME, amount: 1000, daysAgo: 40, hasLineItems: true },
  { vendorId: CLOUDHOST, amount: 290, daysAgo: 75, hasLineItems: true },
  { vendorId: CLOUDHOST, amount: 290, daysAgo: 45, hasLineItems: true },
  { vendorId: CLOUDHOST, amount: 290, daysAgo: 15, hasLineItems: true },
  { vendorId: TECHCORP, amount: 450, daysAgo: 60, hasLineItems: true },
  { vendorId: TECHCORP, amount: 1100, daysAgo: 25, hasLineItems: true },
  { vendorId: OFFICE_DEPOT, amount: 750, daysAgo: 30, hasLineItems: true },
  { vendorId: OFFICE_DEPOT, amount: 750, daysAgo: 28, hasLineItems: true },
  { vendorId: ACME, amount: 4800, daysAgo: 20, hasLineItems: true },
  { vendorId: CONSULTING, amount: 5000, daysAgo: 10, hasLineItems: false },
];

export function buildDemoBills(today: Date): Bill[] {
  return DEMO_BILLS.map((spec, i) => ({
    id: `demo-bill-${i + 1}`,
    tenantId: DEMO_TENANT_ID,
    vendorId: spec.vendorId,
    externalId: `bill-demo-${i + 1}`,
    billNumber: `INV-${1000 + i}`,
    totalAmount: spec.amount,
    txnDate: toIsoDate(subDays(today, spec.daysAgo)),
    hasLineItems: spec.hasLineItems,
  }));
}

export function createDemoStore(today: Date = new Date()): MemoryDetectionStore {
  return new MemoryDetectionStore({
    vendors: DEMO_VENDORS,
    bills: buildDemoBills(today),
  });
}
