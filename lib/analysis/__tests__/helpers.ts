import { DEFAULT_DETECTION_CONFIG, type DetectionConfig } from "../../config";
import { silentLogger } from "../../logger";
import { MemoryDetectionStore } from "../../store/memoryStore";
import type { Bill, Vendor, VendorBaseline } from "../../types";
import type { DetectionContext } from "../types";

export const TENANT = "tenant-1";

export function createVendor(overrides: Partial<Vendor> = {}): Vendor {
  const id = overrides.id ?? "vendor-1";
  return {
    id,
    tenantId: TENANT,
    externalId: `ext-${id}`,
    name: "Acme Supplies",
    ...overrides,
  };
}

export function createBill(overrides: Partial<Bill> = {}): Bill {
  const id = overrides.id ?? "bill-1";
  return {
    id,
    tenantId: TENANT,
    vendorId: "vendor-1",
    externalId: `ext-${id}`,
    billNumber: null,
    totalAmount: 100,
    txnDate: "2024-03-01",
    hasLineItems: true,
    ...overrides,
  };
}

export function createBaseline(overrides: Partial<VendorBaseline> = {}): VendorBaseline {
  return {
    id: "baseline-1",
    vendorId: "vendor-1",
    windowStart: "2024-01-01",
    windowEnd: "2024-03-31",
    sampleCount: 10,
    meanAmount: 1000,
    stdDevAmount: 100,
    minAmount: 800,
    maxAmount: 1200,
    ...overrides,
  };
}

export function makeContext(
  bills: Bill[],
  options: { baselines?: VendorBaseline[]; config?: Partial<DetectionConfig> } = {}
): { ctx: DetectionContext; store: MemoryDetectionStore } {
  const store = new MemoryDetectionStore({ vendors: [createVendor()], bills });
  const ctx: DetectionContext = {
    tenantId: TENANT,
    store,
    config: { ...DEFAULT_DETECTION_CONFIG, ...options.config },
    bills,
    baselines: options.baselines ?? [],
    log: silentLogger,
  };
  return { ctx, store };
}
