import type { DetectionStore } from "../store/types";

export interface TenantSummary {
  tenantId: string;
  vendorCount: number;
  billCount: number;
  anomalyCount: number;
  /** Each flagged bill counted once, however many anomalies it has */
  totalAnomalyAmount: number;
  alertWorthyCount: number;
}

export async function summarizeTenant(
  store: DetectionStore,
  tenantId: string
): Promise<TenantSummary> {
  const [vendors, bills, anomalies] = await Promise.all([
    store.listVendors(tenantId),
    store.listBills(tenantId),
    store.listAnomalies(tenantId),
  ]);

  const flaggedBillIds = new Set(
    anomalies.map((a) => a.billId).filter((id): id is string => id !== null)
  );
  const totalAnomalyAmount = bills
    .filter((b) => flaggedBillIds.has(b.id))
    .reduce((sum, b) => sum + b.totalAmount, 0);

  return {
    tenantId,
    vendorCount: vendors.length,
    billCount: bills.length,
    anomalyCount: anomalies.length,
    totalAnomalyAmount,
    alertWorthyCount: anomalies.filter((a) => a.shouldAlert).length,
  };
}
