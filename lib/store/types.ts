import type {
  Anomaly,
  AnomalyKind,
  AnomalyStatus,
  Bill,
  NewAnomaly,
  Vendor,
  VendorBaseline,
  VendorBaselineInput,
} from "../types";

export interface AnomalyFilter {
  status?: AnomalyStatus;
  kind?: AnomalyKind;
  billId?: string;
  shouldAlert?: boolean;
  limit?: number;
  offset?: number;
}

export interface AnomalyPatch {
  status: AnomalyStatus;
  resolutionNotes?: string | null;
}

/**
 * Everything the detection engine reads and writes. Implementations must
 * enforce uniqueness of (tenantId, billId, kind) for anomalies and of
 * (vendorId, windowStart, windowEnd) for baselines.
 */
export interface DetectionStore {
  listVendors(tenantId: string): Promise<Vendor[]>;
  listBills(tenantId: string): Promise<Bill[]>;

  upsertBaseline(input: VendorBaselineInput): Promise<VendorBaseline>;
  listBaselines(vendorId: string): Promise<VendorBaseline[]>;

  /** Newest first. */
  listAnomalies(tenantId: string, filter?: AnomalyFilter): Promise<Anomaly[]>;
  getAnomaly(tenantId: string, anomalyId: string): Promise<Anomaly | null>;

  /**
   * Insert-or-skip. Resolves to null when an anomaly for the same
   * (tenantId, billId, kind) already exists.
   */
  insertAnomaly(input: NewAnomaly): Promise<Anomaly | null>;

  updateAnomaly(tenantId: string, anomalyId: string, patch: AnomalyPatch): Promise<Anomaly | null>;

  /** Writes made through `tx` become visible only if `fn` resolves. */
  transaction<T>(fn: (tx: DetectionStore) => Promise<T>): Promise<T>;
}
