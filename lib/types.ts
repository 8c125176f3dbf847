export type AnomalyKind = "duplicate" | "price_creep" | "round_number";
export type Severity = "high" | "medium" | "low";
export type AnomalyStatus = "open" | "acknowledged" | "dismissed";

// Calendar dates travel as ISO strings (yyyy-MM-dd)
export type IsoDate = string;

export interface Vendor {
  id: string;
  tenantId: string;
  externalId: string;
  name: string;
}

export interface Bill {
  id: string;
  tenantId: string;
  vendorId: string;
  externalId: string; // unique per tenant
  billNumber: string | null;
  totalAmount: number;
  txnDate: IsoDate;
  hasLineItems: boolean;
}

export interface VendorBaseline {
  id: string;
  vendorId: string;
  windowStart: IsoDate;
  windowEnd: IsoDate;
  sampleCount: number;
  meanAmount: number;
  stdDevAmount: number | null;
  minAmount: number;
  maxAmount: number;
}

export type VendorBaselineInput = Omit<VendorBaseline, "id">;

export interface DuplicateMetadata {
  kind: "duplicate";
  relatedBillId: string;
  duplicateOfBillId: string;
  dayGap: number;
}

export interface PriceCreepMetadata {
  kind: "price_creep";
  zScore: number;
  baselineMean: number;
  baselineStdDev: number;
}

export interface RoundNumberMetadata {
  kind: "round_number";
  roundValue: number;
}

export type AnomalyMetadata = DuplicateMetadata | PriceCreepMetadata | RoundNumberMetadata;

export interface Anomaly {
  id: string;
  tenantId: string;
  billId: string | null;
  kind: AnomalyKind;
  severity: Severity;
  amount: number;
  confidence: number; // 0.0–1.0
  description: string;
  metadata: AnomalyMetadata;
  shouldAlert: boolean;
  status: AnomalyStatus;
  resolutionNotes: string | null;
  createdAt: Date;
  updatedAt: Date | null;
}

/** What a detector hands to the store; ids, status and timestamps are assigned on insert. */
export type NewAnomaly = Omit<Anomaly, "id" | "status" | "resolutionNotes" | "createdAt" | "updatedAt">;
