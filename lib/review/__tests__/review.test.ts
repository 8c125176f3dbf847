import { describe, it, expect } from "vitest";
import {
  exportAnomaliesCsv,
  exportFilename,
  isAnomalyStatus,
  listAlertCandidates,
  listTenantAnomalies,
  reviewAnomaly,
  summarizeTenant,
} from "..";
import { AnomalyNotFoundError, InvalidReviewError } from "../../errors";
import { MemoryDetectionStore } from "../../store/memoryStore";
import type { Anomaly, NewAnomaly } from "../../types";

const TENANT = "tenant-1";

function seededStore(): MemoryDetectionStore {
  return new MemoryDetectionStore({
    now: () => new Date(2024, 3, 2, 12, 0, 0),
    vendors: [{ id: "vendor-1", tenantId: TENANT, externalId: "V1", name: "Acme, Inc." }],
    bills: [
      {
        id: "bill-1",
        tenantId: TENANT,
        vendorId: "vendor-1",
        externalId: "B1",
        billNumber: "INV-7",
        totalAmount: 1500,
        txnDate: "2024-03-15",
        hasLineItems: false,
      },
      {
        id: "bill-2",
        tenantId: TENANT,
        vendorId: "vendor-1",
        externalId: "B2",
        billNumber: null,
        totalAmount: 320,
        txnDate: "2024-03-16",
        hasLineItems: true,
      },
    ],
  });
}

function roundNumber(overrides: Partial<NewAnomaly> = {}): NewAnomaly {
  return {
    tenantId: TENANT,
    billId: "bill-1",
    kind: "round_number",
    severity: "low",
    amount: 1500,
    confidence: 0.6,
    description: "Round number ($1,500) with no line-item detail; verify against the source invoice",
    metadata: { kind: "round_number", roundValue: 1500 },
    shouldAlert: true,
    ...overrides,
  };
}

async function insert(store: MemoryDetectionStore, input: NewAnomaly): Promise<Anomaly> {
  const anomaly = await store.insertAnomaly(input);
  if (!anomaly) throw new Error("expected a fresh insert");
  return anomaly;
}

describe("listTenantAnomalies", () => {
  it("should default to open anomalies", async () => {
    const store = seededStore();
    const open = await insert(store, roundNumber());
    const dismissed = await insert(
      store,
      roundNumber({
        billId: "bill-2",
        kind: "duplicate",
        metadata: { kind: "duplicate", relatedBillId: "bill-1", duplicateOfBillId: "bill-2", dayGap: 1 },
      })
    );
    await reviewAnomaly(store, TENANT, dismissed.id, { status: "dismissed" });

    const listed = await listTenantAnomalies(store, TENANT);
    const all = await listTenantAnomalies(store, TENANT, { status: "all" });

    expect(listed.map((a) => a.id)).toEqual([open.id]);
    expect(all).toHaveLength(2);
  });

  it("should reject unknown statuses and out-of-range pages", async () => {
    const store = seededStore();

    await expect(listTenantAnomalies(store, TENANT, { limit: 0 })).rejects.toBeInstanceOf(
      InvalidReviewError
    );
    await expect(listTenantAnomalies(store, TENANT, { limit: 501 })).rejects.toThrow(
      "limit must be between 1 and 500"
    );
    await expect(listTenantAnomalies(store, TENANT, { offset: -1 })).rejects.toThrow(
      "offset must be a non-negative integer"
    );
  });
});

describe("isAnomalyStatus", () => {
  it("should accept the three review states only", () => {
    expect(isAnomalyStatus("dismissed")).toBe(true);
    expect(isAnomalyStatus("all")).toBe(false);
    expect(isAnomalyStatus("closed")).toBe(false);
  });
});

describe("reviewAnomaly", () => {
  it("should acknowledge an anomaly with notes", async () => {
    const store = seededStore();
    const anomaly = await insert(store, roundNumber());

    const reviewed = await reviewAnomaly(store, TENANT, anomaly.id, {
      status: "acknowledged",
      resolutionNotes: "Retainer, no line items expected",
    });

    expect(reviewed.status).toBe("acknowledged");
    expect(reviewed.resolutionNotes).toBe("Retainer, no line items expected");
  });

  it("should fail for an anomaly that does not exist", async () => {
    const store = seededStore();

    await expect(
      reviewAnomaly(store, TENANT, "missing-id", { status: "dismissed" })
    ).rejects.toBeInstanceOf(AnomalyNotFoundError);
  });

  it("should validate the status and note length", async () => {
    const store = seededStore();
    const anomaly = await insert(store, roundNumber());

    await expect(
      reviewAnomaly(store, TENANT, anomaly.id, { status: "resolved" })
    ).rejects.toThrow("status must be one of: open, acknowledged, dismissed");
    await expect(
      reviewAnomaly(store, TENANT, anomaly.id, {
        status: "dismissed",
        resolutionNotes: "x".repeat(2001),
      })
    ).rejects.toThrow("resolutionNotes must be at most 2000 characters");
  });
});

describe("listAlertCandidates", () => {
  it("should return only open, alert-worthy anomalies", async () => {
    const store = seededStore();
    const alertable = await insert(store, roundNumber());
    await insert(
      store,
      roundNumber({
        billId: "bill-2",
        kind: "duplicate",
        shouldAlert: false,
        metadata: { kind: "duplicate", relatedBillId: "bill-1", duplicateOfBillId: "bill-2", dayGap: 1 },
      })
    );
    const acknowledged = await insert(
      store,
      roundNumber({
        kind: "price_creep",
        metadata: { kind: "price_creep", zScore: 2.5, baselineMean: 1000, baselineStdDev: 200 },
      })
    );
    await reviewAnomaly(store, TENANT, acknowledged.id, { status: "acknowledged" });

    const candidates = await listAlertCandidates(store, TENANT);

    expect(candidates.map((a) => a.id)).toEqual([alertable.id]);
  });
});

describe("exportAnomaliesCsv", () => {
  it("should write a header and one quoted row per anomaly", async () => {
    const store = seededStore();
    await insert(store, roundNumber());

    const csv = await exportAnomaliesCsv(store, TENANT);

    expect(csv).toBe(
      "Date,Vendor,Bill #,Anomaly Type,Severity,Amount,Confidence %,Description,Status\r\n" +
        '2024-04-02,"Acme, Inc.",INV-7,round_number,low,1500.00,60,' +
        '"Round number ($1,500) with no line-item detail; verify against the source invoice",open\r\n'
    );
  });

  it("should name the file after the export date", () => {
    expect(exportFilename(new Date(2024, 3, 2))).toBe("anomalies_2024-04-02.csv");
  });
});

describe("summarizeTenant", () => {
  it("should count each flagged bill amount once", async () => {
    const store = seededStore();
    await insert(store, roundNumber());
    await insert(
      store,
      roundNumber({
        kind: "price_creep",
        shouldAlert: false,
        metadata: { kind: "price_creep", zScore: 2.5, baselineMean: 1000, baselineStdDev: 200 },
      })
    );

    const summary = await summarizeTenant(store, TENANT);

    expect(summary).toEqual({
      tenantId: TENANT,
      vendorCount: 1,
      billCount: 2,
      anomalyCount: 2,
      totalAnomalyAmount: 1500,
      alertWorthyCount: 1,
    });
  });
});
