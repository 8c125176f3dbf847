/**
 * Postgres-backed DetectionStore (drizzle-orm over node-postgres).
 *
 * Idempotency and the baseline upsert are enforced by the unique indexes in
 * ./schema: anomaly inserts use ON CONFLICT DO NOTHING, baseline writes use
 * ON CONFLICT DO UPDATE.
 */

import { and, desc, eq, type SQL } from "drizzle-orm";
import type { NodePgQueryResultHKT } from "drizzle-orm/node-postgres";
import type { PgDatabase } from "drizzle-orm/pg-core";
import type { AnomalyFilter, AnomalyPatch, DetectionStore } from "../store/types";
import type {
  Anomaly,
  Bill,
  NewAnomaly,
  Vendor,
  VendorBaseline,
  VendorBaselineInput,
} from "../types";
import * as schema from "./schema";
import { anomalies, bills, vendorBaselines, vendors } from "./schema";

// Satisfied by both the pooled database and a transaction handle
export type DetectionDatabase = PgDatabase<NodePgQueryResultHKT, typeof schema>;

export class PostgresDetectionStore implements DetectionStore {
  constructor(private readonly db: DetectionDatabase) {}

  async listVendors(tenantId: string): Promise<Vendor[]> {
    return this.db.select().from(vendors).where(eq(vendors.tenantId, tenantId));
  }

  async listBills(tenantId: string): Promise<Bill[]> {
    return this.db
      .select()
      .from(bills)
      .where(eq(bills.tenantId, tenantId))
      .orderBy(bills.txnDate);
  }

  async upsertBaseline(input: VendorBaselineInput): Promise<VendorBaseline> {
    const [row] = await this.db
      .insert(vendorBaselines)
      .values(input)
      .onConflictDoUpdate({
        target: [vendorBaselines.vendorId, vendorBaselines.windowStart, vendorBaselines.windowEnd],
        set: {
          sampleCount: input.sampleCount,
          meanAmount: input.meanAmount,
          stdDevAmount: input.stdDevAmount,
          minAmount: input.minAmount,
          maxAmount: input.maxAmount,
        },
      })
      .returning();
    return row;
  }

  async listBaselines(vendorId: string): Promise<VendorBaseline[]> {
    return this.db
      .select()
      .from(vendorBaselines)
      .where(eq(vendorBaselines.vendorId, vendorId))
      .orderBy(desc(vendorBaselines.windowEnd));
  }

  async listAnomalies(tenantId: string, filter: AnomalyFilter = {}): Promise<Anomaly[]> {
    const conditions: SQL[] = [eq(anomalies.tenantId, tenantId)];
    if (filter.status !== undefined) conditions.push(eq(anomalies.status, filter.status));
    if (filter.kind !== undefined) conditions.push(eq(anomalies.kind, filter.kind));
    if (filter.billId !== undefined) conditions.push(eq(anomalies.billId, filter.billId));
    if (filter.shouldAlert !== undefined) {
      conditions.push(eq(anomalies.shouldAlert, filter.shouldAlert));
    }

    let query = this.db
      .select()
      .from(anomalies)
      .where(and(...conditions))
      .orderBy(desc(anomalies.createdAt))
      .$dynamic();
    if (filter.limit !== undefined) query = query.limit(filter.limit);
    if (filter.offset !== undefined) query = query.offset(filter.offset);

    return query;
  }

  async getAnomaly(tenantId: string, anomalyId: string): Promise<Anomaly | null> {
    const rows = await this.db
      .select()
      .from(anomalies)
      .where(and(eq(anomalies.tenantId, tenantId), eq(anomalies.id, anomalyId)))
      .limit(1);
    return rows[0] ?? null;
  }

  async insertAnomaly(input: NewAnomaly): Promise<Anomaly | null> {
    const rows = await this.db
      .insert(anomalies)
      .values(input)
      .onConflictDoNothing({ target: [anomalies.tenantId, anomalies.billId, anomalies.kind] })
      .returning();
    return rows[0] ?? null;
  }

  async updateAnomaly(
    tenantId: string,
    anomalyId: string,
    patch: AnomalyPatch
  ): Promise<Anomaly | null> {
    const set: Partial<typeof anomalies.$inferInsert> = {
      status: patch.status,
      updatedAt: new Date(),
    };
    if (patch.resolutionNotes !== undefined) {
      set.resolutionNotes = patch.resolutionNotes;
    }

    const rows = await this.db
      .update(anomalies)
      .set(set)
      .where(and(eq(anomalies.tenantId, tenantId), eq(anomalies.id, anomalyId)))
      .returning();
    return rows[0] ?? null;
  }

  async transaction<T>(fn: (tx: DetectionStore) => Promise<T>): Promise<T> {
    return this.db.transaction(async (tx) => fn(new PostgresDetectionStore(tx)));
  }
}
