import {
  boolean,
  date,
  doublePrecision,
  integer,
  jsonb,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
  uuid,
  varchar,
} from "drizzle-orm/pg-core";
import type { AnomalyKind, AnomalyMetadata, AnomalyStatus, Severity } from "../types";

export const vendors = pgTable(
  "vendors",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    tenantId: varchar("tenant_id", { length: 64 }).notNull(),
    externalId: varchar("external_id", { length: 100 }).notNull(),
    name: varchar("name", { length: 255 }).notNull(),
  },
  (t) => ({
    tenantExternal: uniqueIndex("uq_vendor_tenant_external").on(t.tenantId, t.externalId),
  })
);

export const bills = pgTable(
  "bills",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    tenantId: varchar("tenant_id", { length: 64 }).notNull(),
    vendorId: uuid("vendor_id")
      .notNull()
      .references(() => vendors.id),
    externalId: varchar("external_id", { length: 100 }).notNull(),
    billNumber: varchar("bill_number", { length: 100 }),
    totalAmount: doublePrecision("total_amount").notNull(),
    txnDate: date("txn_date", { mode: "string" }).notNull(),
    hasLineItems: boolean("has_line_items").notNull().default(false),
  },
  (t) => ({
    tenantExternal: uniqueIndex("uq_bill_tenant_external").on(t.tenantId, t.externalId),
  })
);

export const vendorBaselines = pgTable(
  "vendor_baselines",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    vendorId: uuid("vendor_id")
      .notNull()
      .references(() => vendors.id),
    windowStart: date("window_start", { mode: "string" }).notNull(),
    windowEnd: date("window_end", { mode: "string" }).notNull(),
    sampleCount: integer("sample_count").notNull().default(0),
    meanAmount: doublePrecision("mean_amount").notNull(),
    stdDevAmount: doublePrecision("std_dev_amount"),
    minAmount: doublePrecision("min_amount").notNull(),
    maxAmount: doublePrecision("max_amount").notNull(),
  },
  (t) => ({
    vendorWindow: uniqueIndex("uq_baseline_vendor_window").on(
      t.vendorId,
      t.windowStart,
      t.windowEnd
    ),
  })
);

export const anomalies = pgTable(
  "anomalies",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    tenantId: varchar("tenant_id", { length: 64 }).notNull(),
    billId: uuid("bill_id").references(() => bills.id),
    kind: varchar("kind", { length: 50 }).$type<AnomalyKind>().notNull(),
    severity: varchar("severity", { length: 20 }).$type<Severity>().notNull(),
    amount: doublePrecision("amount").notNull(),
    confidence: doublePrecision("confidence").notNull(),
    description: text("description").notNull(),
    metadata: jsonb("metadata").$type<AnomalyMetadata>().notNull(),
    shouldAlert: boolean("should_alert").notNull().default(false),
    status: varchar("status", { length: 20 }).$type<AnomalyStatus>().notNull().default("open"),
    resolutionNotes: text("resolution_notes"),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }),
  },
  (t) => ({
    tenantBillKind: uniqueIndex("uq_anomaly_tenant_bill_kind").on(t.tenantId, t.billId, t.kind),
  })
);
