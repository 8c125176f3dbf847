import type { DetectionStore } from "../store/types";
import { toIsoDate } from "../analysis/dates";

const CSV_HEADER = [
  "Date",
  "Vendor",
  "Bill #",
  "Anomaly Type",
  "Severity",
  "Amount",
  "Confidence %",
  "Description",
  "Status",
];

function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function toCsvLine(fields: string[]): string {
  return fields.map(escapeCsvField).join(",");
}

/**
 * All of a tenant's anomalies, newest first, joined to bill number and vendor
 * name. Rows end in CRLF.
 */
export async function exportAnomaliesCsv(store: DetectionStore, tenantId: string): Promise<string> {
  const [anomalies, bills, vendors] = await Promise.all([
    store.listAnomalies(tenantId),
    store.listBills(tenantId),
    store.listVendors(tenantId),
  ]);

  const billsById = new Map(bills.map((b) => [b.id, b]));
  const vendorNames = new Map(vendors.map((v) => [v.id, v.name]));

  const lines = [toCsvLine(CSV_HEADER)];
  for (const anomaly of anomalies) {
    const bill = anomaly.billId ? billsById.get(anomaly.billId) : undefined;
    lines.push(
      toCsvLine([
        toIsoDate(anomaly.createdAt),
        bill ? vendorNames.get(bill.vendorId) ?? "" : "",
        bill?.billNumber ?? "",
        anomaly.kind,
        anomaly.severity,
        anomaly.amount.toFixed(2),
        (anomaly.confidence * 100).toFixed(0),
        anomaly.description,
        anomaly.status,
      ])
    );
  }

  return lines.map((line) => `${line}\r\n`).join("");
}

export function exportFilename(today: Date): string {
  return `anomalies_${toIsoDate(today)}.csv`;
}
