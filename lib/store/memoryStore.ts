/**
 * In-process DetectionStore.
 *
 * Stands in for Postgres in tests and local demos. Transactions run one at a
 * time against a forked copy of the committed state and replay their writes
 * onto the parent on success. A transaction queued behind another sees its
 * committed rows, so a clashing insert returns null the way a unique-index
 * wait does in Postgres.
 */

import { v4 as uuidv4 } from "uuid";
import type {
  Anomaly,
  Bill,
  NewAnomaly,
  Vendor,
  VendorBaseline,
  VendorBaselineInput,
} from "../types";
import type { AnomalyFilter, AnomalyPatch, DetectionStore } from "./types";

interface MemoryState {
  vendors: Vendor[];
  bills: Bill[];
  baselines: VendorBaseline[];
  anomalies: Anomaly[]; // insertion order
}

type Write = (target: MemoryDetectionStore) => void;

export interface MemoryStoreOptions {
  vendors?: Vendor[];
  bills?: Bill[];
  now?: () => Date;
}

function anomalyKey(a: Pick<Anomaly, "tenantId" | "billId" | "kind">): string {
  return `${a.tenantId}|${a.billId ?? "_none_"}|${a.kind}`;
}

function baselineKey(b: Pick<VendorBaseline, "vendorId" | "windowStart" | "windowEnd">): string {
  return `${b.vendorId}|${b.windowStart}|${b.windowEnd}`;
}

function copyAnomaly(a: Anomaly): Anomaly {
  return { ...a, metadata: { ...a.metadata } };
}

function cloneState(state: MemoryState): MemoryState {
  return {
    vendors: state.vendors.map((v) => ({ ...v })),
    bills: state.bills.map((b) => ({ ...b })),
    baselines: state.baselines.map((b) => ({ ...b })),
    anomalies: state.anomalies.map(copyAnomaly),
  };
}

export class MemoryDetectionStore implements DetectionStore {
  private state: MemoryState;
  private readonly now: () => Date;
  private journal: Write[] | null = null;
  // Settles when the last queued transaction has committed or rolled back
  private txTail: Promise<void> = Promise.resolve();

  constructor(options: MemoryStoreOptions = {}) {
    this.state = {
      vendors: [...(options.vendors ?? [])],
      bills: [...(options.bills ?? [])],
      baselines: [],
      anomalies: [],
    };
    this.now = options.now ?? (() => new Date());
  }

  // Ingestion stand-ins

  addVendor(vendor: Vendor): void {
    this.state.vendors.push(vendor);
  }

  addBill(bill: Bill): void {
    const clash = this.state.bills.some(
      (b) => b.tenantId === bill.tenantId && b.externalId === bill.externalId
    );
    if (clash) {
      throw new Error(`Bill ${bill.externalId} already exists for tenant ${bill.tenantId}`);
    }
    this.state.bills.push(bill);
  }

  // DetectionStore

  async listVendors(tenantId: string): Promise<Vendor[]> {
    return this.state.vendors.filter((v) => v.tenantId === tenantId).map((v) => ({ ...v }));
  }

  async listBills(tenantId: string): Promise<Bill[]> {
    return this.state.bills.filter((b) => b.tenantId === tenantId).map((b) => ({ ...b }));
  }

  async upsertBaseline(input: VendorBaselineInput): Promise<VendorBaseline> {
    const existing = this.state.baselines.find((b) => baselineKey(b) === baselineKey(input));
    const baseline: VendorBaseline = { ...input, id: existing?.id ?? uuidv4() };
    this.applyBaseline(baseline);
    this.record((target) => target.applyBaseline(baseline));
    return { ...baseline };
  }

  async listBaselines(vendorId: string): Promise<VendorBaseline[]> {
    return this.state.baselines.filter((b) => b.vendorId === vendorId).map((b) => ({ ...b }));
  }

  async listAnomalies(tenantId: string, filter: AnomalyFilter = {}): Promise<Anomaly[]> {
    const matches = this.state.anomalies
      .filter(
        (a) =>
          a.tenantId === tenantId &&
          (filter.status === undefined || a.status === filter.status) &&
          (filter.kind === undefined || a.kind === filter.kind) &&
          (filter.billId === undefined || a.billId === filter.billId) &&
          (filter.shouldAlert === undefined || a.shouldAlert === filter.shouldAlert)
      )
      .reverse()
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());

    const offset = filter.offset ?? 0;
    const end = filter.limit === undefined ? undefined : offset + filter.limit;
    return matches.slice(offset, end).map(copyAnomaly);
  }

  async getAnomaly(tenantId: string, anomalyId: string): Promise<Anomaly | null> {
    const found = this.state.anomalies.find((a) => a.tenantId === tenantId && a.id === anomalyId);
    return found ? copyAnomaly(found) : null;
  }

  async insertAnomaly(input: NewAnomaly): Promise<Anomaly | null> {
    const anomaly: Anomaly = {
      ...input,
      metadata: { ...input.metadata },
      id: uuidv4(),
      status: "open",
      resolutionNotes: null,
      createdAt: this.now(),
      updatedAt: null,
    };
    if (!this.applyInsert(anomaly)) {
      return null;
    }
    this.record((target) => {
      target.applyInsert(anomaly);
    });
    return copyAnomaly(anomaly);
  }

  async updateAnomaly(
    tenantId: string,
    anomalyId: string,
    patch: AnomalyPatch
  ): Promise<Anomaly | null> {
    const updatedAt = this.now();
    const updated = this.applyUpdate(tenantId, anomalyId, patch, updatedAt);
    if (updated) {
      this.record((target) => {
        target.applyUpdate(tenantId, anomalyId, patch, updatedAt);
      });
    }
    return updated ? copyAnomaly(updated) : null;
  }

  transaction<T>(fn: (tx: DetectionStore) => Promise<T>): Promise<T> {
    const result = this.txTail.then(() => this.runTransaction(fn));
    this.txTail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private async runTransaction<T>(fn: (tx: DetectionStore) => Promise<T>): Promise<T> {
    const tx = new MemoryDetectionStore({ now: this.now });
    tx.state = cloneState(this.state);
    tx.journal = [];

    const result = await fn(tx);

    // Commit: replay onto the live state (and onto our own journal when nested)
    for (const write of tx.journal) {
      write(this);
      this.record(write);
    }
    return result;
  }

  // Internals shared by direct writes and commit replay

  private record(write: Write): void {
    this.journal?.push(write);
  }

  private applyBaseline(baseline: VendorBaseline): void {
    const index = this.state.baselines.findIndex((b) => baselineKey(b) === baselineKey(baseline));
    if (index >= 0) {
      this.state.baselines[index] = { ...baseline, id: this.state.baselines[index].id };
    } else {
      this.state.baselines.push({ ...baseline });
    }
  }

  private applyInsert(anomaly: Anomaly): boolean {
    const key = anomalyKey(anomaly);
    if (this.state.anomalies.some((a) => anomalyKey(a) === key)) {
      return false;
    }
    this.state.anomalies.push(copyAnomaly(anomaly));
    return true;
  }

  private applyUpdate(
    tenantId: string,
    anomalyId: string,
    patch: AnomalyPatch,
    updatedAt: Date
  ): Anomaly | null {
    const found = this.state.anomalies.find((a) => a.tenantId === tenantId && a.id === anomalyId);
    if (!found) return null;

    found.status = patch.status;
    if (patch.resolutionNotes !== undefined) {
      found.resolutionNotes = patch.resolutionNotes;
    }
    found.updatedAt = updatedAt;
    return found;
  }
}
