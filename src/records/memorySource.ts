import { CatalogInputError } from "../errors.js";
import type { CatalogRecord, RecordSource } from "./types.js";

/**
 * Record source backed by an insertion-ordered map keyed by record id.
 * Writing a record whose id is already present replaces it in place.
 * Subscribers are notified after every effective change.
 */
export class InMemoryRecordSource implements RecordSource {
  private readonly records = new Map<string, CatalogRecord>();
  private readonly listeners = new Set<() => void>();

  constructor(records: Iterable<CatalogRecord> = []) {
    for (const record of records) {
      this.store(record);
    }
  }

  get size(): number {
    return this.records.size;
  }

  listAllRecords(): CatalogRecord[] {
    return Array.from(this.records.values());
  }

  loadByIdentity(key: string): CatalogRecord | null {
    return this.records.get(key) ?? null;
  }

  /** Stores {@link record}; storing the record already held is a no-op. */
  upsert(record: CatalogRecord): void {
    if (record.id && this.records.get(record.id) === record) {
      return;
    }
    this.store(record);
    this.notify();
  }

  remove(key: string): boolean {
    const removed = this.records.delete(key);
    if (removed) {
      this.notify();
    }
    return removed;
  }

  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private store(record: CatalogRecord): void {
    if (!record.id) {
      throw new CatalogInputError("records stored in memory need a non-empty id", { name: record.name });
    }
    this.records.set(record.id, record);
  }

  private notify(): void {
    for (const listener of Array.from(this.listeners)) {
      listener();
    }
  }
}
