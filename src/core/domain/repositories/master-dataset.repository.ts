import type { CanonicalRecord, Triple } from "../entities/price-record.entity.js";

export interface IMasterDatasetRepository {
  initialize(): Promise<void>;
  readTriples(triples: Triple[]): Promise<CanonicalRecord[]>;
  /**
   * Atomically replaces every record of `triples` with `records`. Readers see
   * either the old or the new slice. Throws `MergeConflictError` when the
   * slice no longer holds `expectedExisting` records.
   */
  replaceTriples(
    triples: Triple[],
    records: CanonicalRecord[],
    expectedExisting: number,
  ): Promise<void>;
  appendRecords(records: CanonicalRecord[]): Promise<void>;
  readAll(): Promise<CanonicalRecord[]>;
  /** Records whose material code or description contains `term`, case-insensitively. */
  search(term: string, limit?: number): Promise<CanonicalRecord[]>;
  count(): Promise<number>;
  close(): Promise<void>;
}
