import type {
  CanonicalRecord,
  IngestMode,
  Triple,
} from "../entities/price-record.entity.js";
import { distinctTriples, tripleKey } from "../entities/price-record.entity.js";

export interface MergeResult {
  mode: IngestMode;
  triples: Triple[];
  /** Update: the full new contents of `triples`. Append: the records to add. */
  records: CanonicalRecord[];
  inserted: number;
  removed: number;
  /** Records of the same batch from other documents left in place. */
  keptFromBatch: number;
  /** Duplicate (brand, year, month, code) keys collapsed, last one winning. */
  collapsed: number;
  /** Documents whose records were all superseded by this merge. */
  replacedDocuments: string[];
}

function recordKey(r: CanonicalRecord): string {
  return `${tripleKey(r)}\0${r.materialCode}`;
}

/**
 * Pure merge of a new record set into the existing contents of its triples.
 *
 * `update` replaces each touched (brand, year, month) wholesale, except for
 * records written earlier by the same batch from another document, so a list
 * split over several files is not superseded by its own second half. Applying
 * the same records twice leaves the dataset unchanged.
 */
export function mergeRecords(
  existing: CanonicalRecord[],
  incoming: CanonicalRecord[],
  mode: IngestMode,
): MergeResult {
  const triples = distinctTriples(incoming);

  if (mode === "append") {
    return {
      mode,
      triples,
      records: incoming,
      inserted: incoming.length,
      removed: 0,
      keptFromBatch: 0,
      collapsed: 0,
      replacedDocuments: [],
    };
  }

  const touched = new Set(triples.map(tripleKey));
  const batches = new Set(incoming.map((r) => r.batchId));
  const documents = new Set(incoming.map((r) => r.documentFile));

  const kept: CanonicalRecord[] = [];
  const removedDocs = new Set<string>();
  let removed = 0;
  for (const r of existing) {
    if (!touched.has(tripleKey(r))) continue;
    if (batches.has(r.batchId) && !documents.has(r.documentFile)) {
      kept.push(r);
    } else {
      removed++;
      removedDocs.add(r.documentFile);
    }
  }
  for (const r of kept) removedDocs.delete(r.documentFile);

  const live = new Map<string, CanonicalRecord>();
  for (const r of [...kept, ...incoming]) live.set(recordKey(r), r);
  const records = [...live.values()];
  const collapsed = kept.length + incoming.length - records.length;
  const liveKept = kept.filter((r) => live.get(recordKey(r)) === r).length;

  return {
    mode,
    triples,
    records,
    inserted: records.length - liveKept,
    removed,
    keptFromBatch: liveKept,
    collapsed,
    replacedDocuments: [...removedDocs].filter((d) => !documents.has(d)).sort(),
  };
}
