import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { CanonicalRecord, Triple } from "../../core/domain/entities/price-record.entity.js";
import { tripleKey } from "../../core/domain/entities/price-record.entity.js";
import type { IMasterDatasetRepository } from "../../core/domain/repositories/master-dataset.repository.js";
import { MergeConflictError } from "../../core/domain/errors.js";

/** Typed row shape returned by better-sqlite3 for tbl_master_records */
interface MasterRecordRow {
  materialCode: string;
  shortCode: string;
  description: string;
  price: string;
  priceValue: number | null;
  currency: string;
  brand: string;
  sourceFile: string;
  documentFile: string;
  page: number;
  recordCode: string;
  mainHeading: string;
  subHeading: string;
  subHeading2: string | null;
  imagePath: string;
  year: number;
  month: number;
  batchId: string;
  unresolvedHeaders: string;
}

const COLUMNS = [
  "materialCode",
  "shortCode",
  "description",
  "price",
  "priceValue",
  "currency",
  "brand",
  "sourceFile",
  "documentFile",
  "page",
  "recordCode",
  "mainHeading",
  "subHeading",
  "subHeading2",
  "imagePath",
  "year",
  "month",
  "batchId",
  "unresolvedHeaders",
] as const;

const TRIPLE_WHERE = "brand = ? AND year = ? AND month = ?";

function toRow(r: CanonicalRecord): MasterRecordRow {
  return {
    ...r,
    subHeading2: r.subHeading2 ?? null,
    unresolvedHeaders: JSON.stringify(r.unresolvedHeaders),
  };
}

function fromRow(row: MasterRecordRow): CanonicalRecord {
  const { subHeading2, unresolvedHeaders, ...rest } = row;
  const parsed: unknown = JSON.parse(unresolvedHeaders || "[]");
  const record: CanonicalRecord = {
    ...rest,
    unresolvedHeaders: Array.isArray(parsed) ? parsed.map(String) : [],
  };
  if (subHeading2 !== null) record.subHeading2 = subHeading2;
  return record;
}

/**
 * Master dataset in a single SQLite table. Update-mode merges swap whole
 * (brand, year, month) slices inside one transaction.
 */
export class SqliteMasterDatasetRepository implements IMasterDatasetRepository {
  private _db: Database.Database | null = null;

  constructor(private dbPath: string) {}

  private getDb() {
    if (this._db) return this._db;
    if (this.dbPath !== ":memory:") mkdirSync(dirname(this.dbPath), { recursive: true });
    this._db = new Database(this.dbPath);
    this._db.pragma("journal_mode = DELETE");
    this._db.pragma("synchronous = FULL");
    this._db.pragma("busy_timeout = 5000");
    return this._db;
  }

  async initialize(): Promise<void> {
    this.getDb().exec(`
      -- One row per canonical record; (brand, year, month) is the merge scope.
      CREATE TABLE IF NOT EXISTS tbl_master_records (
        id                INTEGER PRIMARY KEY AUTOINCREMENT,
        materialCode      TEXT NOT NULL,
        shortCode         TEXT NOT NULL DEFAULT '',
        description       TEXT NOT NULL DEFAULT '',
        price             TEXT NOT NULL DEFAULT '',
        priceValue        REAL,
        currency          TEXT NOT NULL DEFAULT '',
        brand             TEXT NOT NULL,
        sourceFile        TEXT NOT NULL,
        documentFile      TEXT NOT NULL,
        page              INTEGER NOT NULL,
        recordCode        TEXT NOT NULL DEFAULT '',
        mainHeading       TEXT NOT NULL DEFAULT '',
        subHeading        TEXT NOT NULL DEFAULT '',
        subHeading2       TEXT,
        imagePath         TEXT NOT NULL DEFAULT '',
        year              INTEGER NOT NULL,
        month             INTEGER NOT NULL,
        batchId           TEXT NOT NULL,
        unresolvedHeaders TEXT NOT NULL DEFAULT '[]'
      );

      CREATE INDEX IF NOT EXISTS idx_master_triple
        ON tbl_master_records (brand, year, month);
      CREATE INDEX IF NOT EXISTS idx_master_code
        ON tbl_master_records (materialCode);
    `);
  }

  async close(): Promise<void> {
    if (this._db) {
      this._db.close();
      this._db = null;
    }
  }

  async readTriples(triples: Triple[]): Promise<CanonicalRecord[]> {
    const stmt = this.getDb().prepare(
      `SELECT ${COLUMNS.join(", ")} FROM tbl_master_records WHERE ${TRIPLE_WHERE} ORDER BY id`,
    );
    const out: CanonicalRecord[] = [];
    for (const t of triples) {
      const rows = stmt.all(t.brand, t.year, t.month) as MasterRecordRow[];
      out.push(...rows.map(fromRow));
    }
    return out;
  }

  async replaceTriples(
    triples: Triple[],
    records: CanonicalRecord[],
    expectedExisting: number,
  ): Promise<void> {
    const db = this.getDb();
    const countStmt = db.prepare(
      `SELECT COUNT(*) AS n FROM tbl_master_records WHERE ${TRIPLE_WHERE}`,
    );
    const deleteStmt = db.prepare(`DELETE FROM tbl_master_records WHERE ${TRIPLE_WHERE}`);
    const insert = this.insertStatement(db);

    db.transaction(() => {
      let current = 0;
      for (const t of triples) {
        const row = countStmt.get(t.brand, t.year, t.month) as { n: number };
        current += row.n;
      }
      if (current !== expectedExisting) {
        throw new MergeConflictError(triples.map(tripleKey));
      }
      for (const t of triples) deleteStmt.run(t.brand, t.year, t.month);
      for (const r of records) insert.run(toRow(r));
    })();
  }

  async appendRecords(records: CanonicalRecord[]): Promise<void> {
    const db = this.getDb();
    const insert = this.insertStatement(db);
    db.transaction(() => {
      for (const r of records) insert.run(toRow(r));
    })();
  }

  async readAll(): Promise<CanonicalRecord[]> {
    const rows = this.getDb()
      .prepare(
        `SELECT ${COLUMNS.join(", ")} FROM tbl_master_records
         ORDER BY brand, year, month, id`,
      )
      .all() as MasterRecordRow[];
    return rows.map(fromRow);
  }

  async search(term: string, limit = 100): Promise<CanonicalRecord[]> {
    const like = `%${term.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
    const rows = this.getDb()
      .prepare(
        `SELECT ${COLUMNS.join(", ")} FROM tbl_master_records
         WHERE materialCode LIKE @like ESCAPE '\\' OR description LIKE @like ESCAPE '\\'
         ORDER BY brand, year DESC, month DESC, id
         LIMIT @limit`,
      )
      .all({ like, limit }) as MasterRecordRow[];
    return rows.map(fromRow);
  }

  async count(): Promise<number> {
    const row = this.getDb()
      .prepare("SELECT COUNT(*) AS n FROM tbl_master_records")
      .get() as { n: number };
    return row.n;
  }

  private insertStatement(db: Database.Database) {
    return db.prepare(
      `INSERT INTO tbl_master_records (${COLUMNS.join(", ")})
       VALUES (${COLUMNS.map((c) => `@${c}`).join(", ")})`,
    );
  }
}
