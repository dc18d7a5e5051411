import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import * as XLSX from "xlsx";
import { afterEach, describe, expect, it } from "vitest";
import { SqliteMasterDatasetRepository } from "../../src/infrastructure/database/sqlite-master-dataset.repository.js";
import {
  MIRROR_HEADERS,
  SpreadsheetMirrorService,
  buildWorkbookBuffer,
} from "../../src/infrastructure/storage/spreadsheet-mirror.service.js";
import { makeRecord } from "../helpers/fixtures.js";

function readSheet(buffer: Buffer): unknown[][] {
  const book = XLSX.read(buffer, { type: "buffer" });
  const sheet = book.Sheets["Master"];
  if (!sheet) throw new Error("missing Master sheet");
  return XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1 });
}

describe("buildWorkbookBuffer", () => {
  it("writes the header row and one row per record", () => {
    const rows = readSheet(
      buildWorkbookBuffer([makeRecord({ subHeading2: "Inner", price: "n/a", priceValue: null })]),
    );
    expect(rows[0]).toEqual([...MIRROR_HEADERS]);
    const row = rows[1] ?? [];
    expect(row[0]).toBe("BX-100");
    expect(row[3]).toBe("n/a");
    expect(row[8]).toBe(1);
    expect(row[12]).toBe("Inner");
    expect(row[14]).toBe(2025);
    expect(row[16]).toBe("batch_a");
  });
});

describe("SpreadsheetMirrorService", () => {
  let dir = "";

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
  });

  it("exports the whole database", async () => {
    dir = mkdtempSync(join(tmpdir(), "mirror-"));
    const repo = new SqliteMasterDatasetRepository(":memory:");
    await repo.initialize();
    await repo.appendRecords([makeRecord({ materialCode: "A1" }), makeRecord({ materialCode: "A2" })]);

    const target = join(dir, "nested", "master.xlsx");
    const path = await new SpreadsheetMirrorService(repo, target).export();
    expect(path).toBe(target);
    const rows = readSheet(readFileSync(target));
    expect(rows.slice(1).map((r) => r[0])).toEqual(["A1", "A2"]);
    await repo.close();
  });
});
