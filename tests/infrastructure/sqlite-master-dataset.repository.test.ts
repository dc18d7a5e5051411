import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MergeConflictError } from "../../src/core/domain/errors.js";
import { SqliteMasterDatasetRepository } from "../../src/infrastructure/database/sqlite-master-dataset.repository.js";
import { makeRecord } from "../helpers/fixtures.js";

describe("SqliteMasterDatasetRepository", () => {
  let repo: SqliteMasterDatasetRepository;
  const march = { brand: "BrandX", year: 2025, month: 3 };

  beforeEach(async () => {
    repo = new SqliteMasterDatasetRepository(":memory:");
    await repo.initialize();
  });

  afterEach(async () => {
    await repo.close();
  });

  it("round-trips records", async () => {
    const records = [
      makeRecord({ materialCode: "A1", subHeading2: "Inner", unresolvedHeaders: ["Stok"] }),
      makeRecord({ materialCode: "A2", priceValue: null, price: "" }),
    ];
    await repo.appendRecords(records);
    expect(await repo.readAll()).toEqual(records);
    expect(await repo.count()).toBe(2);
  });

  it("reads only the requested triples", async () => {
    await repo.appendRecords([
      makeRecord({ materialCode: "MAR" }),
      makeRecord({ materialCode: "APR", month: 4 }),
      makeRecord({ materialCode: "OTHER", brand: "Acme" }),
    ]);
    const rows = await repo.readTriples([march]);
    expect(rows.map((r) => r.materialCode)).toEqual(["MAR"]);
  });

  it("swaps a triple when the expected row count matches", async () => {
    await repo.appendRecords([
      makeRecord({ materialCode: "OLD1" }),
      makeRecord({ materialCode: "OLD2" }),
      makeRecord({ materialCode: "APR", month: 4 }),
    ]);
    await repo.replaceTriples([march], [makeRecord({ materialCode: "NEW1" })], 2);
    const all = await repo.readAll();
    expect(all.map((r) => r.materialCode)).toEqual(["NEW1", "APR"]);
  });

  it("refuses the swap when the slice changed underneath", async () => {
    await repo.appendRecords([makeRecord({ materialCode: "OLD1" })]);
    await expect(
      repo.replaceTriples([march], [makeRecord({ materialCode: "NEW1" })], 0),
    ).rejects.toBeInstanceOf(MergeConflictError);
    expect((await repo.readAll()).map((r) => r.materialCode)).toEqual(["OLD1"]);
  });

  it("searches codes and descriptions with LIKE wildcards escaped", async () => {
    await repo.appendRecords([
      makeRecord({ materialCode: "BX-100", description: "50% off" }),
      makeRecord({ materialCode: "BX-200", description: "500 units" }),
      makeRecord({ materialCode: "BX-300", description: "Gate", year: 2026 }),
    ]);
    expect((await repo.search("50%")).map((r) => r.materialCode)).toEqual(["BX-100"]);
    expect((await repo.search("bx-")).map((r) => r.materialCode)).toEqual([
      "BX-300",
      "BX-100",
      "BX-200",
    ]);
    expect(await repo.search("bx-", 1)).toHaveLength(1);
  });
});
