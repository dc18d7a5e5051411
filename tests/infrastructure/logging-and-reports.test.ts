import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { BatchSummary } from "../../src/core/domain/entities/extraction-result.entity.js";
import {
  CompositeLogger,
  ConsoleLogger,
  JsonLogger,
} from "../../src/infrastructure/services/json-logger.service.js";
import {
  JsonReportGenerationService,
  formatBatchSummary,
} from "../../src/infrastructure/services/report-generation.service.js";
import { batchId } from "../../src/infrastructure/utils/id.utils.js";
import {
  documentStem,
  listFilesRecursive,
  normalizeRelativePath,
  pageLabel,
} from "../../src/infrastructure/utils/storage.utils.js";
import { MemoryLogger } from "../helpers/memory-logger.js";

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "price-ingest-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("ConsoleLogger", () => {
  it("prints level, event, location and message", () => {
    const lines: string[] = [];
    const logger = new ConsoleLogger("info", (line) => lines.push(line));
    logger.log({ event: "page.empty", level: "warn", sourceFile: "a.pdf", page: 2, message: "No rows" });
    logger.log({ event: "batch.start", message: "3 document(s)" });
    logger.log({ event: "page.attempt", level: "debug", message: "hidden" });
    expect(lines).toEqual(["WARN\tpage.empty\ta.pdf p2: No rows\n", "INFO\tbatch.start\t3 document(s)\n"]);
  });
});

describe("JsonLogger", () => {
  it("appends one JSON object per line to the run file", async () => {
    const logger = new JsonLogger(join(dir, "logs"), "events.jsonl");
    logger.init("run1");
    logger.log({ event: "page.empty", level: "warn", page: 2 });
    logger.close();

    const path = join(dir, "logs", "events_run1.jsonl");
    await vi.waitFor(() => {
      expect(readFileSync(path, "utf-8").endsWith("\n")).toBe(true);
    });
    const [line] = readFileSync(path, "utf-8").trim().split("\n");
    expect(JSON.parse(line ?? "")).toMatchObject({ event: "page.empty", level: "warn", runId: "run1", page: 2 });
  });

  it("fans out through CompositeLogger", () => {
    const a = new MemoryLogger();
    const b = new MemoryLogger();
    const logger = new CompositeLogger([a, b]);
    logger.init("r");
    logger.log({ event: "batch.done" });
    logger.close();
    expect([a.runIds, b.entries.length, a.closed]).toEqual([["r"], 1, 1]);
  });
});

const summary: BatchSummary = {
  batchId: "batch_1",
  mode: "update",
  startedAt: "2025-03-01T10:00:00.000Z",
  finishedAt: "2025-03-01T10:00:05.000Z",
  documents: [
    {
      sourceFile: "a.pdf",
      brand: "BrandX",
      status: "succeeded",
      rows: 3,
      merged: true,
      pages: [{ page: 1, status: "succeeded", strategy: "direct-text", rawRows: 3, rows: 3, attempts: [] }],
    },
    {
      sourceFile: "b.pdf",
      brand: "Acme",
      status: "exhausted",
      rows: 0,
      merged: false,
      pages: [{ page: 1, status: "exhausted", rawRows: 0, rows: 0, attempts: [], note: "No rows" }],
      diagnostic: "No rows from any strategy; no model call was made",
    },
    {
      sourceFile: "c.pdf",
      brand: "Unknown",
      status: "failed",
      rows: 0,
      merged: false,
      pages: [],
      errorMessage: "Cannot open",
    },
  ],
  totals: { documents: 3, succeeded: 1, partial: 0, exhausted: 1, failed: 1, rows: 3 },
};

describe("batch reports", () => {
  it("formats the summary for the terminal", () => {
    expect(formatBatchSummary(summary).split("\n")).toEqual([
      "Batch batch_1 (update) 2025-03-01T10:00:00.000Z -> 2025-03-01T10:00:05.000Z",
      "  [succeeded] a.pdf (BrandX): 3 row(s), merged",
      "      p1 direct-text succeeded 3 row(s)",
      "  [exhausted] b.pdf (Acme): 0 row(s)",
      "      p1 - exhausted 0 row(s): No rows",
      "      diagnostic: No rows from any strategy; no model call was made",
      "  [failed] c.pdf (Unknown): 0 row(s)",
      "      error: Cannot open",
      "Totals: 3 document(s): 1 succeeded, 0 partial, 1 empty, 1 failed; 3 row(s) merged",
    ]);
  });

  it("writes the summary as JSON", async () => {
    const path = await new JsonReportGenerationService(join(dir, "summaries")).generate(summary);
    expect(path).toBe(join(dir, "summaries", "batch_1.json"));
    expect(JSON.parse(readFileSync(path, "utf-8"))).toEqual(summary);
  });
});

describe("storage and id helpers", () => {
  it("derives folder names and labels", () => {
    expect(documentStem("in/My: List.v2.pdf")).toBe("My_ List.v2");
    expect(pageLabel(3)).toBe("03");
    expect(pageLabel(12)).toBe("12");
    expect(normalizeRelativePath("\\a\\b\\")).toBe("a/b");
  });

  it("lists files recursively in sorted order", () => {
    mkdirSync(join(dir, "sub"));
    writeFileSync(join(dir, "sub", "a.txt"), "");
    writeFileSync(join(dir, "b.txt"), "");
    expect(listFilesRecursive(dir)).toEqual(["b.txt", "sub/a.txt"]);
    expect(listFilesRecursive(join(dir, "missing"))).toEqual([]);
  });

  it("stamps batch ids with local time", () => {
    expect(batchId(new Date(2025, 2, 5, 9, 7, 3))).toMatch(/^batch_2025-03-05T09-07-03_[a-z0-9]{0,4}$/);
  });
});
