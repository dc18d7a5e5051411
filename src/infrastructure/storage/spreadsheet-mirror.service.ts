import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import PQueue from "p-queue";
import * as XLSX from "xlsx";
import type { CanonicalRecord } from "../../core/domain/entities/price-record.entity.js";
import type { IMasterDatasetRepository } from "../../core/domain/repositories/master-dataset.repository.js";
import type { IDatasetExporter } from "../../core/domain/services/dataset-exporter.service.js";
import { PipelineError } from "../../core/domain/errors.js";

/** Column headers of the spreadsheet mirror, in order. */
export const MIRROR_HEADERS = [
  "Malzeme_Kodu",
  "Kisa_Kod",
  "Açıklama",
  "Fiyat",
  "Fiyat_Sayisal",
  "Para_Birimi",
  "Marka",
  "Kaynak_Dosya",
  "Sayfa",
  "Record_Code",
  "Ana_Baslik",
  "Alt_Baslik",
  "Alt_Baslik2",
  "Image_Path",
  "Yil",
  "Ay",
  "Batch_Id",
] as const;

export function toSheetRow(r: CanonicalRecord): Array<string | number> {
  return [
    r.materialCode,
    r.shortCode,
    r.description,
    r.price,
    r.priceValue ?? "",
    r.currency,
    r.brand,
    r.sourceFile,
    r.page,
    r.recordCode,
    r.mainHeading,
    r.subHeading,
    r.subHeading2 ?? "",
    r.imagePath,
    r.year,
    r.month,
    r.batchId,
  ];
}

export function buildWorkbookBuffer(records: CanonicalRecord[]): Buffer {
  const sheet = XLSX.utils.aoa_to_sheet([[...MIRROR_HEADERS], ...records.map(toSheetRow)]);
  const book = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(book, sheet, "Master");
  const out: unknown = XLSX.write(book, { type: "buffer", bookType: "xlsx" });
  if (!Buffer.isBuffer(out)) throw new PipelineError("EXPORT", "xlsx did not return a buffer");
  return out;
}

/**
 * Rewrites the XLSX mirror from the database. Exports run one at a time so
 * concurrent merges never interleave writes to the same file.
 */
export class SpreadsheetMirrorService implements IDatasetExporter {
  private queue = new PQueue({ concurrency: 1 });

  constructor(
    private repository: IMasterDatasetRepository,
    private outputPath: string,
  ) {}

  async export(): Promise<string> {
    const path = await this.queue.add(async () => {
      const records = await this.repository.readAll();
      mkdirSync(dirname(this.outputPath), { recursive: true });
      writeFileSync(this.outputPath, buildWorkbookBuffer(records));
      return this.outputPath;
    });
    return typeof path === "string" ? path : this.outputPath;
  }
}
