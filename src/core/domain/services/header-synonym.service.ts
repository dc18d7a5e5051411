import type { CanonicalField } from "../entities/price-record.entity.js";
import { CANONICAL_FIELDS } from "../entities/price-record.entity.js";
import { PipelineError } from "../errors.js";

/** Canonical field -> accepted header variants. */
export type SynonymTable = Partial<Record<CanonicalField, string[]>>;

export interface HeaderResolution {
  /** Raw header -> canonical field. Each field is claimed by one header at most. */
  fields: Map<string, CanonicalField>;
  unresolved: string[];
  /** Set when the price column was picked by the latest-year rule. */
  priceFromYearColumn?: string;
}

const YEAR_IN_HEADER = /(?:^|\D)((?:19|20)\d{2})(?!\d)/;

/**
 * Casefold used for header comparison: NFKD with combining marks stripped,
 * dotless ı folded to i, underscore and whitespace runs collapsed, trailing
 * colon dropped.
 */
export function normalizeHeader(text: string): string {
  return text
    .replace(/ı/g, "i")
    .replace(/İ/g, "I")
    .normalize("NFKD")
    .replace(/\p{M}/gu, "")
    .toLowerCase()
    .replace(/[_\s]+/g, " ")
    .trim()
    .replace(/\s*:$/, "")
    .trim();
}

export class HeaderSynonymResolver {
  private exact = new Map<string, CanonicalField>();
  private folded = new Map<string, CanonicalField>();

  constructor(table: SynonymTable) {
    for (const field of CANONICAL_FIELDS) {
      for (const variant of table[field] ?? []) {
        this.exact.set(variant, field);
        const key = normalizeHeader(variant);
        const owner = this.folded.get(key);
        if (owner && owner !== field) {
          throw new PipelineError(
            "SYNONYM_CONFLICT",
            `Header variant "${variant}" maps to both ${owner} and ${field}`,
          );
        }
        this.folded.set(key, field);
      }
    }
  }

  resolve(header: string): CanonicalField | null {
    const hit = this.exact.get(header);
    if (hit) return hit;
    return this.folded.get(normalizeHeader(header)) ?? null;
  }

  /**
   * Maps a header row. When no header names the price, the one carrying the
   * latest four-digit year (e.g. "2025 Liste") is taken as the price column.
   */
  resolveHeaders(headers: string[]): HeaderResolution {
    const fields = new Map<string, CanonicalField>();
    const claimed = new Set<CanonicalField>();
    const unresolved: string[] = [];

    for (const header of headers) {
      const field = this.resolve(header);
      if (field && !claimed.has(field)) {
        fields.set(header, field);
        claimed.add(field);
      } else {
        unresolved.push(header);
      }
    }

    if (claimed.has("price")) return { fields, unresolved };

    const yearColumn = latestYearHeader(unresolved);
    if (!yearColumn) return { fields, unresolved };

    fields.set(yearColumn, "price");
    return {
      fields,
      unresolved: unresolved.filter((h) => h !== yearColumn),
      priceFromYearColumn: yearColumn,
    };
  }

  /** Number of distinct canonical fields a candidate header row names. */
  scoreHeaderRow(cells: string[]): number {
    const seen = new Set<CanonicalField>();
    for (const cell of cells) {
      const field = cell.trim() ? this.resolve(cell) : null;
      if (field) seen.add(field);
    }
    return seen.size;
  }
}

export function latestYearHeader(headers: string[]): string | null {
  let best: string | null = null;
  let bestYear = -1;
  for (const header of headers) {
    const m = YEAR_IN_HEADER.exec(header);
    if (!m) continue;
    const year = Number(m[1]);
    if (year > bestYear) {
      best = header;
      bestYear = year;
    }
  }
  return best;
}
