import type { HeadingRules } from "../../core/domain/entities/brand-profile.entity.js";
import type { PriceDocument } from "../../core/domain/entities/price-document.entity.js";
import type { RawRow, RowHeadings } from "../../core/domain/entities/price-record.entity.js";
import type {
  ExtractionContext,
  IExtractionStrategy,
} from "../../core/domain/services/extraction-strategy.service.js";
import type { HeaderSynonymResolver } from "../../core/domain/services/header-synonym.service.js";
import {
  isProductCode,
  splitCodeAndDescription,
} from "../../core/domain/services/price-normalizer.service.js";

/** "description  1.234,56 TL" on a line with no table header above it. */
const PRICE_LINE =
  /^(.+?)\s+((?:[€$£₺]\s*)?-?\d[\d.,]*(?:\s*(?:TL|TRY|EUR|USD|GBP|[€$£₺]))?)$/u;

/** Cell keys used for rows read by the line pattern. */
export const LINE_PATTERN_HEADERS = { description: "description", price: "price" } as const;

interface HeadingMatchers {
  main: RegExp[];
  sub: RegExp[];
  sub2: RegExp[];
}

function compile(rules: HeadingRules): HeadingMatchers {
  const build = (sources?: string[]) => (sources ?? []).map((s) => new RegExp(s, "u"));
  return { main: build(rules.main), sub: build(rules.sub), sub2: build(rules.sub2) };
}

function headerKeys(header: string[]): string[] {
  const seen = new Set<string>();
  return header.map((h, i) => {
    let key = h.trim() || `column ${i + 1}`;
    if (seen.has(key)) key = `${key} (${i + 1})`;
    seen.add(key);
    return key;
  });
}

/**
 * Reads rows of cells laid out on a page. A line naming two or more canonical
 * fields starts a table; later lines become rows keyed by its headers. Lines
 * matching the brand heading rules update the headings carried by each row.
 * Without a table header, `description  price` lines are read instead.
 * `values`, when given, holds the typed numbers aligned with `lines`.
 */
export function readRowsFromLines(
  lines: string[][],
  resolver: HeaderSynonymResolver,
  rules: HeadingRules,
  page: number,
  sourceFile: string,
  values?: (number | null)[][],
): RawRow[] {
  const matchers = compile(rules);
  const rows: RawRow[] = [];
  let header: string[] | null = null;
  let headings: RowHeadings = {};

  lines.forEach((line, index) => {
    const filled = line.filter((c) => c !== "");
    if (filled.length === 0) return;
    const text = filled.join(" ");

    if (filled.length <= 2) {
      if (matchers.main.some((re) => re.test(text))) {
        headings = { main: text };
        return;
      }
      if (matchers.sub.some((re) => re.test(text))) {
        headings = { main: headings.main, sub: text };
        return;
      }
      if (matchers.sub2.some((re) => re.test(text))) {
        headings = { ...headings, sub2: text };
        return;
      }
    }

    if (resolver.scoreHeaderRow(line) >= 2) {
      header = headerKeys(line);
      return;
    }

    if (header) {
      const cells: Record<string, string> = {};
      const numbers: Record<string, number> = {};
      const typed = values?.[index];
      header.forEach((key, i) => {
        cells[key] = (line[i] ?? "").trim();
        const n = typed?.[i];
        if (typeof n === "number") numbers[key] = n;
      });
      const row: RawRow = { cells, page, sourceFile, headings: { ...headings } };
      if (Object.keys(numbers).length > 0) row.numbers = numbers;
      rows.push(row);
      return;
    }

    const m = PRICE_LINE.exec(text);
    if (m) {
      rows.push({
        cells: {
          [LINE_PATTERN_HEADERS.description]: (m[1] ?? "").trim(),
          [LINE_PATTERN_HEADERS.price]: (m[2] ?? "").trim(),
        },
        page,
        sourceFile,
        headings: { ...headings },
      });
    }
  });
  return rows;
}

export class DirectTextStrategy implements IExtractionStrategy {
  readonly kind = "direct-text" as const;

  constructor(private readonly resolver: HeaderSynonymResolver) {}

  supports(_document: PriceDocument): boolean {
    return true;
  }

  async extract(document: PriceDocument, page: number, ctx: ExtractionContext): Promise<RawRow[]> {
    const content = await document.readPage(page);
    const rows = readRowsFromLines(
      content.rows,
      this.resolver,
      ctx.profile.headingRules,
      page,
      document.name,
      content.values,
    );
    return rows.some((row) => this.carriesCode(row)) ? rows : [];
  }

  private carriesCode(row: RawRow): boolean {
    let description = "";
    for (const [header, value] of Object.entries(row.cells)) {
      const field = this.resolver.resolve(header);
      if (field === "materialCode" && isProductCode(value.replace(/\s+/g, ""))) return true;
      if (field === "description") description = value;
    }
    return splitCodeAndDescription(description).code !== "";
  }
}
