import { PipelineError } from "../errors.js";

export interface Period {
  year: number;
  month: number;
}

export interface ResolvedPeriod extends Period {
  /** Which parts came from the file name. */
  source: "filename" | "year-only" | "fallback";
}

/** Month number ("1".."12") -> lowercase names and abbreviations. */
export type MonthNameTable = Record<string, string[]>;

const YEAR_MONTH = /(?:^|\D)(20\d{2})[-_.](0[1-9]|1[0-2])(?!\d)/;
const YEAR = /(?:^|\D)(20\d{2})(?!\d)/;

/** Parses "YYYY-MM". */
export function parsePeriod(text: string): Period {
  const m = /^(\d{4})-(\d{1,2})$/.exec(text.trim());
  const month = m ? Number(m[2]) : 0;
  if (!m || month < 1 || month > 12) {
    throw new PipelineError("INVALID_PERIOD", `Expected YYYY-MM, got "${text}"`);
  }
  return { year: Number(m[1]), month };
}

function foldName(text: string): string {
  return text.toLowerCase().normalize("NFKD").replace(/\p{M}/gu, "");
}

export function periodOfDate(date: Date): Period {
  return { year: date.getFullYear(), month: date.getMonth() + 1 };
}

/**
 * Reads the price-list period from a file name: "2025-03", or a four-digit
 * year and a Turkish or English month name ("BrandX_Mart_2025.pdf").
 */
export class PeriodResolver {
  private readonly months = new Map<string, number>();

  constructor(monthNames: MonthNameTable) {
    for (const [month, names] of Object.entries(monthNames)) {
      for (const name of names) this.months.set(foldName(name), Number(month));
    }
  }

  resolve(fileName: string, fallback: Period): ResolvedPeriod {
    const stem = fileName.replace(/\.[A-Za-z0-9]{2,4}$/, "");

    const ym = YEAR_MONTH.exec(stem);
    if (ym) return { year: Number(ym[1]), month: Number(ym[2]), source: "filename" };

    const y = YEAR.exec(stem);
    const month = this.monthIn(stem);
    if (y && month) return { year: Number(y[1]), month, source: "filename" };
    if (y) return { year: Number(y[1]), month: fallback.month, source: "year-only" };
    return { ...fallback, source: "fallback" };
  }

  private monthIn(stem: string): number | null {
    for (const token of stem.split(/[^\p{L}]+/u)) {
      const month = this.months.get(foldName(token));
      if (month) return month;
    }
    return null;
  }
}
