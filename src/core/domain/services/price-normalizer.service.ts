import type { PriceStyle } from "../entities/price-record.entity.js";
import { NormalizationError } from "../errors.js";

const CURRENCY_TOKENS = /TRY|TL|EUR|USD|GBP|₺|€|\$|£/gi;
const SPACES = /[\s  ]/g;
const CODE_TOKEN = /^[\p{L}\p{N}-]{3,}$/u;
const HAS_DIGIT = /\p{N}/u;

const SEPARATORS: Record<PriceStyle, { decimal: string; group: string }> = {
  eu: { decimal: ",", group: "." },
  en: { decimal: ".", group: "," },
};

function isGrouped(intPart: string, group: string): boolean {
  const g = group === "." ? "\\." : ",";
  return new RegExp(`^\\d{1,3}(?:${g}\\d{3})+$`).test(intPart);
}

function count(text: string, ch: string): number {
  return text.split(ch).length - 1;
}

/**
 * Reads a printed price. `eu` reads "1.234,56", `en` reads "1,234.56"; a lone
 * separator outside thousands grouping is taken as the decimal separator.
 */
export function normalizePrice(text: string, style: PriceStyle = "eu"): number {
  const cleaned = text.replace(CURRENCY_TOKENS, "").replace(SPACES, "");
  if (!cleaned) throw new NormalizationError("Empty price", text);

  const negative = cleaned.startsWith("-");
  const body = negative ? cleaned.slice(1) : cleaned;
  if (!body || /[^\d.,]/.test(body)) {
    throw new NormalizationError(`Non-numeric price "${text}"`, text);
  }

  const { decimal, group } = SEPARATORS[style];
  let intPart = body;
  let fraction = "";

  const decimals = count(body, decimal);
  if (decimals > 1) {
    throw new NormalizationError(`Repeated decimal separator in "${text}"`, text);
  }
  if (decimals === 1) {
    const at = body.indexOf(decimal);
    intPart = body.slice(0, at);
    fraction = body.slice(at + 1);
    if (!fraction || fraction.includes(group)) {
      throw new NormalizationError(
        `Separators out of order for ${style} style in "${text}"`,
        text,
      );
    }
  }

  if (intPart.includes(group)) {
    if (isGrouped(intPart, group)) {
      intPart = intPart.split(group).join("");
    } else if (decimals === 0 && count(intPart, group) === 1) {
      const at = intPart.indexOf(group);
      fraction = intPart.slice(at + 1);
      intPart = intPart.slice(0, at);
    } else {
      throw new NormalizationError(
        `Unreadable digit grouping for ${style} style in "${text}"`,
        text,
      );
    }
  }

  const canonical = `${negative ? "-" : ""}${intPart || "0"}${fraction ? `.${fraction}` : ""}`;
  if (!/^-?\d+(\.\d+)?$/.test(canonical)) {
    throw new NormalizationError(`Non-numeric price "${text}"`, text);
  }
  return Number(canonical);
}

export function isProductCode(token: string): boolean {
  return CODE_TOKEN.test(token) && HAS_DIGIT.test(token);
}

export interface CodeSplit {
  code: string;
  description: string;
}

type SplitPattern = { re: RegExp; code: 1 | 2; description: 1 | 2 };

const SPLIT_PATTERNS: SplitPattern[] = [
  { re: /^([\p{L}\p{N}-]+)\s*\/\s*(.+)$/u, code: 1, description: 2 },
  { re: /^(.+?)\s*\/\s*([\p{L}\p{N}-]+)$/u, code: 2, description: 1 },
  { re: /^(.+?)\s*\(\s*([\p{L}\p{N}-]+)\s*\)$/u, code: 2, description: 1 },
  { re: /^\(\s*([\p{L}\p{N}-]+)\s*\)\s*(.+)$/u, code: 1, description: 2 },
];

/**
 * Splits a combined "code + description" cell. Patterns are tried in order
 * `CODE / Desc`, `Desc / CODE`, `Desc (CODE)`, `(CODE) Desc`; otherwise the
 * first token is the code when it looks like one.
 */
export function splitCodeAndDescription(text: string): CodeSplit {
  const value = text.trim();
  if (!value) return { code: "", description: "" };

  for (const pattern of SPLIT_PATTERNS) {
    const m = pattern.re.exec(value);
    if (!m) continue;
    const code = m[pattern.code] ?? "";
    if (isProductCode(code)) {
      return { code, description: (m[pattern.description] ?? "").trim() };
    }
  }

  const [first, ...rest] = value.split(/\s+/);
  if (first && isProductCode(first)) {
    return { code: first, description: rest.join(" ") };
  }
  return { code: "", description: value };
}

export function detectCurrency(text: string): string | null {
  if (!text) return null;
  const upper = text.toUpperCase();
  if (upper.includes("EUR") || upper.includes("€")) return "EUR";
  if (upper.includes("USD") || upper.includes("$")) return "USD";
  if (upper.includes("GBP") || upper.includes("£")) return "GBP";
  if (upper.includes("TL") || upper.includes("TRY") || upper.includes("₺")) return "TRY";
  return null;
}

const CURRENCY_SYMBOLS: Record<string, string> = {
  TL: "₺",
  TRY: "₺",
  "₺": "₺",
  USD: "$",
  $: "$",
  EUR: "€",
  "€": "€",
  GBP: "£",
  "£": "£",
};

/** Single symbol for a currency code or symbol, or null when unknown. */
export function normalizeCurrency(value: string | null | undefined): string | null {
  if (!value) return null;
  return CURRENCY_SYMBOLS[value.trim().toUpperCase()] ?? null;
}

/** Trims a code and collapses interior whitespace runs to one space ("3MAS  80MA2" -> "3MAS 80MA2"). */
export function normalizeCode(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}
