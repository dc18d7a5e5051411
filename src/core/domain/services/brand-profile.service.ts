import type { BrandProfile, HeadingRules, ResolvedProfile } from "../entities/brand-profile.entity.js";

export interface DefaultBrandSettings {
  key: string;
  recordCode: string;
  defaultCurrency: string;
  headingRules: HeadingRules;
  promptHint?: string;
}

const UNKNOWN_BRAND = "Unknown";

/**
 * Brand name from a file name: the first token holding a letter, followed
 * by any capitalised tokens, e.g. "Acme Tools 2025 Mart.pdf" -> "Acme Tools".
 */
export function detectBrand(fileName: string): string | null {
  const base = fileName.split(/[\\/]/).pop() ?? "";
  const ext = /\.([A-Za-z0-9]{2,4})$/.exec(base);
  if (!ext) return null;
  const stem = base.slice(0, base.length - ext[0].length);

  const parts: string[] = [];
  for (const token of stem.split(/[\s_-]+/)) {
    if (!token) continue;
    if (parts.length === 0) {
      if (/\p{L}/u.test(token)) parts.push(token);
      continue;
    }
    const capitalised = /^\p{Lu}/u.test(token);
    const allCaps = /\p{Lu}/u.test(token) && token === token.toUpperCase();
    if (!capitalised && !allCaps) break;
    parts.push(token);
  }
  return parts.length > 0 ? parts.join(" ") : null;
}

export class BrandProfileResolver {
  constructor(
    private readonly profiles: BrandProfile[],
    private readonly fallback: DefaultBrandSettings,
  ) {}

  resolve(fileName: string): ResolvedProfile {
    const name = fileName.toLowerCase();
    const hit = this.profiles.find((p) =>
      p.match.some((m) => name.includes(m.toLowerCase())),
    );
    if (hit) return { profile: hit, matched: true };

    return {
      profile: {
        key: this.fallback.key,
        brandName: detectBrand(fileName) ?? UNKNOWN_BRAND,
        match: [],
        recordCode: this.fallback.recordCode,
        defaultCurrency: this.fallback.defaultCurrency,
        headingRules: this.fallback.headingRules,
        promptHint: this.fallback.promptHint,
      },
      matched: false,
    };
  }
}
