import type { BrandProfile } from "../entities/brand-profile.entity.js";

export interface PromptTemplates {
  base: string;
  /** Closing instruction naming the `products` root key. */
  returnStatement: string;
}

export type PromptPurpose = "ocr" | "vision";

const PURPOSE_LINES: Record<PromptPurpose, string> = {
  ocr: "The page text below was produced by OCR. Keep codes exactly as read; do not guess missing characters.",
  vision: "The page is attached as an image. Read the tables and the headings above them.",
};

export class PromptBuilder {
  constructor(private readonly templates: PromptTemplates) {}

  build(profile: BrandProfile, purpose: PromptPurpose): string {
    const parts = [this.templates.base.trim(), PURPOSE_LINES[purpose]];
    if (profile.promptHint?.trim()) {
      parts.push(`Notes for ${profile.brandName} price lists:\n${profile.promptHint.trim()}`);
    }
    parts.push(this.templates.returnStatement.trim());
    return parts.join("\n\n");
  }
}
