import { describe, expect, it } from "vitest";
import { PromptBuilder } from "../../src/core/domain/services/prompt-builder.service.js";
import { makeProfile } from "../helpers/fixtures.js";

const builder = new PromptBuilder({
  base: " Extract every product row. \n",
  returnStatement: 'Return {"products": [...]}.',
});

describe("PromptBuilder", () => {
  it("adds the brand hint between the purpose and the return statement", () => {
    expect(builder.build(makeProfile({ promptHint: " EUR only " }), "vision")).toBe(
      [
        "Extract every product row.",
        "The page is attached as an image. Read the tables and the headings above them.",
        "Notes for BrandX price lists:\nEUR only",
        'Return {"products": [...]}.',
      ].join("\n\n"),
    );
  });

  it("omits the notes without a hint", () => {
    const prompt = builder.build(makeProfile(), "ocr");
    expect(prompt.split("\n\n")).toEqual([
      "Extract every product row.",
      "The page text below was produced by OCR. Keep codes exactly as read; do not guess missing characters.",
      'Return {"products": [...]}.',
    ]);
  });
});
