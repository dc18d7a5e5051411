import { describe, expect, it, vi } from "vitest";
import {
  type OcrWorker,
  TesseractOcrEngine,
} from "../../src/infrastructure/services/tesseract-ocr.service.js";

function worker(text: string): OcrWorker {
  return {
    recognize: vi.fn(async () => ({ data: { text } })),
    terminate: vi.fn(async () => undefined),
  };
}

const options = { languages: ["tur", "eng"] };

describe("TesseractOcrEngine", () => {
  it("starts one worker and shares it", async () => {
    const start = vi.fn(async () => worker("K-100 12,50"));
    const engine = new TesseractOcrEngine(options, start);

    expect(await engine.recognize(Buffer.from("a"))).toBe("K-100 12,50");
    expect(await engine.recognize(Buffer.from("b"))).toBe("K-100 12,50");
    expect(start).toHaveBeenCalledTimes(1);
    expect(start).toHaveBeenCalledWith(options);
  });

  it("starts a new worker after a failed start", async () => {
    let calls = 0;
    const start = vi.fn(async (): Promise<OcrWorker> => {
      calls++;
      if (calls === 1) throw new Error("traineddata missing");
      return worker("A-1");
    });
    const engine = new TesseractOcrEngine(options, start);

    await expect(engine.recognize(Buffer.from("a"))).rejects.toThrow("traineddata missing");
    expect(await engine.recognize(Buffer.from("a"))).toBe("A-1");
    expect(start).toHaveBeenCalledTimes(2);
  });

  it("terminates the worker once", async () => {
    const w = worker("");
    const engine = new TesseractOcrEngine(options, async () => w);
    await engine.recognize(Buffer.from("a"));

    await engine.terminate();
    await engine.terminate();
    expect(w.terminate).toHaveBeenCalledTimes(1);
  });
});
