import { createWorker } from "tesseract.js";
import type { IOcrEngine } from "../../core/domain/services/ocr.service.js";

export interface TesseractOptions {
  languages: string[];
  /** Folder holding `<lang>.traineddata`; tesseract.js downloads them when unset. */
  langPath?: string;
}

/** The part of a tesseract.js worker the engine uses. */
export interface OcrWorker {
  recognize(image: Buffer): Promise<{ data: { text: string } }>;
  terminate(): Promise<unknown>;
}

export type OcrWorkerFactory = (options: TesseractOptions) => Promise<OcrWorker>;

const tesseractWorker: OcrWorkerFactory = (options) =>
  createWorker(options.languages.join("+"), 1, options.langPath ? { langPath: options.langPath } : {});

/** One shared worker, created on first use. A failed start is retried on the next call. */
export class TesseractOcrEngine implements IOcrEngine {
  private worker: Promise<OcrWorker> | null = null;

  constructor(
    private options: TesseractOptions,
    private startWorker: OcrWorkerFactory = tesseractWorker,
  ) {}

  private getWorker(): Promise<OcrWorker> {
    if (!this.worker) {
      const pending = this.startWorker(this.options);
      this.worker = pending;
      pending.catch(() => {
        if (this.worker === pending) this.worker = null;
      });
    }
    return this.worker;
  }

  async recognize(image: Buffer): Promise<string> {
    const worker = await this.getWorker();
    const { data } = await worker.recognize(image);
    return data.text;
  }

  async terminate(): Promise<void> {
    if (!this.worker) return;
    const pending = this.worker;
    this.worker = null;
    const worker = await pending;
    await worker.terminate();
  }
}
