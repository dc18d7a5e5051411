/**
 * Client of the remote document extraction service.
 * POST {baseUrl}/api/v1/price-lists/extract (multipart/form-data: page image + prompt).
 * Uses undici with a custom connect timeout (service.timeoutMs); Node's default fetch has a 10s connect limit.
 */

import { fetch, Agent, FormData, type Dispatcher } from "undici";
import { RemoteTimeoutError, RemoteTransientError, errorMessage } from "../../core/domain/errors.js";
import type { IVisionBackend, RemoteCallOptions } from "../../core/domain/services/model-client.service.js";
import { remoteErrorFor } from "../utils/remote-error.utils.js";

export interface ExtractionServiceOptions {
  baseUrl: string;
  timeoutMs: number;
  token?: string;
  /** Reported as the model name in diagnostics. */
  modelName?: string;
  dispatcher?: Dispatcher;
}

export interface ExtractResult {
  success: boolean;
  statusCode: number;
  body: string;
}

/** Base URL for the extract endpoint (no trailing slash). */
export function getExtractUrl(baseUrl: string): string {
  return `${baseUrl.replace(/\/$/, "")}/api/v1/price-lists/extract`;
}

export class ExtractionServiceClient implements IVisionBackend {
  readonly modelName: string;
  private dispatcher: Dispatcher;

  constructor(private options: ExtractionServiceOptions) {
    this.modelName = options.modelName ?? "extraction-service";
    this.dispatcher =
      options.dispatcher ??
      new Agent({ connectTimeout: options.timeoutMs, bodyTimeout: options.timeoutMs });
  }

  async extractFromImage(prompt: string, image: Buffer, options?: RemoteCallOptions): Promise<string> {
    const result = await this.post(prompt, image, options?.signal);
    if (result.success) return result.body;
    const snippet = result.body.slice(0, 300);
    throw remoteErrorFor(
      result.statusCode,
      `service.extract: HTTP ${result.statusCode}${snippet ? ` ${snippet}` : ""}`,
    );
  }

  private async post(prompt: string, image: Buffer, signal?: AbortSignal): Promise<ExtractResult> {
    const form = new FormData();
    form.append("file", new Blob([new Uint8Array(image)], { type: "image/png" }), "page.png");
    form.append("prompt", prompt);
    form.append("response_root", "products");

    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.options.token) headers.Authorization = `Bearer ${this.options.token}`;

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);
    const onAbort = () => controller.abort();
    if (signal?.aborted) controller.abort();
    else signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const res = await fetch(getExtractUrl(this.options.baseUrl), {
        method: "POST",
        headers,
        body: form,
        signal: controller.signal,
        dispatcher: this.dispatcher,
      });
      const body = await res.text();
      return { success: res.ok, statusCode: res.status, body };
    } catch (err) {
      if (signal?.aborted) {
        throw new RemoteTimeoutError("service.extract: aborted by deadline", { cause: err });
      }
      const cause = err instanceof Error && err.cause ? ` (${errorMessage(err.cause)})` : "";
      throw new RemoteTransientError(`service.extract: ${errorMessage(err)}${cause}`, { cause: err });
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}
