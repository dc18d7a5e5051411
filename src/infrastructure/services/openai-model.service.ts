import OpenAI from "openai";
import { RemoteCallError, RemoteTimeoutError, RemoteTransientError, errorMessage } from "../../core/domain/errors.js";
import type {
  ITextModelClient,
  IVisionBackend,
  RemoteCallOptions,
} from "../../core/domain/services/model-client.service.js";
import { remoteErrorFor } from "../utils/remote-error.utils.js";

export interface OpenAIModelOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
  /** Injected in tests. */
  client?: OpenAI;
}

/** SDK errors -> the pipeline's remote error classes. */
export function toRemoteError(e: unknown, operation: string): RemoteCallError {
  if (e instanceof RemoteCallError) return e;
  if (e instanceof OpenAI.APIUserAbortError) {
    return new RemoteTimeoutError(`${operation}: aborted`, { cause: e });
  }
  if (e instanceof OpenAI.APIConnectionTimeoutError) {
    return new RemoteTransientError(`${operation}: request timed out`, { cause: e });
  }
  if (e instanceof OpenAI.APIConnectionError) {
    return new RemoteTransientError(`${operation}: connection failed`, { cause: e });
  }
  if (e instanceof OpenAI.APIError) {
    return remoteErrorFor(e.status, `${operation}: ${e.message}`, e);
  }
  return remoteErrorFor(400, `${operation}: ${errorMessage(e)}`, e);
}

function createClient(options: OpenAIModelOptions): OpenAI {
  return (
    options.client ??
    // SDK retries off: RetryController owns them.
    new OpenAI({ apiKey: options.apiKey, maxRetries: 0, timeout: options.timeoutMs })
  );
}

async function completeJson(
  client: OpenAI,
  model: string,
  messages: OpenAI.ChatCompletionMessageParam[],
  operation: string,
  options?: RemoteCallOptions,
): Promise<string> {
  try {
    const completion = await client.chat.completions.create(
      {
        model,
        messages,
        temperature: 0,
        response_format: { type: "json_object" },
      },
      { signal: options?.signal },
    );
    return completion.choices[0]?.message?.content ?? "";
  } catch (e) {
    throw toRemoteError(e, operation);
  }
}

export class OpenAITextModelClient implements ITextModelClient {
  readonly modelName: string;
  private client: OpenAI;

  constructor(options: OpenAIModelOptions) {
    this.modelName = options.model;
    this.client = createClient(options);
  }

  async complete(prompt: string, text: string, options?: RemoteCallOptions): Promise<string> {
    return completeJson(
      this.client,
      this.modelName,
      [
        { role: "system", content: prompt },
        { role: "user", content: text },
      ],
      "openai.chat",
      options,
    );
  }
}

export class OpenAIVisionBackend implements IVisionBackend {
  readonly modelName: string;
  private client: OpenAI;

  constructor(options: OpenAIModelOptions) {
    this.modelName = options.model;
    this.client = createClient(options);
  }

  async extractFromImage(prompt: string, image: Buffer, options?: RemoteCallOptions): Promise<string> {
    return completeJson(
      this.client,
      this.modelName,
      [
        { role: "system", content: prompt },
        {
          role: "user",
          content: [
            { type: "text", text: "Extract the products on this page." },
            {
              type: "image_url",
              image_url: { url: `data:image/png;base64,${image.toString("base64")}`, detail: "high" },
            },
          ],
        },
      ],
      "openai.vision",
      options,
    );
  }
}
