export interface RemoteCallOptions {
  signal?: AbortSignal;
}

/**
 * Remote model call sites. Implementations translate every failure into
 * `RemoteTransientError`, `RemotePermanentError` or `RemoteTimeoutError`.
 */
export interface ITextModelClient {
  readonly modelName: string;
  complete(prompt: string, text: string, options?: RemoteCallOptions): Promise<string>;
}

export interface IVisionBackend {
  readonly modelName: string;
  /** Reply text expected to hold `{"products": [...]}`. */
  extractFromImage(prompt: string, image: Buffer, options?: RemoteCallOptions): Promise<string>;
}
