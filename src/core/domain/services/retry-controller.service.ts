import { setTimeout as delay } from "node:timers/promises";
import type { ILogger } from "./logger.service.js";
import {
  type FailureClass,
  RemoteCallError,
  RemoteTimeoutError,
  errorMessage,
} from "../errors.js";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  /** Upper bound of a single wait between attempts. */
  maxWaitMs: number;
  classify?: (error: unknown) => FailureClass;
  logger?: ILogger;
  sleep?: Sleep;
}

export interface RetryCallContext {
  /** Remote call site, e.g. "openai.chat" or "service.extract". */
  operation: string;
  signal?: AbortSignal;
  sourceFile?: string;
  page?: number;
}

export interface AttemptState {
  attempts: number;
  lastFailure?: FailureClass;
  waitedMs: number;
}

/** Remote errors carry their own class; anything else is not worth retrying. */
export function classifyFailure(error: unknown): FailureClass {
  return error instanceof RemoteCallError ? error.classification : "permanent";
}

const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * Wraps a remote call: transient failures are retried with exponential backoff
 * capped at `maxWaitMs`, permanent ones are rethrown at once, and an aborted
 * signal fails with `RemoteTimeoutError` whatever budget is left.
 */
export class RetryController {
  private readonly classify: (error: unknown) => FailureClass;
  private readonly sleep: Sleep;

  constructor(private readonly options: RetryOptions) {
    this.classify = options.classify ?? classifyFailure;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /** Wait before retry number `attempt` (1-based). */
  delayFor(attempt: number): number {
    const raw = this.options.baseDelayMs * 2 ** (attempt - 1);
    return Math.min(this.options.maxWaitMs, raw);
  }

  async run<T>(
    call: (attempt: number) => Promise<T>,
    ctx: RetryCallContext,
  ): Promise<T> {
    const state: AttemptState = { attempts: 0, waitedMs: 0 };

    for (;;) {
      this.checkDeadline(ctx, state);
      state.attempts += 1;
      try {
        return await call(state.attempts);
      } catch (e) {
        this.checkDeadline(ctx, state, e);
        const failure = this.classify(e);
        state.lastFailure = failure;
        if (failure === "timeout") {
          throw e instanceof RemoteTimeoutError
            ? e
            : new RemoteTimeoutError(`${ctx.operation}: ${errorMessage(e)}`, { cause: e });
        }
        if (failure === "permanent" || state.attempts > this.options.maxRetries) {
          throw e;
        }

        const wait = this.delayFor(state.attempts);
        this.options.logger?.log({
          event: "retry.scheduled",
          level: "warn",
          message: `${ctx.operation} failed (${errorMessage(e)}); retry ${state.attempts}/${this.options.maxRetries} in ${wait}ms`,
          operation: ctx.operation,
          sourceFile: ctx.sourceFile,
          page: ctx.page,
          attempt: state.attempts,
          waitMs: wait,
          waitedMs: state.waitedMs,
        });
        try {
          await this.sleep(wait, ctx.signal);
        } catch (sleepError) {
          this.checkDeadline(ctx, state, sleepError);
          throw sleepError;
        }
        state.waitedMs += wait;
      }
    }
  }

  private checkDeadline(ctx: RetryCallContext, state: AttemptState, cause?: unknown): void {
    if (!ctx.signal?.aborted) return;
    state.lastFailure = "timeout";
    throw new RemoteTimeoutError(
      `${ctx.operation}: deadline reached after ${state.attempts} attempt(s)`,
      { cause: cause ?? ctx.signal.reason },
    );
  }
}
