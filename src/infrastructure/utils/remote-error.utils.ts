import {
  type FailureClass,
  RemoteCallError,
  RemotePermanentError,
  RemoteTransientError,
} from "../../core/domain/errors.js";

/** 408, 409, 429 and 5xx are worth retrying; other 4xx are not. A missing status means the request never got an answer. */
export function classifyHttpStatus(status: number | undefined): Exclude<FailureClass, "timeout"> {
  if (status === undefined || status === 0) return "transient";
  if (status === 408 || status === 409 || status === 429) return "transient";
  if (status >= 500) return "transient";
  return "permanent";
}

export function remoteErrorFor(
  status: number | undefined,
  message: string,
  cause?: unknown,
): RemoteCallError {
  const options = { cause, statusCode: status };
  return classifyHttpStatus(status) === "transient"
    ? new RemoteTransientError(message, options)
    : new RemotePermanentError(message, options);
}
