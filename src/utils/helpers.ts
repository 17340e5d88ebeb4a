import { ConnectionError } from "./errors";

const TRANSIENT_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ECONNABORTED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EPIPE",
  "ERR_NETWORK",
]);

export function isNotFoundError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  return (
    (error.stack ?? "").includes("404") ||
    error.message.includes("Not Found") ||
    error.message.includes("404") ||
    ("code" in error && error.code === 404) ||
    ("status" in error && error.status === 404)
  );
}

/**
 * True for failures of the transport itself: socket errors, requests that got
 * no HTTP response and gateway-side 5xx responses. Follows `cause` chains.
 */
export function isConnectionError(error: unknown): boolean {
  if (error instanceof ConnectionError) {
    return true;
  }
  if (!(error instanceof Error)) {
    return false;
  }

  if ("code" in error && typeof error.code === "string" && TRANSIENT_ERROR_CODES.has(error.code)) {
    return true;
  }

  if (error.name === "BeeResponseError" && "status" in error) {
    const { status } = error;
    if (status === undefined || (typeof status === "number" && status >= 500)) {
      return true;
    }
  }

  return error.cause !== undefined && isConnectionError(error.cause);
}
