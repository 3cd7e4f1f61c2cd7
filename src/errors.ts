export type DeliveryErrorKind =
  | "timeout"
  | "network"
  | "http"
  | "stream"
  | "protocol"
  | "unknown";

/**
 * Failure raised by a delivery implementation for a single attempt.
 * `retryable` carries the transport's own classification; the retry
 * policy decides whether to honour it.
 */
export class DeliveryError extends Error {
  readonly kind: DeliveryErrorKind;
  readonly status: number | null;
  readonly retryable: boolean;

  constructor(
    kind: DeliveryErrorKind,
    message: string,
    options: { status?: number | null; retryable?: boolean; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "DeliveryError";
    this.kind = kind;
    this.status = options.status ?? null;
    this.retryable = options.retryable ?? true;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * 408, 429 and 5xx are worth another attempt; any other 4xx is not.
 */
export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export function httpError(service: string, status: number, detail: string): DeliveryError {
  return new DeliveryError("http", `${service} ${status}: ${detail}`, {
    status,
    retryable: isRetryableStatus(status),
  });
}

function errorName(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "name" in err && typeof err.name === "string") {
    return err.name;
  }
  return undefined;
}

/**
 * Map a rejected fetch (or body read) to a DeliveryError. An aborted
 * AbortSignal.timeout() surfaces as a TimeoutError DOMException.
 */
export function transportError(err: unknown, timeoutMs: number): DeliveryError {
  if (err instanceof DeliveryError) {
    return err;
  }
  const name = errorName(err);
  if (name === "TimeoutError" || name === "AbortError") {
    return new DeliveryError("timeout", `Request timed out after ${timeoutMs}ms`, { cause: err });
  }
  return new DeliveryError("network", `Connection failed: ${errorMessage(err)}`, { cause: err });
}

export function errorMessage(err: unknown): string {
  if (err instanceof DeliveryError) {
    return err.message;
  }
  if (err instanceof Error) {
    const cause = err.cause instanceof Error ? ` (${err.cause.message})` : "";
    return `${err.message}${cause}`;
  }
  return String(err);
}
