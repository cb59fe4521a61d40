export type AiErrorKind =
  | "configuration"
  | "connectivity"
  | "timeout"
  | "auth"
  | "rate_limit"
  | "server"
  | "bad_response";

const RETRYABLE_KINDS: ReadonlySet<AiErrorKind> = new Set([
  "connectivity",
  "timeout",
  "rate_limit",
  "server",
]);

const NETWORK_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EPIPE",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
]);

export class AiProviderError extends Error {
  readonly kind: AiErrorKind;
  /** Upstream HTTP status, when the failure came with one. */
  readonly status: number | undefined;

  constructor(kind: AiErrorKind, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "AiProviderError";
    this.kind = kind;
    this.status = options.status;
  }

  get retryable(): boolean {
    return isRetryableKind(this.kind);
  }
}

export function isRetryableKind(kind: AiErrorKind): boolean {
  return RETRYABLE_KINDS.has(kind);
}

export function kindForStatus(status: number): AiErrorKind {
  if (status === 401 || status === 403) return "auth";
  if (status === 429) return "rate_limit";
  if (status === 408 || status === 504) return "timeout";
  if (status >= 500) return "server";
  return "bad_response";
}

function errorCode(err: unknown, depth = 0): string | undefined {
  if (typeof err !== "object" || err === null || depth > 3) return undefined;
  if ("code" in err && typeof err.code === "string") return err.code;
  return "cause" in err ? errorCode(err.cause, depth + 1) : undefined;
}

function httpStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if ("status" in err && typeof err.status === "number") return err.status;
  if ("statusCode" in err && typeof err.statusCode === "number") return err.statusCode;
  if ("$metadata" in err && typeof err.$metadata === "object" && err.$metadata !== null) {
    const metadata = err.$metadata;
    if ("httpStatusCode" in metadata && typeof metadata.httpStatusCode === "number") {
      return metadata.httpStatusCode;
    }
  }
  return undefined;
}

/**
 * Classifies anything thrown by an SDK, fetch or our own code. Errors that
 * carry an HTTP status are classified by status, then timeouts and network
 * failures by name/code; everything else is a bad response.
 */
export function toAiProviderError(err: unknown): AiProviderError {
  if (err instanceof AiProviderError) return err;

  const message = err instanceof Error ? err.message : String(err);
  const name = err instanceof Error ? err.name : "";
  const status = httpStatus(err);

  if (status !== undefined && status >= 400) {
    return new AiProviderError(kindForStatus(status), message, { status, cause: err });
  }

  if (name === "TimeoutError" || /timed? ?out/i.test(message)) {
    return new AiProviderError("timeout", message, { cause: err });
  }

  const code = errorCode(err);
  if (
    (code !== undefined && NETWORK_ERROR_CODES.has(code)) ||
    (err instanceof TypeError && message === "fetch failed")
  ) {
    return new AiProviderError("connectivity", message, { cause: err });
  }

  return new AiProviderError("bad_response", message, { cause: err });
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
