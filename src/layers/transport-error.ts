/**
 * Transport Fault Taxonomy
 * Closed set of failure kinds produced at the network boundary.
 * Everything above the transport classifies failures in these terms.
 */

export type TransportFault =
  | { kind: "timeout" }
  | { kind: "noConnectivity" }
  | { kind: "rateLimited"; retryAfterMs?: number }
  | { kind: "serverError"; status: number }
  | { kind: "clientError"; status: number }
  | { kind: "decodingError" }
  | { kind: "trustFailure" }
  | { kind: "cancelled" }
  | { kind: "unknown" };

export type TransportFaultKind = TransportFault["kind"];

const RETRYABLE: ReadonlySet<TransportFaultKind> = new Set(["timeout", "rateLimited", "serverError"]);

export class TransportError extends Error {
  readonly fault: TransportFault;

  constructor(fault: TransportFault, message?: string, options?: { cause?: unknown }) {
    super(message ?? describeFault(fault), options);
    this.name = "TransportError";
    this.fault = fault;
  }

  get kind(): TransportFaultKind {
    return this.fault.kind;
  }

  get retryable(): boolean {
    return RETRYABLE.has(this.fault.kind);
  }

  static of(kind: "timeout" | "noConnectivity" | "decodingError" | "trustFailure" | "cancelled" | "unknown", cause?: unknown): TransportError {
    return new TransportError({ kind }, undefined, cause === undefined ? undefined : { cause });
  }
}

export function describeFault(fault: TransportFault): string {
  switch (fault.kind) {
    case "timeout":
      return "Request timed out";
    case "noConnectivity":
      return "No network connectivity";
    case "rateLimited":
      return fault.retryAfterMs !== undefined
        ? `Rate limit exceeded, retry after ${fault.retryAfterMs}ms`
        : "Rate limit exceeded";
    case "serverError":
      return `Server error: HTTP ${fault.status}`;
    case "clientError":
      return `Client error: HTTP ${fault.status}`;
    case "decodingError":
      return "Failed to decode response";
    case "trustFailure":
      return "Server identity could not be verified";
    case "cancelled":
      return "Request cancelled";
    case "unknown":
      return "Unknown transport failure";
  }
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}

/** Normalize anything thrown below the client into the taxonomy */
export function toTransportError(err: unknown): TransportError {
  if (err instanceof TransportError) return err;
  if (isAbortError(err)) return TransportError.of("cancelled", err);
  return TransportError.of("unknown", err);
}

/**
 * Map an HTTP status to a fault. Returns null for 2xx/3xx.
 * 429 carries the Retry-After hint when the server sent one.
 */
export function faultForStatus(
  status: number,
  headers: Record<string, string> = {},
  now: number = Date.now(),
): TransportFault | null {
  if (status === 429) {
    const retryAfterMs = parseRetryAfterMs(headerValue(headers, "retry-after"), now);
    return retryAfterMs === undefined ? { kind: "rateLimited" } : { kind: "rateLimited", retryAfterMs };
  }
  if (status >= 500) return { kind: "serverError", status };
  if (status >= 400) return { kind: "clientError", status };
  return null;
}

/** Retry-After is either delta-seconds or an HTTP date */
export function parseRetryAfterMs(value: string | undefined, now: number = Date.now()): number | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  if (trimmed === "") return undefined;

  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }

  const dateMs = Date.parse(trimmed);
  if (Number.isNaN(dateMs)) return undefined;
  return Math.max(0, dateMs - now);
}

function headerValue(headers: Record<string, string>, name: string): string | undefined {
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === name) return value;
  }
  return undefined;
}
