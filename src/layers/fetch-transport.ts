/**
 * Transport primitive. One request yields one (status, body) or one fault.
 * FetchTransport is the default implementation over Node's global fetch.
 */

import { TransportError } from "./transport-error.js";

export interface TransportRequest {
  url: string;
  method: "GET";
  headers: Record<string, string>;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface TransportResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export interface Transport {
  /** Rejects with a TransportError for I/O failures; HTTP errors resolve normally */
  send(request: TransportRequest): Promise<TransportResponse>;
}

type FetchFn = (input: string, init: { method: string; headers: Record<string, string>; signal: AbortSignal }) => Promise<Response>;

const TRUST_CODES = new Set([
  "CERT_HAS_EXPIRED",
  "CERT_NOT_YET_VALID",
  "CERT_UNTRUSTED",
  "CERT_REVOKED",
  "DEPTH_ZERO_SELF_SIGNED_CERT",
  "SELF_SIGNED_CERT_IN_CHAIN",
  "UNABLE_TO_VERIFY_LEAF_SIGNATURE",
  "UNABLE_TO_GET_ISSUER_CERT_LOCALLY",
  "ERR_TLS_CERT_ALTNAME_INVALID",
]);

const CONNECTIVITY_CODES = new Set([
  "ENOTFOUND",
  "EAI_AGAIN",
  "ECONNREFUSED",
  "ECONNRESET",
  "ENETDOWN",
  "ENETUNREACH",
  "EHOSTUNREACH",
  "EPIPE",
  "UND_ERR_SOCKET",
]);

const TIMEOUT_CODES = new Set([
  "ETIMEDOUT",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

/** First `code` found walking the cause chain (undici nests the socket error) */
export function errorCode(err: unknown): string | undefined {
  let current: unknown = err;
  for (let depth = 0; depth < 5; depth++) {
    if (typeof current !== "object" || current === null) return undefined;
    if ("code" in current && typeof current.code === "string") return current.code;
    current = "cause" in current ? current.cause : undefined;
  }
  return undefined;
}

export function classifyNetworkError(err: unknown): TransportError {
  if (err instanceof TransportError) return err;
  const code = errorCode(err);
  if (code !== undefined) {
    if (TRUST_CODES.has(code) || code.startsWith("ERR_SSL_")) return TransportError.of("trustFailure", err);
    if (CONNECTIVITY_CODES.has(code)) return TransportError.of("noConnectivity", err);
    if (TIMEOUT_CODES.has(code)) return TransportError.of("timeout", err);
  }
  return TransportError.of("unknown", err);
}

export class FetchTransport implements Transport {
  private fetchFn: FetchFn;

  constructor(fetchFn: FetchFn = (input, init) => fetch(input, init)) {
    this.fetchFn = fetchFn;
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    if (request.signal?.aborted) throw TransportError.of("cancelled");

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, request.timeoutMs);
    const onAbort = () => controller.abort();
    request.signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const resp = await this.fetchFn(request.url, {
        method: request.method,
        headers: request.headers,
        signal: controller.signal,
      });
      const body = await resp.text();
      const headers: Record<string, string> = {};
      resp.headers.forEach((value, key) => {
        headers[key] = value;
      });
      return { status: resp.status, headers, body };
    } catch (err) {
      if (timedOut) throw TransportError.of("timeout", err);
      if (request.signal?.aborted) throw TransportError.of("cancelled", err);
      throw classifyNetworkError(err);
    } finally {
      clearTimeout(timer);
      request.signal?.removeEventListener("abort", onAbort);
    }
  }
}
