import test from "node:test";
import assert from "node:assert/strict";
import {
  TransportError,
  faultForStatus,
  parseRetryAfterMs,
  toTransportError,
} from "../src/layers/transport-error.js";

test("429 maps to rateLimited with the Retry-After hint", () => {
  assert.deepEqual(faultForStatus(429, { "Retry-After": "2" }), { kind: "rateLimited", retryAfterMs: 2000 });
  assert.deepEqual(faultForStatus(429, {}), { kind: "rateLimited" });
});

test("5xx, other 4xx and success statuses", () => {
  assert.deepEqual(faultForStatus(503), { kind: "serverError", status: 503 });
  assert.deepEqual(faultForStatus(404), { kind: "clientError", status: 404 });
  assert.deepEqual(faultForStatus(401), { kind: "clientError", status: 401 });
  assert.equal(faultForStatus(200), null);
});

test("Retry-After accepts seconds or an HTTP date", () => {
  const now = Date.parse("Wed, 21 Oct 2015 07:28:00 GMT");
  assert.equal(parseRetryAfterMs("Wed, 21 Oct 2015 07:28:05 GMT", now), 5000);
  assert.equal(parseRetryAfterMs("Wed, 21 Oct 2015 07:27:00 GMT", now), 0);
  assert.equal(parseRetryAfterMs("3", now), 3000);
  assert.equal(parseRetryAfterMs("soon", now), undefined);
  assert.equal(parseRetryAfterMs(undefined, now), undefined);
});

test("only timeout, rateLimited and serverError are retryable", () => {
  assert.equal(TransportError.of("timeout").retryable, true);
  assert.equal(new TransportError({ kind: "rateLimited" }).retryable, true);
  assert.equal(new TransportError({ kind: "serverError", status: 502 }).retryable, true);
  assert.equal(new TransportError({ kind: "clientError", status: 400 }).retryable, false);
  assert.equal(TransportError.of("decodingError").retryable, false);
  assert.equal(TransportError.of("trustFailure").retryable, false);
  assert.equal(TransportError.of("noConnectivity").retryable, false);
  assert.equal(TransportError.of("cancelled").retryable, false);
  assert.equal(TransportError.of("unknown").retryable, false);
});

test("toTransportError normalizes foreign errors", () => {
  const abort = new Error("Aborted");
  abort.name = "AbortError";
  assert.equal(toTransportError(abort).kind, "cancelled");

  const boom = new Error("boom");
  const wrapped = toTransportError(boom);
  assert.equal(wrapped.kind, "unknown");
  assert.equal(wrapped.cause, boom);

  const known = TransportError.of("timeout");
  assert.equal(toTransportError(known), known);
});

test("messages describe the fault", () => {
  const err = new TransportError({ kind: "serverError", status: 500 });
  assert.equal(err.name, "TransportError");
  assert.equal(err.message, "Server error: HTTP 500");
  assert.equal(err.kind, "serverError");
});
