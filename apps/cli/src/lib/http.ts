/**
 * HTTP helpers — thin wrappers around native fetch for the depository.
 *
 * Multi-endpoint support:
 *   fetchWithRotation() tries each base URL in order, rotating on network
 *   errors (connection refused, timeout, DNS failure). 4xx/5xx responses
 *   from a reachable server are NOT retried (the request was delivered).
 *
 * Every response body is checked against a TypeBox schema before it is
 * handed back, so callers get typed values without trusting the wire.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

/** Timeout for each individual fetch attempt (ms). */
const FETCH_TIMEOUT_MS = 30_000;

/** Depository error body: { error, detail }. */
const ErrorBody = Type.Object({
  error: Type.String(),
  detail: Type.Optional(Type.String()),
});

/** Non-2xx from a reachable depository. */
export class HttpError extends Error {
  constructor(
    readonly method: string,
    readonly path: string,
    readonly status: number,
    /** Error code from the body (e.g. "SlippageExceeded"), if it had one. */
    readonly code: string | undefined,
    readonly detail: string,
  ) {
    super(`${method} ${path} → ${status}${code ? ` ${code}` : ""}${detail ? `: ${detail}` : ""}`);
    this.name = "HttpError";
  }
}

/** Is this an error that means the server is unreachable (worth retrying next endpoint)? */
export function isNetworkError(err: unknown): boolean {
  if (err instanceof TypeError) return true; // fetch() network errors are TypeError
  if (err instanceof Error) {
    const msg = err.message.toLowerCase();
    return (
      msg.includes("econnrefused") ||
      msg.includes("enotfound") ||
      msg.includes("etimedout") ||
      msg.includes("econnreset") ||
      msg.includes("fetch failed") ||
      msg.includes("network") ||
      msg.includes("abort")
    );
  }
  return false;
}

/**
 * Try a fetch against multiple base URLs with rotation.
 * On network error, the next endpoint is tried; anything else propagates.
 */
export async function fetchWithRotation(
  baseUrls: string[],
  buildRequest: (baseUrl: string) => { url: string; init?: RequestInit },
): Promise<Response> {
  if (baseUrls.length === 0) {
    throw new Error("No endpoints configured");
  }

  const errors: Array<{ url: string; error: string }> = [];

  for (const base of baseUrls) {
    const { url, init } = buildRequest(base);
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), FETCH_TIMEOUT_MS);
    try {
      return await fetch(url, { ...init, signal: controller.signal });
    } catch (err) {
      if (!isNetworkError(err)) throw err;
      errors.push({ url, error: err instanceof Error ? err.message : String(err) });
    } finally {
      clearTimeout(timeout);
    }
  }

  const detail = errors.map((e) => `  ${e.url}: ${e.error}`).join("\n");
  throw new Error(`All ${baseUrls.length} endpoint(s) unreachable:\n${detail}`);
}

/** Turn a non-2xx body into an HttpError, keeping the depository's error code. */
export function errorFromBody(method: string, path: string, status: number, text: string): HttpError {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return new HttpError(method, path, status, undefined, text);
  }
  if (Value.Check(ErrorBody, parsed)) {
    return new HttpError(method, path, status, parsed.error, parsed.detail ?? "");
  }
  return new HttpError(method, path, status, undefined, text);
}

async function readBody<T extends TSchema>(
  res: Response,
  method: string,
  path: string,
  schema: T,
): Promise<Static<T>> {
  if (!res.ok) {
    const text = await res.text().catch(() => "");
    throw errorFromBody(method, path, res.status, text);
  }
  const body: unknown = await res.json();
  if (!Value.Check(schema, body)) {
    const first = Value.Errors(schema, body).First();
    throw new Error(`${method} ${path}: unexpected response${first ? ` (${first.path}: ${first.message})` : ""}`);
  }
  return body;
}

/** JSON GET with multi-endpoint rotation. `path` is appended to each base URL in turn. */
export async function httpGetRotate<T extends TSchema>(
  baseUrls: string[],
  path: string,
  schema: T,
): Promise<Static<T>> {
  const res = await fetchWithRotation(baseUrls, (base) => ({ url: `${base}${path}` }));
  return readBody(res, "GET", path, schema);
}

/** JSON POST with multi-endpoint rotation. */
export async function httpPostRotate<T extends TSchema>(
  baseUrls: string[],
  path: string,
  body: unknown,
  schema: T,
): Promise<Static<T>> {
  const res = await fetchWithRotation(baseUrls, (base) => ({
    url: `${base}${path}`,
    init: {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(body),
    },
  }));
  return readBody(res, "POST", path, schema);
}
