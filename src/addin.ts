/**
 * REST client for the CAD host add-in.
 *
 * Every call resolves to an AddinCallResult; nothing thrown by fetch, the
 * add-in or its response body escapes this module. Retries are not done here:
 * whether a call may be replayed is the calling tool's decision.
 */

import type { AddinCallResult, HttpMethod, JsonValue } from "./types.js";

export type AddinEndpoint =
  | "/health"
  | "/document"
  | "/components"
  | "/sketches"
  | `/sketches/${string}`
  | "/bodies"
  | `/bodies/${string}`
  | "/parameters"
  | "/screenshot"
  | "/versions"
  | "/run_script"
  | "/sketch/create"
  | "/sketch/circle"
  | "/sketch/rectangle"
  | "/extrude"
  | "/component/activate"
  | "/visibility"
  | "/version/restore";

const KNOWN_ENDPOINTS: RegExp[] = [
  /^\/health$/,
  /^\/document$/,
  /^\/components$/,
  /^\/sketches$/,
  /^\/sketches\/[^/]+$/,
  /^\/bodies$/,
  /^\/bodies\/[^/]+$/,
  /^\/parameters$/,
  /^\/screenshot$/,
  /^\/versions$/,
  /^\/run_script$/,
  /^\/sketch\/(create|circle|rectangle)$/,
  /^\/extrude$/,
  /^\/component\/activate$/,
  /^\/visibility$/,
  /^\/version\/restore$/,
];

export function isKnownEndpoint(path: string): boolean {
  return KNOWN_ENDPOINTS.some((re) => re.test(path));
}

export const HOST_UNREACHABLE_MESSAGE = "CAD add-in not running or not loaded";

export interface AddinClientOptions {
  baseUrl:    string;
  timeoutMs:  number;
  fetchImpl?: typeof fetch;
}

type ResponseReader = (resp: Response) => Promise<AddinCallResult>;

export class AddinClient {
  readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(opts: AddinClientOptions) {
    this.baseUrl   = opts.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = opts.timeoutMs;
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  /** Issue one JSON request to the add-in. */
  async call(
    endpoint: AddinEndpoint,
    method: HttpMethod = "GET",
    payload?: JsonValue,
    timeoutMs: number = this.timeoutMs,
  ): Promise<AddinCallResult> {
    const init: RequestInit = method === "POST"
      ? {
          method,
          headers: { "Content-Type": "application/json", "Accept": "application/json" },
          body:    JSON.stringify(payload ?? {}),
        }
      : { method, headers: { "Accept": "application/json" } };
    return this.request(endpoint, init, timeoutMs, readJson);
  }

  /** Fetch a binary endpoint (the viewport capture); payload is { data: base64, mimeType }. */
  async image(endpoint: AddinEndpoint, timeoutMs: number = this.timeoutMs): Promise<AddinCallResult> {
    return this.request(endpoint, { method: "GET", headers: { "Accept": "image/png" } }, timeoutMs, readImage);
  }

  private async request(
    endpoint: string,
    init: RequestInit,
    timeoutMs: number,
    read: ResponseReader,
  ): Promise<AddinCallResult> {
    const method = init.method ?? "GET";
    if (!isKnownEndpoint(endpoint)) {
      return { status: "host_error", error: { message: `unknown add-in endpoint: ${endpoint}` } };
    }

    const ctrl = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      ctrl.abort();
    }, timeoutMs);

    try {
      const resp = await this.fetchImpl(`${this.baseUrl}${endpoint}`, { ...init, signal: ctrl.signal });
      const result = await read(resp);
      if (result.status !== "ok") {
        process.stderr.write(`[addin] ${method} ${endpoint} -> ${result.status}: ${result.error.message}\n`);
      }
      return result;
    } catch (err) {
      if (timedOut) {
        process.stderr.write(`[addin] ${method} ${endpoint} -> timeout after ${timeoutMs}ms\n`);
        return { status: "timeout", error: { message: `add-in did not answer ${endpoint} within ${timeoutMs}ms` } };
      }
      process.stderr.write(`[addin] ${method} ${endpoint} -> unreachable: ${describeFetchError(err)}\n`);
      return { status: "host_unreachable", error: { message: HOST_UNREACHABLE_MESSAGE } };
    } finally {
      clearTimeout(timer);
    }
  }
}

function describeFetchError(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  const cause = err.cause instanceof Error ? `: ${err.cause.message}` : "";
  return `${err.message}${cause}`;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function parseBody(text: string): JsonValue | undefined {
  try {
    const body: JsonValue = JSON.parse(text);
    return body;
  } catch {
    return undefined;
  }
}

/** Error bodies from the add-in look like { error, traceback? }. */
function errorFromBody(status: number, text: string): AddinCallResult {
  const body = parseBody(text);
  const message = isRecord(body) ? body["error"] : undefined;
  if (isRecord(body) && typeof message === "string") {
    const traceback = body["traceback"];
    return {
      status: "host_error",
      error:  typeof traceback === "string" ? { message, status, traceback } : { message, status },
    };
  }
  const snippet = text.trim().slice(0, 200);
  return { status: "host_error", error: { message: snippet ? `HTTP ${status}: ${snippet}` : `HTTP ${status}`, status } };
}

const readJson: ResponseReader = async (resp) => {
  const text = await resp.text();
  if (!resp.ok) return errorFromBody(resp.status, text);

  const body = parseBody(text);
  if (body === undefined) {
    return { status: "host_error", error: { message: "malformed response body from add-in", status: resp.status } };
  }
  if (isRecord(body) && typeof body["error"] === "string") {
    return errorFromBody(resp.status, text);
  }
  return { status: "ok", payload: body };
};

const readImage: ResponseReader = async (resp) => {
  const contentType = resp.headers.get("content-type") ?? "";
  if (!resp.ok) return errorFromBody(resp.status, await resp.text());
  if (!contentType.startsWith("image/")) {
    const failure = errorFromBody(resp.status, await resp.text());
    if (failure.status !== "ok" && failure.error.message.startsWith("HTTP ")) {
      return { status: "host_error", error: { message: "add-in returned no image data", status: resp.status } };
    }
    return failure;
  }
  const bytes = Buffer.from(await resp.arrayBuffer());
  if (bytes.length === 0) {
    return { status: "host_error", error: { message: "add-in returned an empty image", status: resp.status } };
  }
  return {
    status:  "ok",
    payload: { data: bytes.toString("base64"), mimeType: contentType.split(";")[0]?.trim() || "image/png" },
  };
};
