import type { AddinEndpoint } from "../addin.js";
import type { ToolContext } from "../coordinator.js";
import { addinFailure, BridgeError } from "../errors.js";
import type { AddinCallResult, JsonValue } from "../types.js";

export interface ToolOptions {
  /** Extra attempts for read-only calls on host_unreachable or timeout. */
  readRetries:     number;
  healthTimeoutMs: number;
  maxScriptBytes:  number;
  /** Base delay between read retries. */
  retryDelayMs?:   number;
}

export function unwrap(result: AddinCallResult, opts: { keepTraceback?: boolean } = {}): JsonValue {
  if (result.status === "ok") return result.payload;
  throw addinFailure(result, opts);
}

/** Path segment taken from user input; the add-in unquotes it. */
export function segment(name: string): string {
  return encodeURIComponent(name);
}

function pause(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new BridgeError("Cancelled", "cancelled while waiting to retry"));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new BridgeError("Cancelled", "cancelled while waiting to retry"));
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * GET a read-only endpoint. Reads are safe to replay, so transport-level
 * failures are retried up to `retries` times; add-in errors never are.
 */
export async function read(ctx: ToolContext, endpoint: AddinEndpoint, opts: ToolOptions): Promise<JsonValue> {
  const delay = opts.retryDelayMs ?? 500;
  let result = await ctx.call(endpoint, "GET");
  for (let attempt = 1; attempt <= opts.readRetries; attempt++) {
    if (result.status !== "host_unreachable" && result.status !== "timeout") break;
    await pause(delay * attempt, ctx.signal);
    result = await ctx.call(endpoint, "GET");
  }
  return unwrap(result);
}

/** POST to a mutating endpoint exactly once. */
export async function write(ctx: ToolContext, endpoint: AddinEndpoint, payload: JsonValue): Promise<JsonValue> {
  return unwrap(await ctx.call(endpoint, "POST", payload));
}
