import { vi } from "vitest";
import type { BridgeConfig } from "../src/config.js";

export interface StubRequest {
  method: string;
  path:   string;
  body:   unknown;
}

export interface StubReply {
  status?:      number;
  json?:        unknown;
  /** Raw body; wins over `json`. */
  body?:        string | Uint8Array;
  contentType?: string;
  delayMs?:     number;
}

type Route = StubReply | ((req: StubRequest) => StubReply);

function wait(ms: number, signal: AbortSignal | null | undefined): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener("abort", () => {
      clearTimeout(timer);
      reject(new Error("The operation was aborted"));
    }, { once: true });
  });
}

/**
 * In-process stand-in for the CAD add-in's REST API, exposed as a fetch
 * implementation. Routes are keyed by "METHOD /path".
 */
export class StubAddin {
  readonly calls: StubRequest[] = [];
  /** When set, every request fails the way fetch does on ECONNREFUSED. */
  down = false;
  private readonly routes = new Map<string, Route>();

  constructor() {
    this.on("GET", "/health", { json: { status: "ok", fusion: "connected" } });
  }

  on(method: "GET" | "POST", path: string, route: Route): this {
    this.routes.set(`${method} ${path}`, route);
    return this;
  }

  count(method: string, path: string): number {
    return this.calls.filter((c) => c.method === method && c.path === path).length;
  }

  readonly fetch: typeof fetch = async (input, init) => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    const method = init?.method ?? "GET";
    const path = decodeURIComponent(new URL(url).pathname);
    if (this.down) {
      throw new TypeError("fetch failed", { cause: new Error("connect ECONNREFUSED 127.0.0.1:3001") });
    }
    const body: unknown = typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
    const req: StubRequest = { method, path, body };
    this.calls.push(req);

    const route = this.routes.get(`${method} ${path}`);
    const reply: StubReply = route === undefined
      ? { status: 404, json: { error: `Unknown endpoint: ${path}` } }
      : typeof route === "function" ? route(req) : route;

    if (reply.delayMs !== undefined) await wait(reply.delayMs, init?.signal);

    const payload = reply.body ?? JSON.stringify(reply.json ?? {});
    return new Response(payload, {
      status:  reply.status ?? 200,
      headers: { "content-type": reply.contentType ?? "application/json" },
    });
  };
}

export function testConfig(overrides: Partial<BridgeConfig> = {}): BridgeConfig {
  return {
    host:            "127.0.0.1",
    port:            0,
    addinUrl:        "http://127.0.0.1:3001",
    keepaliveMs:     10_000,
    ceilingMs:       600_000,
    addinTimeoutMs:  300_000,
    healthTimeoutMs: 5_000,
    graceMs:         30_000,
    readRetries:     0,
    maxScriptBytes:  100_000,
    ...overrides,
  };
}

/** Fake only the timer functions; undici's body reading relies on the real setImmediate. */
export function useTimerFakes(): void {
  vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout", "setInterval", "clearInterval", "Date"] });
}
