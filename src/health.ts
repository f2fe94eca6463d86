import { AddinClient } from "./addin.js";
import type { BridgeConfig } from "./config.js";
import type { JsonValue } from "./types.js";

export const EXIT_HEALTHY       = 0;
export const EXIT_ADDIN_DOWN    = 1;
export const EXIT_BRIDGE_DOWN   = 2;

export interface HealthOptions {
  fetchImpl?: typeof fetch;
  out?:       (line: string) => void;
}

function localAddress(host: string): string {
  return host === "0.0.0.0" || host === "::" ? "127.0.0.1" : host;
}

function addinReportsOk(payload: JsonValue): boolean {
  return typeof payload === "object" && payload !== null && !Array.isArray(payload) && payload["status"] === "ok";
}

async function checkBridge(url: string, timeoutMs: number, fetchImpl: typeof fetch, out: (line: string) => void): Promise<boolean> {
  const ctrl = new AbortController();
  const timer = setTimeout(() => ctrl.abort(), timeoutMs);
  try {
    const resp = await fetchImpl(url, { headers: { "Accept": "application/json" }, signal: ctrl.signal });
    if (!resp.ok) {
      out(`bridge: HTTP ${resp.status} from ${url}`);
      return false;
    }
    out(`bridge: ok (${url})`);
    return true;
  } catch (err) {
    out(`bridge: not reachable at ${url} (${err instanceof Error ? err.message : String(err)})`);
    return false;
  } finally {
    clearTimeout(timer);
  }
}

async function checkAddin(cfg: BridgeConfig, fetchImpl: typeof fetch, out: (line: string) => void): Promise<boolean> {
  const addin = new AddinClient({ baseUrl: cfg.addinUrl, timeoutMs: cfg.healthTimeoutMs, fetchImpl });
  const result = await addin.call("/health");
  if (result.status !== "ok") {
    out(`add-in: ${result.status} (${result.error.message})`);
    return false;
  }
  if (!addinReportsOk(result.payload)) {
    out(`add-in: unhealthy ${JSON.stringify(result.payload)}`);
    return false;
  }
  out(`add-in: ok (${cfg.addinUrl})`);
  return true;
}

/**
 * `cad-bridge health`: check the running bridge, then the add-in behind it.
 * Both are always reported; a bridge that is down wins the exit code.
 */
export async function runHealth(cfg: BridgeConfig, opts: HealthOptions = {}): Promise<number> {
  const fetchImpl = opts.fetchImpl ?? fetch;
  const out = opts.out ?? ((line: string) => { process.stdout.write(`${line}\n`); });

  const bridgeUp = await checkBridge(`http://${localAddress(cfg.host)}:${cfg.port}/health`, cfg.healthTimeoutMs, fetchImpl, out);
  const addinUp = await checkAddin(cfg, fetchImpl, out);
  if (!bridgeUp) return EXIT_BRIDGE_DOWN;
  return addinUp ? EXIT_HEALTHY : EXIT_ADDIN_DOWN;
}
