import { AddinClient } from "./addin.js";
import type { BridgeConfig } from "./config.js";
import { Coordinator } from "./coordinator.js";
import { OperationRegistry } from "./registry.js";
import { SessionTable } from "./session.js";
import { CallStats } from "./stats.js";
import { registerCadTools } from "./tools/index.js";

/** Everything both transports share. One per process. */
export interface BridgeRuntime {
  readonly config:      BridgeConfig;
  readonly addin:       AddinClient;
  readonly registry:    OperationRegistry;
  readonly coordinator: Coordinator;
  readonly sessions:    SessionTable;
  readonly stats:       CallStats;
}

export interface RuntimeOptions {
  fetchImpl?:    typeof fetch;
  retryDelayMs?: number;
}

/** Wire the bridge together. Throws RegistryError when the catalogue is inconsistent. */
export function createRuntime(config: BridgeConfig, opts: RuntimeOptions = {}): BridgeRuntime {
  const addin = new AddinClient({ baseUrl: config.addinUrl, timeoutMs: config.addinTimeoutMs, fetchImpl: opts.fetchImpl });
  const registry    = new OperationRegistry();
  const coordinator = new Coordinator({ addin, keepaliveMs: config.keepaliveMs, ceilingMs: config.ceilingMs });
  const stats       = new CallStats();
  const sessions    = new SessionTable({ registry, coordinator, graceMs: config.graceMs, stats });

  registerCadTools(
    registry,
    {
      readRetries:     config.readRetries,
      healthTimeoutMs: config.healthTimeoutMs,
      maxScriptBytes:  config.maxScriptBytes,
      retryDelayMs:    opts.retryDelayMs,
    },
    () => sessions.liveness(),
  );

  return { config, addin, registry, coordinator, sessions, stats };
}
