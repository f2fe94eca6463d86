#!/usr/bin/env node
import { loadConfig, describeConfig } from "./config.js";
import { PKG_VERSION } from "./version.js";

const USAGE = `usage: cad-bridge <command> [options]

commands:
  serve     HTTP server with /invoke, /invocations and /mcp (default)
  stdio     MCP over stdin/stdout
  health    check the bridge and the add-in; exit 0 ok, 1 add-in down, 2 bridge down

options:
  -c, --config <file>        JSON config file (default ./.cad-bridge.json when present)
  -p, --port <n>             --host <addr>       --addin-url <url>
  --keepalive-ms <n>         --ceiling-ms <n>    --addin-timeout-ms <n>
  --health-timeout-ms <n>    --grace-ms <n>      --read-retries <n>
  --max-script-bytes <n>
  -v, --version
`;

const args = process.argv.slice(2).filter((a) => a !== "--");
const first = args[0];
const cmd = first === undefined || first.startsWith("-") ? "serve" : first;
const rest = first === cmd ? args.slice(1) : args;

try {
  if (args.includes("--version") || args.includes("-v")) {
    process.stdout.write(`${PKG_VERSION}\n`);
  } else if (args.includes("--help") || args.includes("-h") || cmd === "help") {
    process.stdout.write(USAGE);
  } else if (cmd === "serve" || cmd === "server") {
    const cfg = loadConfig(rest);
    const { createRuntime } = await import("./runtime.js");
    const { startServer } = await import("./server.js");
    process.stderr.write(`[cad-bridge] ${describeConfig(cfg)}\n`);
    await startServer(createRuntime(cfg));
  } else if (cmd === "stdio") {
    const cfg = loadConfig(rest);
    const { createRuntime } = await import("./runtime.js");
    const { installProcessHandlers } = await import("./server.js");
    const { startStdio } = await import("./mcp.js");
    installProcessHandlers();
    await startStdio(createRuntime(cfg));
  } else if (cmd === "health") {
    const { runHealth } = await import("./health.js");
    process.exitCode = await runHealth(loadConfig(rest));
  } else {
    process.stderr.write(`unknown command: ${cmd}\n\n${USAGE}`);
    process.exitCode = 64;
  }
} catch (err) {
  process.stderr.write(`[cad-bridge] ${err instanceof Error ? err.message : String(err)}\n`);
  process.exitCode = 1;
}
