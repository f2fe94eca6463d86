import { parseArgs } from "node:util";
import { readFileSync, existsSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";

export const CONFIG_FILE_NAME = ".cad-bridge.json";

const OPTIONS = {
  "config":            { type: "string", short: "c" },
  "host":              { type: "string" },
  "port":              { type: "string", short: "p" },
  "addin-url":         { type: "string" },
  "keepalive-ms":      { type: "string" },
  "ceiling-ms":        { type: "string" },
  "addin-timeout-ms":  { type: "string" },
  "health-timeout-ms": { type: "string" },
  "grace-ms":          { type: "string" },
  "read-retries":      { type: "string" },
  "max-script-bytes":  { type: "string" },
} as const;

type OptionKey = Exclude<keyof typeof OPTIONS, "config">;

const positiveInt = z.coerce.number().int().positive();

// Node clamps timer delays above this to 1ms.
const MAX_TIMER_MS = 2_147_483_647;
const timerMs = positiveInt.max(MAX_TIMER_MS);

const ConfigSchema = z.object({
  host:            z.string().min(1),
  port:            z.coerce.number().int().min(0).max(65_535),
  addinUrl:        z.string().url().transform((u) => u.replace(/\/+$/, "")),
  keepaliveMs:     timerMs,
  ceilingMs:       timerMs,
  addinTimeoutMs:  timerMs,
  healthTimeoutMs: timerMs,
  graceMs:         z.coerce.number().int().min(0).max(MAX_TIMER_MS),
  readRetries:     z.coerce.number().int().min(0).max(5),
  maxScriptBytes:  positiveInt,
});

export type BridgeConfig = Readonly<z.infer<typeof ConfigSchema>>;

export const DEFAULTS: Record<OptionKey, string> = {
  "host":              "127.0.0.1",
  "port":              "8765",
  "addin-url":         "http://127.0.0.1:3001",
  "keepalive-ms":      "10000",
  "ceiling-ms":        "600000",
  "addin-timeout-ms":  "300000",
  "health-timeout-ms": "5000",
  "grace-ms":          "30000",
  "read-retries":      "0",
  "max-script-bytes":  "100000",
};

type ConfigFile = Partial<Record<OptionKey, string | number>>;

const ConfigFileSchema = z.record(z.union([z.string(), z.number()]));

function envName(key: OptionKey): string {
  return `CAD_BRIDGE_${key.replace(/-/g, "_").toUpperCase()}`;
}

function readConfigFile(path: string): ConfigFile {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    throw new ConfigError(`cannot read config file ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`config file ${path} must be a flat JSON object of strings and numbers`);
  }
  const file: ConfigFile = {};
  for (const key of Object.keys(DEFAULTS)) {
    if (!isOptionKey(key)) continue;
    const v = parsed.data[key];
    if (v !== undefined) file[key] = v;
  }
  return file;
}

function isOptionKey(key: string): key is OptionKey {
  return key in DEFAULTS;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/**
 * Resolve the bridge configuration. Precedence: CLI flag, then environment
 * (CAD_BRIDGE_PORT, ...), then the config file, then DEFAULTS.
 */
export function loadConfig(args: string[], opts: LoadConfigOptions = {}): BridgeConfig {
  const env = opts.env ?? process.env;
  const cwd = opts.cwd ?? env["INIT_CWD"] ?? process.cwd();

  const { values } = parseArgs({
    args: args.filter((a) => a !== "--"),
    options: OPTIONS,
    allowPositionals: true,
    strict: false,
  });

  const configPath = typeof values["config"] === "string" ? values["config"] : undefined;
  const resolvedConfigPath = configPath ??
    (existsSync(resolve(cwd, CONFIG_FILE_NAME)) ? CONFIG_FILE_NAME : undefined);

  let file: ConfigFile = {};
  if (resolvedConfigPath) {
    const abs = resolve(cwd, resolvedConfigPath);
    if (!existsSync(abs)) throw new ConfigError(`config file not found: ${abs}`);
    file = readConfigFile(abs);
  }

  function str(key: OptionKey): string {
    const flag = values[key];
    if (typeof flag === "string") return flag;
    const fromEnv = env[envName(key)];
    if (fromEnv !== undefined && fromEnv !== "") return fromEnv;
    const fromFile = file[key];
    if (fromFile !== undefined) return String(fromFile);
    return DEFAULTS[key];
  }

  const parsed = ConfigSchema.safeParse({
    host:            str("host"),
    port:            str("port"),
    addinUrl:        str("addin-url"),
    keepaliveMs:     str("keepalive-ms"),
    ceilingMs:       str("ceiling-ms"),
    addinTimeoutMs:  str("addin-timeout-ms"),
    healthTimeoutMs: str("health-timeout-ms"),
    graceMs:         str("grace-ms"),
    readRetries:     str("read-retries"),
    maxScriptBytes:  str("max-script-bytes"),
  });

  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`invalid configuration: ${problems.join("; ")}`);
  }
  if (parsed.data.keepaliveMs >= parsed.data.ceilingMs) {
    throw new ConfigError("keepalive-ms must be shorter than ceiling-ms");
  }

  return Object.freeze(parsed.data);
}

export function describeConfig(cfg: BridgeConfig): string {
  return `addin=${cfg.addinUrl} keepalive=${cfg.keepaliveMs}ms ceiling=${cfg.ceilingMs}ms ` +
    `addinTimeout=${cfg.addinTimeoutMs}ms grace=${cfg.graceMs}ms`;
}
