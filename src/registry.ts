import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import { BridgeError, RegistryError } from "./errors.js";
import type { ToolContext } from "./coordinator.js";
import type { DurationClass, JsonValue } from "./types.js";

export type ToolHandler<I> = (input: I, ctx: ToolContext) => Promise<JsonValue>;

/** Work that has passed validation and only needs a context to run. */
export type BoundWork = (ctx: ToolContext) => Promise<JsonValue>;

export type BindResult =
  | { ok: true;  input: unknown; work: BoundWork }
  | { ok: false; error: BridgeError };

interface DescriptorBase {
  readonly name:        string;
  readonly description: string;
  readonly schema:      z.ZodTypeAny;
}

/** A tool backed by the add-in; runs through the coordinator. */
export interface HostToolDescriptor extends DescriptorBase {
  readonly kind:          "host";
  readonly durationClass: DurationClass;
  bind(raw: unknown): BindResult;
}

/** Answered by the session layer itself in constant time. */
export interface ProbeDescriptor extends DescriptorBase {
  readonly kind: "probe";
  answer(): JsonValue;
}

export type ToolDescriptor = HostToolDescriptor | ProbeDescriptor;

export interface ToolDefinition<I> {
  name:          string;
  description:   string;
  schema:        z.ZodType<I, z.ZodTypeDef, unknown>;
  durationClass: DurationClass;
  handler:       ToolHandler<I>;
}

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}

/**
 * Build a host tool descriptor. The handler's input type follows the schema,
 * and the handler is only reachable through a successful bind().
 */
export function defineTool<I>(def: ToolDefinition<I>): HostToolDescriptor {
  return Object.freeze({
    kind:          "host" as const,
    name:          def.name,
    description:   def.description,
    schema:        def.schema,
    durationClass: def.durationClass,
    bind(raw: unknown): BindResult {
      const parsed = def.schema.safeParse(raw ?? {});
      if (!parsed.success) {
        return {
          ok:    false,
          error: new BridgeError("ValidationError", `invalid input for ${def.name}: ${describeIssues(parsed.error)}`),
        };
      }
      const input = parsed.data;
      return { ok: true, input, work: (ctx) => def.handler(input, ctx) };
    },
  });
}

export function defineProbe(def: { name: string; description: string; answer: () => JsonValue }): ProbeDescriptor {
  return Object.freeze({
    kind:        "probe" as const,
    name:        def.name,
    description: def.description,
    schema:      z.object({}).passthrough(),
    answer:      def.answer,
  });
}

export interface ToolListing {
  name:          string;
  description:   string;
  durationClass: DurationClass | "probe";
  inputSchema: {
    type:       "object";
    properties: Record<string, unknown>;
    required:   string[];
  };
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function toInputSchema(schema: z.ZodTypeAny): ToolListing["inputSchema"] {
  const json: unknown = zodToJsonSchema(schema, { $refStrategy: "none" });
  if (!isRecord(json) || json["type"] !== "object") {
    return { type: "object", properties: {}, required: [] };
  }
  const properties = json["properties"];
  const required   = json["required"];
  return {
    type:       "object",
    properties: isRecord(properties) ? properties : {},
    required:   Array.isArray(required) ? required.filter((r): r is string => typeof r === "string") : [],
  };
}

export class OperationRegistry {
  private readonly tools = new Map<string, ToolDescriptor>();
  private listingCache: ToolListing[] | null = null;

  /** Write-once per name; a duplicate is a wiring mistake and aborts startup. */
  register(descriptor: ToolDescriptor): void {
    if (!/^[a-z][a-z0-9_]*$/.test(descriptor.name)) {
      throw new RegistryError(`invalid tool name "${descriptor.name}"`);
    }
    if (this.tools.has(descriptor.name)) {
      throw new RegistryError(`tool "${descriptor.name}" is already registered`);
    }
    this.tools.set(descriptor.name, descriptor);
    this.listingCache = null;
  }

  resolve(name: string): ToolDescriptor | undefined {
    return this.tools.get(name);
  }

  get size(): number {
    return this.tools.size;
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  list(): ToolListing[] {
    if (this.listingCache) return this.listingCache;
    this.listingCache = [...this.tools.values()].map((t): ToolListing => ({
      name:          t.name,
      description:   t.description,
      durationClass: t.kind === "probe" ? "probe" : t.durationClass,
      inputSchema:   toInputSchema(t.schema),
    }));
    return this.listingCache;
  }
}
