import { z } from "zod";
import { defineProbe, defineTool, type HostToolDescriptor, type ProbeDescriptor } from "../registry.js";
import type { JsonObject } from "../types.js";
import { unwrap, type ToolOptions } from "./common.js";

export const HEALTH_TOOL = "health";

/** Liveness of the bridge itself; answered without the coordinator or the add-in. */
export function healthProbe(liveness: () => JsonObject): ProbeDescriptor {
  return defineProbe({
    name:        HEALTH_TOOL,
    description: "Check that the bridge server is up. Does not contact the CAD host; use host_status for that.",
    answer:      liveness,
  });
}

/** One bounded round trip to the add-in's /health; never retried. */
export function hostStatusTool(opts: ToolOptions): HostToolDescriptor {
  return defineTool({
    name:          "host_status",
    description:   "Check whether the CAD host and its add-in are running and reachable",
    schema:        z.object({}).strict(),
    durationClass: "fast",
    handler:       async (_input, ctx) => ({
      bridge: "ok",
      host:   unwrap(await ctx.call("/health", "GET", undefined, opts.healthTimeoutMs)),
    }),
  });
}
