import { z } from "zod";
import { defineTool, type HostToolDescriptor } from "../registry.js";
import { unwrap, type ToolOptions } from "./common.js";

export function screenshotTools(_opts: ToolOptions): HostToolDescriptor[] {
  return [
    defineTool({
      name:          "screenshot",
      description:   "Capture the active viewport as a PNG image",
      schema:        z.object({}).strict(),
      durationClass: "long-running",
      handler:       async (_input, ctx) => unwrap(await ctx.image("/screenshot")),
    }),
  ];
}
