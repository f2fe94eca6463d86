/**
 * run_script executes caller-supplied code inside the host's own scripting
 * environment. It is the only tool whose result is opaque to the bridge, and
 * the only one that passes the host's traceback back to the caller: the
 * traceback belongs to the caller's code, not to the bridge.
 */

import { z } from "zod";
import { addinFailure } from "../errors.js";
import { defineTool, type HostToolDescriptor } from "../registry.js";
import type { ToolOptions } from "./common.js";

export function scriptTools(opts: ToolOptions): HostToolDescriptor[] {
  const ScriptInput = z.object({
    code: z.string()
      .min(1)
      .refine((c) => Buffer.byteLength(c, "utf8") <= opts.maxScriptBytes, {
        message: `script exceeds ${opts.maxScriptBytes} bytes`,
      })
      .describe("Script source. It can use adsk, app, design and ui; assign `result` to return data."),
  }).strict();

  return [
    defineTool({
      name:          "run_script",
      description:
        "Execute a script inside the CAD host. The script has access to adsk (API module), app (Application), " +
        "design (active Design) and ui (UserInterface). Set the 'result' variable to return data.",
      schema:        ScriptInput,
      durationClass: "long-running",
      handler: async ({ code }, ctx) => {
        process.stderr.write(`[script] ${ctx.invocationId} submitting ${Buffer.byteLength(code, "utf8")} bytes\n`);
        const result = await ctx.call("/run_script", "POST", { code });
        if (result.status === "ok") return result.payload;
        const err = addinFailure(result, { keepTraceback: true });
        if (err.kind === "HostError") err.message = `script failed: ${err.message}`;
        throw err;
      },
    }),
  ];
}
