import { z } from "zod";
import { defineTool, type HostToolDescriptor } from "../registry.js";
import { read, write, type ToolOptions } from "./common.js";

export function versionTools(opts: ToolOptions): HostToolDescriptor[] {
  return [
    defineTool({
      name:          "list_versions",
      description:   "List all saved versions of the current document (cloud-saved documents only)",
      schema:        z.object({}).strict(),
      durationClass: "fast",
      handler:       (_input, ctx) => read(ctx, "/versions", opts),
    }),
    defineTool({
      name:          "restore_version",
      description:   "Open a specific version of the document in a new tab. Save it to make it current.",
      schema: z.object({
        version_number: z.number().int().min(1).describe("Version number to restore (1-based)"),
      }).strict(),
      durationClass: "long-running",
      handler:       ({ version_number }, ctx) => write(ctx, "/version/restore", { version_number }),
    }),
  ];
}
