import { z } from "zod";
import { defineTool, type HostToolDescriptor } from "../registry.js";
import { read, segment, type ToolOptions } from "./common.js";

const NoInput = z.object({}).strict();

const NamedInput = z.object({
  name: z.string().min(1).describe("Exact name as shown in the browser tree"),
}).strict();

export function documentTools(opts: ToolOptions): HostToolDescriptor[] {
  return [
    defineTool({
      name:          "document_info",
      description:   "Get information about the currently open document",
      schema:        NoInput,
      durationClass: "fast",
      handler:       (_input, ctx) => read(ctx, "/document", opts),
    }),
    defineTool({
      name:          "components",
      description:   "Get the component tree of the current design",
      schema:        NoInput,
      durationClass: "fast",
      handler:       (_input, ctx) => read(ctx, "/components", opts),
    }),
    defineTool({
      name:          "sketches",
      description:   "List all sketches in the current design",
      schema:        NoInput,
      durationClass: "fast",
      handler:       (_input, ctx) => read(ctx, "/sketches", opts),
    }),
    defineTool({
      name:          "sketch_details",
      description:   "Get curves, profiles and plane of one sketch",
      schema:        NamedInput,
      durationClass: "fast",
      handler:       ({ name }, ctx) => read(ctx, `/sketches/${segment(name)}`, opts),
    }),
    defineTool({
      name:          "bodies",
      description:   "List all bodies in the current design",
      schema:        NoInput,
      durationClass: "fast",
      handler:       (_input, ctx) => read(ctx, "/bodies", opts),
    }),
    defineTool({
      name:          "body_details",
      description:   "Get volume, area, bounding box and faces of one body",
      schema:        NamedInput,
      durationClass: "fast",
      handler:       ({ name }, ctx) => read(ctx, `/bodies/${segment(name)}`, opts),
    }),
    defineTool({
      name:          "parameters",
      description:   "Get all user parameters in the current design",
      schema:        NoInput,
      durationClass: "fast",
      handler:       (_input, ctx) => read(ctx, "/parameters", opts),
    }),
  ];
}
