import { z } from "zod";
import { defineTool, type HostToolDescriptor } from "../registry.js";
import { write, type ToolOptions } from "./common.js";

export function componentTools(_opts: ToolOptions): HostToolDescriptor[] {
  return [
    defineTool({
      name:          "activate_component",
      description:   "Activate a component for editing",
      schema:        z.object({ name: z.string().min(1).describe("Name of the component to activate") }).strict(),
      durationClass: "fast",
      handler:       ({ name }, ctx) => write(ctx, "/component/activate", { name }),
    }),
    defineTool({
      name:          "set_visibility",
      description:   "Show or hide a component",
      schema: z.object({
        component_name: z.string().min(1).describe("Name of the component"),
        visible:        z.boolean().describe("true to show, false to hide"),
      }).strict(),
      durationClass: "fast",
      handler:       ({ component_name, visible }, ctx) => write(ctx, "/visibility", { component_name, visible }),
    }),
  ];
}
