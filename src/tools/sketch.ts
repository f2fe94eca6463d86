import { z } from "zod";
import { BridgeError } from "../errors.js";
import { defineTool, type HostToolDescriptor } from "../registry.js";
import type { JsonObject } from "../types.js";
import { write, type ToolOptions } from "./common.js";

const Plane = z.enum(["XY", "XZ", "YZ"]).describe("Construction plane");

const CreateSketchInput = z.object({
  component_name: z.string().min(1).optional().describe("Component to create the sketch in (root when omitted)"),
  plane:          Plane,
}).strict();

const CircleShape = z.object({
  center_x: z.number().describe("X coordinate of circle center (cm)"),
  center_y: z.number().describe("Y coordinate of circle center (cm)"),
  radius:   z.number().positive().describe("Radius of the circle (cm)"),
});

const RectangleShape = z.object({
  x1: z.number().describe("X coordinate of first corner (cm)"),
  y1: z.number().describe("Y coordinate of first corner (cm)"),
  x2: z.number().describe("X coordinate of opposite corner (cm)"),
  y2: z.number().describe("Y coordinate of opposite corner (cm)"),
});

const SketchName = z.string().min(1).describe("Name of an existing sketch");

const DrawCircleInput    = CircleShape.extend({ sketch_name: SketchName }).strict();
const DrawRectangleInput = RectangleShape.extend({ sketch_name: SketchName })
  .strict()
  .refine((r) => r.x1 !== r.x2 && r.y1 !== r.y2, { message: "rectangle corners must differ in both x and y" });

const ExtrudeInput = z.object({
  sketch_name:   SketchName,
  profile_index: z.number().int().min(0).describe("Index of the profile to extrude"),
  distance:      z.number().refine((d) => d !== 0, { message: "distance must be non-zero" }).describe("Extrusion distance (cm)"),
  operation:     z.enum(["new", "join", "cut"]).default("new").describe("Feature operation"),
}).strict();

const ProfileShape = z.discriminatedUnion("shape", [
  CircleShape.extend({ shape: z.literal("circle") }),
  RectangleShape.extend({ shape: z.literal("rectangle") }),
]);

const SketchProfileInput = z.object({
  component_name: z.string().min(1).optional(),
  plane:          Plane,
  shapes:         z.array(ProfileShape).min(1).max(50).describe("Shapes drawn in order into the new sketch"),
}).strict();

const CreatedSketch = z.object({ sketch_name: z.string().min(1) }).passthrough();

export function sketchTools(_opts: ToolOptions): HostToolDescriptor[] {
  return [
    defineTool({
      name:          "create_sketch",
      description:   "Create a new sketch on a construction plane",
      schema:        CreateSketchInput,
      durationClass: "fast",
      handler:       ({ component_name, plane }, ctx) =>
        write(ctx, "/sketch/create", { component_name: component_name ?? null, plane }),
    }),
    defineTool({
      name:          "draw_circle",
      description:   "Draw a circle in an existing sketch",
      schema:        DrawCircleInput,
      durationClass: "fast",
      handler:       (input, ctx) => write(ctx, "/sketch/circle", { ...input }),
    }),
    defineTool({
      name:          "draw_rectangle",
      description:   "Draw a two-point rectangle in an existing sketch",
      schema:        DrawRectangleInput,
      durationClass: "fast",
      handler:       (input, ctx) => write(ctx, "/sketch/rectangle", { ...input }),
    }),
    defineTool({
      name:          "extrude",
      description:   "Extrude a sketch profile to create 3D geometry",
      schema:        ExtrudeInput,
      durationClass: "long-running",
      handler:       (input, ctx) => write(ctx, "/extrude", { ...input }),
    }),
    defineTool({
      name:          "sketch_profile",
      description:
        "Create a sketch and draw several circles/rectangles into it. Reports progress after every shape; " +
        "if cancelled, the result names the sketch and how many shapes were drawn.",
      schema:        SketchProfileInput,
      durationClass: "long-running",
      handler: async ({ component_name, plane, shapes }, ctx) => {
        const created = CreatedSketch.safeParse(
          await write(ctx, "/sketch/create", { component_name: component_name ?? null, plane }),
        );
        if (!created.success) {
          throw new BridgeError("HostError", "add-in did not report the name of the new sketch");
        }
        const sketchName = created.data.sketch_name;
        const report = (drawn: number): JsonObject => ({ sketch_name: sketchName, shapes_drawn: drawn, shapes_total: shapes.length });
        ctx.progress(report(0));

        let drawn = 0;
        try {
          for (const shape of shapes) {
            ctx.throwIfCancelled();
            if (shape.shape === "circle") {
              const { shape: _kind, ...circle } = shape;
              await write(ctx, "/sketch/circle", { sketch_name: sketchName, ...circle });
            } else {
              const { shape: _kind, ...rect } = shape;
              await write(ctx, "/sketch/rectangle", { sketch_name: sketchName, ...rect });
            }
            drawn += 1;
            ctx.progress(report(drawn));
          }
        } catch (err) {
          // The sketch stays in the document; say how far it got.
          if (err instanceof BridgeError && err.kind !== "Cancelled") {
            throw new BridgeError(err.kind, err.message, { ...err.extra, partial: report(drawn) });
          }
          throw err;
        }
        return report(shapes.length);
      },
    }),
  ];
}
