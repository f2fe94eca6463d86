import type { OperationRegistry } from "../registry.js";
import type { JsonObject } from "../types.js";
import type { ToolOptions } from "./common.js";
import { componentTools } from "./component.js";
import { documentTools } from "./document.js";
import { healthProbe, hostStatusTool } from "./probe.js";
import { screenshotTools } from "./screenshot.js";
import { scriptTools } from "./script.js";
import { sketchTools } from "./sketch.js";
import { versionTools } from "./versions.js";

export type { ToolOptions } from "./common.js";

/** Register the full CAD tool catalogue. Throws RegistryError on a duplicate name. */
export function registerCadTools(registry: OperationRegistry, opts: ToolOptions, liveness: () => JsonObject): void {
  registry.register(healthProbe(liveness));
  registry.register(hostStatusTool(opts));
  for (const tool of [
    ...documentTools(opts),
    ...screenshotTools(opts),
    ...versionTools(opts),
    ...scriptTools(opts),
    ...sketchTools(opts),
    ...componentTools(opts),
  ]) {
    registry.register(tool);
  }
}
