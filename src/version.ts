import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const _dir = dirname(fileURLToPath(import.meta.url));

// Same relative path from src/ and from dist/.
export const PKG_VERSION: string = z.object({ version: z.string() })
  .parse(JSON.parse(readFileSync(resolve(_dir, "../package.json"), "utf8")))
  .version;

export const SERVER_NAME = "cad-addin-bridge";
