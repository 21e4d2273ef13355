import { createRequire } from "node:module";

import { z } from "zod";

const packageJsonSchema = z.object({ version: z.string() });

function readVersionFromPackageJson(): string | null {
  const require = createRequire(import.meta.url);
  const parsed = packageJsonSchema.safeParse(require("../package.json"));
  return parsed.success ? parsed.data.version : null;
}

// Single source of truth for the current graphform version.
// - Override: GRAPHFORM_VERSION.
// - Dev/npm builds: package.json.
export const VERSION = process.env.GRAPHFORM_VERSION || readVersionFromPackageJson() || "0.0.0";
