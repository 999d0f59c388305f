import { readFileSync } from "node:fs";
import { z } from "zod";

const packageJsonSchema = z.object({
  name: z.string().optional(),
  version: z.string().optional(),
});

// src/version.ts and dist/version.js both sit one level below package.json.
const packageJson = packageJsonSchema.parse(
  JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"))
);

export const PACKAGE_NAME = packageJson.name ?? "workspace-mcp";
export const PACKAGE_VERSION = packageJson.version ?? "0.0.0";
