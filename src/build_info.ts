import { readFileSync } from "fs";
import { join } from "path";
import { z } from "zod";

const PackageJsonSchema = z.object({ name: z.string(), version: z.string() });

export interface BuildInfo {
  name: string;
  version: string;
}

// Sources and the build output both sit one directory below package.json.
export function buildInfo(): BuildInfo {
  const raw: unknown = JSON.parse(readFileSync(join(__dirname, "..", "package.json"), "utf8"));
  return PackageJsonSchema.parse(raw);
}
