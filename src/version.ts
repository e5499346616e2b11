import { readFileSync } from "node:fs";
import { z } from "zod";

const packageJsonUrl = new URL("../package.json", import.meta.url);
const packageJson = z
  .object({ version: z.string().optional() })
  .parse(JSON.parse(readFileSync(packageJsonUrl, "utf-8")));

export const PACKAGE_VERSION = packageJson.version ?? "0.0.0";
