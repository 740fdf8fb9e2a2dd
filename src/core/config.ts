import { statSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";
import { PreflightError } from "./errors.js";

const preflightEnvSchema = z.object({
  PREFLIGHT_ROOT_DIR: z
    .string()
    .optional()
    .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined))
});

export interface PreflightConfig {
  rootDir: string;
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

export function loadPreflightConfig(env: Record<string, string | undefined> = process.env, cwd = process.cwd()): PreflightConfig {
  const parsed = preflightEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new PreflightError(
      "configuration",
      `Invalid preflight environment: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`
    );
  }

  const rootDir = resolve(cwd, parsed.data.PREFLIGHT_ROOT_DIR ?? ".");
  if (!isDirectory(rootDir)) {
    throw new PreflightError("configuration", `PREFLIGHT_ROOT_DIR does not point at a directory: ${rootDir}`);
  }
  return { rootDir };
}
