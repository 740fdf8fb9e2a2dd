import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { describeError, PreflightError } from "../errors.js";
import { serviceRegistrySchema } from "./schemas.js";

export interface LoadCheckTarget {
  /** Slug naming the progress state reached once this target passes. */
  id: string;
  label: string;
  /** Relative to the project root. */
  modulePath: string;
  symbol: string;
}

export const ENTRY_POINT_TARGET: LoadCheckTarget = {
  id: "entry",
  label: "Main app",
  modulePath: "src/main.ts",
  symbol: "app"
};

export const DEFAULT_SERVICE_TARGETS: readonly LoadCheckTarget[] = [
  { id: "auth", label: "Auth service", modulePath: "src/services/auth.ts", symbol: "authService" },
  {
    id: "transcription",
    label: "Transcription service",
    modulePath: "src/services/transcription.ts",
    symbol: "transcriptionService"
  },
  { id: "storage", label: "Storage service", modulePath: "src/storage/transcripts.ts", symbol: "transcriptStorage" }
];

export const SERVICE_REGISTRY_MODULE = "src/service-registry.ts";
export const SERVICE_REGISTRY_EXPORT = "serviceRegistry";

export async function importProjectModule(rootDir: string, modulePath: string): Promise<unknown> {
  const loaded: unknown = await import(pathToFileURL(resolve(rootDir, modulePath)).href);
  return loaded;
}

export function readExport(namespace: unknown, symbol: string): unknown {
  if (typeof namespace !== "object" || namespace === null) {
    return undefined;
  }
  const value: unknown = Reflect.get(namespace, symbol);
  return value;
}

async function loadServiceRegistry(rootDir: string): Promise<LoadCheckTarget[]> {
  let namespace: unknown;
  try {
    namespace = await importProjectModule(rootDir, SERVICE_REGISTRY_MODULE);
  } catch (error) {
    throw new PreflightError(
      "manifest",
      `Service registry ${SERVICE_REGISTRY_MODULE} failed to load: ${describeError(error)}`,
      1,
      { cause: error }
    );
  }

  const parsed = serviceRegistrySchema.safeParse(readExport(namespace, SERVICE_REGISTRY_EXPORT));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    );
    throw new PreflightError("manifest", `Invalid ${SERVICE_REGISTRY_EXPORT} in ${SERVICE_REGISTRY_MODULE}: ${issues.join("; ")}`);
  }

  return parsed.data.map((entry) => ({
    id: entry.id,
    label: entry.label,
    modulePath: entry.module,
    symbol: entry.export
  }));
}

/**
 * Services come from the application's own registry when it keeps one,
 * otherwise from the built-in manifest. The entry point is not part of the list:
 * it is probed before the registry is imported.
 */
export async function resolveServiceTargets(rootDir: string): Promise<LoadCheckTarget[]> {
  if (!existsSync(resolve(rootDir, SERVICE_REGISTRY_MODULE))) {
    return [...DEFAULT_SERVICE_TARGETS];
  }
  return loadServiceRegistry(rootDir);
}
