import { runNpm, type NpmRunner } from "../../lib/run-npm.js";
import { EnvironmentCheck } from "./environment-check.js";
import { LoadCheck, type ServiceResolver } from "./load-check.js";
import { StaticCheck } from "./static-check.js";
import type { PreflightCheck } from "./types.js";
import { resolveServiceTargets } from "../targets/targets.js";

export interface DefaultCheckOptions {
  npm?: NpmRunner | undefined;
  resolveServices?: ServiceResolver | undefined;
}

/** The fixed run order: prepare the environment, lint, then load. */
export function createDefaultChecks(options: DefaultCheckOptions = {}): PreflightCheck[] {
  return [
    new EnvironmentCheck(options.npm ?? runNpm),
    new StaticCheck(),
    new LoadCheck(options.resolveServices ?? resolveServiceTargets)
  ];
}
