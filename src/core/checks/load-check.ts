import { tagged } from "../../lib/reporter.js";
import { describeError, PreflightError } from "../errors.js";
import { createLoadCheckState, transitionLoadCheck, type LoadCheckState } from "../targets/load-progress.js";
import {
  ENTRY_POINT_TARGET,
  importProjectModule,
  readExport,
  resolveServiceTargets,
  type LoadCheckTarget
} from "../targets/targets.js";
import type { CheckContext, CheckOutcome, PreflightCheck } from "./types.js";

export type ServiceResolver = (rootDir: string) => Promise<LoadCheckTarget[]>;

/** Imports `target` and returns its bound symbol, or throws the matching failure. */
export async function probeTarget(rootDir: string, target: LoadCheckTarget): Promise<unknown> {
  let namespace: unknown;
  try {
    namespace = await importProjectModule(rootDir, target.modulePath);
  } catch (error) {
    throw new PreflightError(
      "module_load",
      `${target.label}: failed to load ${target.modulePath}: ${describeError(error)}`,
      1,
      { cause: error }
    );
  }

  const value = readExport(namespace, target.symbol);
  if (value === undefined) {
    throw new PreflightError("missing_symbol", `${target.label}: ${target.modulePath} does not export "${target.symbol}".`);
  }
  if (value === null) {
    throw new PreflightError("missing_symbol", `${target.label}: "${target.symbol}" in ${target.modulePath} is null.`);
  }
  return value;
}

export class LoadCheck implements PreflightCheck {
  readonly id = "load";
  readonly title = "Testing imports";
  private lastState: LoadCheckState | null = null;

  constructor(private readonly resolveServices: ServiceResolver = resolveServiceTargets) {}

  /**
   * Progress of the most recent run. Null until the service list is known,
   * except when the entry point itself fails.
   */
  get state(): LoadCheckState | null {
    return this.lastState;
  }

  async run(context: CheckContext): Promise<CheckOutcome> {
    this.lastState = null;

    // The registry may import services, so the entry point loads before it does.
    try {
      await probeTarget(context.rootDir, ENTRY_POINT_TARGET);
    } catch (error) {
      this.lastState = transitionLoadCheck(createLoadCheckState([ENTRY_POINT_TARGET.id]), {
        type: "failed",
        targetId: ENTRY_POINT_TARGET.id
      });
      throw error;
    }
    context.reporter.log(tagged(`${ENTRY_POINT_TARGET.label} import successful`));

    const services = await this.resolveServices(context.rootDir);
    let state = transitionLoadCheck(
      createLoadCheckState([ENTRY_POINT_TARGET.id, ...services.map((target) => target.id)]),
      { type: "passed", targetId: ENTRY_POINT_TARGET.id }
    );
    this.lastState = state;

    for (const target of services) {
      try {
        await probeTarget(context.rootDir, target);
      } catch (error) {
        this.lastState = transitionLoadCheck(state, { type: "failed", targetId: target.id });
        throw error;
      }
      state = transitionLoadCheck(state, { type: "passed", targetId: target.id });
      this.lastState = state;
      context.reporter.log(tagged(`${target.label} import successful`));
    }

    return { summary: `${services.length + 1} module(s) loaded` };
  }
}
