import { createDefaultChecks, type DefaultCheckOptions } from "../checks/registry.js";
import type { CheckContext, CheckId, CheckOutcome, PreflightCheck } from "../checks/types.js";
import { describeError, PreflightError, type PreflightFailureKind } from "../errors.js";
import { createStreamReporter, tagged, type Reporter } from "../../lib/reporter.js";

export interface PreflightFailure {
  checkId: CheckId;
  kind: PreflightFailureKind | "unexpected";
  message: string;
}

export interface PreflightResult {
  exitCode: number;
  completed: CheckId[];
  failure?: PreflightFailure | undefined;
}

function traceFor(error: unknown): string | undefined {
  if (!(error instanceof PreflightError)) {
    return error instanceof Error ? error.stack : undefined;
  }
  // Import failures carry the application's own stack; tool failures already printed theirs.
  if ((error.kind === "module_load" || error.kind === "manifest") && error.cause instanceof Error) {
    return error.cause.stack;
  }
  return undefined;
}

export class PreflightRunner {
  constructor(
    private readonly checks: readonly PreflightCheck[],
    private readonly reporter: Reporter
  ) {}

  async run(rootDir: string): Promise<PreflightResult> {
    const context: CheckContext = { rootDir, reporter: this.reporter };
    const completed: CheckId[] = [];

    for (const check of this.checks) {
      this.reporter.log(tagged(`${check.title}...`));
      let outcome: CheckOutcome;
      try {
        outcome = await check.run(context);
      } catch (error) {
        return this.fail(check, error, completed);
      }
      completed.push(check.id);
      this.reporter.log(tagged(`${check.title}: ${outcome.summary}`));
    }

    this.reporter.log(tagged("All checks passed."));
    return { exitCode: 0, completed };
  }

  private fail(check: PreflightCheck, error: unknown, completed: CheckId[]): PreflightResult {
    const trace = traceFor(error);
    if (trace) {
      this.reporter.error(trace);
    }
    const message = describeError(error);
    this.reporter.error(tagged(`Failed at ${check.title}: ${message}`));

    return {
      exitCode: error instanceof PreflightError ? error.exitCode : 1,
      completed,
      failure: {
        checkId: check.id,
        kind: error instanceof PreflightError ? error.kind : "unexpected",
        message
      }
    };
  }
}

export interface RunPreflightOptions extends DefaultCheckOptions {
  rootDir: string;
  reporter?: Reporter | undefined;
}

export async function runPreflight(options: RunPreflightOptions): Promise<PreflightResult> {
  const runner = new PreflightRunner(createDefaultChecks(options), options.reporter ?? createStreamReporter());
  return runner.run(options.rootDir);
}
