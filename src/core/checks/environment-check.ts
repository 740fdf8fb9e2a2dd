import { existsSync } from "node:fs";
import { join } from "node:path";
import { CommandFailedError, runNpm, type NpmRunner } from "../../lib/run-npm.js";
import { describeError, PreflightError } from "../errors.js";
import type { CheckContext, CheckOutcome, PreflightCheck } from "./types.js";

export const DEPENDENCY_MANIFEST = "package.json";
export const UPGRADE_PACKAGE_MANAGER_ARGS = ["install", "--global", "npm@latest"];
export const INSTALL_DEPENDENCIES_ARGS = ["install"];

export class EnvironmentCheck implements PreflightCheck {
  readonly id = "environment";
  readonly title = "Installing dependencies";

  constructor(private readonly npm: NpmRunner = runNpm) {}

  async run(context: CheckContext): Promise<CheckOutcome> {
    const manifestPath = join(context.rootDir, DEPENDENCY_MANIFEST);
    if (!existsSync(manifestPath)) {
      throw new PreflightError("dependency_install", `Dependency manifest not found: ${manifestPath}`);
    }

    this.invoke(UPGRADE_PACKAGE_MANAGER_ARGS, context.rootDir);
    this.invoke(INSTALL_DEPENDENCIES_ARGS, context.rootDir);
    return { summary: `dependencies installed from ${DEPENDENCY_MANIFEST}` };
  }

  private invoke(args: string[], cwd: string): void {
    try {
      this.npm(args, { cwd });
    } catch (error) {
      // npm's own status is the harness exit code; spawn errors have none.
      const exitCode = error instanceof CommandFailedError ? error.exitCode : 1;
      throw new PreflightError("dependency_install", describeError(error), exitCode, { cause: error });
    }
  }
}
