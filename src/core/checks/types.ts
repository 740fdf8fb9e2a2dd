import type { Reporter } from "../../lib/reporter.js";

export type CheckId = "environment" | "static" | "load";

export interface CheckContext {
  rootDir: string;
  reporter: Reporter;
}

export interface CheckOutcome {
  summary: string;
}

/**
 * One phase of the preflight run. A check either resolves with a summary or
 * throws a `PreflightError`; there is no partial result.
 */
export interface PreflightCheck {
  readonly id: CheckId;
  readonly title: string;
  run(context: CheckContext): Promise<CheckOutcome>;
}
