import { tagged } from "../../lib/reporter.js";
import { PreflightError } from "../errors.js";
import { collectAdvisoryFindings } from "../lint/advisory-rules.js";
import { buildLintReport, formatLintReport } from "../lint/report.js";
import { loadSourceTree } from "../lint/source-tree.js";
import { collectStrictFindings } from "../lint/strict-rules.js";
import type { CheckContext, CheckOutcome, PreflightCheck } from "./types.js";

export class StaticCheck implements PreflightCheck {
  readonly id = "static";
  readonly title = "Running static checks";

  async run(context: CheckContext): Promise<CheckOutcome> {
    const tree = loadSourceTree(context.rootDir);

    const strict = buildLintReport(collectStrictFindings(tree));
    for (const line of formatLintReport(strict, { showSource: true })) {
      context.reporter.log(line);
    }
    context.reporter.log(tagged(`Strict pass: ${strict.count} violation(s)`));
    if (strict.count > 0) {
      throw new PreflightError("strict_lint", `Strict lint pass found ${strict.count} violation(s).`);
    }

    // Reported for information only; nothing here can fail the run.
    const advisory = buildLintReport(collectAdvisoryFindings(tree));
    for (const line of formatLintReport(advisory, { showSource: false })) {
      context.reporter.log(line);
    }
    context.reporter.log(tagged(`Advisory pass: ${advisory.count} finding(s)`));

    return { summary: `${tree.files.length} source file(s) checked` };
  }
}
