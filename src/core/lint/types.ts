export type StrictRule = "syntax-error" | "undefined-name" | "malformed-template";
export type AdvisoryRule = "complexity" | "line-length";
export type LintRule = StrictRule | AdvisoryRule;

export interface LintFinding {
  /** Path relative to the project root, always with forward slashes. */
  file: string;
  line: number;
  column: number;
  rule: LintRule;
  message: string;
  sourceLine: string;
}

export interface RuleStatistic {
  rule: LintRule;
  count: number;
}

export interface LintReport {
  findings: LintFinding[];
  count: number;
  statistics: RuleStatistic[];
}
