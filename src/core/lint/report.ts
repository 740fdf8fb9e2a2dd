import type { LintFinding, LintReport, RuleStatistic } from "./types.js";

function compareFindings(a: LintFinding, b: LintFinding): number {
  if (a.file !== b.file) {
    return a.file < b.file ? -1 : 1;
  }
  return a.line - b.line || a.column - b.column || a.rule.localeCompare(b.rule);
}

export function buildLintReport(findings: LintFinding[]): LintReport {
  const sorted = [...findings].sort(compareFindings);
  const counts = new Map<LintFinding["rule"], number>();
  for (const finding of sorted) {
    counts.set(finding.rule, (counts.get(finding.rule) ?? 0) + 1);
  }
  const statistics: RuleStatistic[] = [...counts.entries()]
    .map(([rule, count]) => ({ rule, count }))
    .sort((a, b) => a.rule.localeCompare(b.rule));
  return { findings: sorted, count: sorted.length, statistics };
}

export function formatFinding(finding: LintFinding, showSource: boolean): string[] {
  const header = `${finding.file}:${finding.line}:${finding.column}: ${finding.rule} ${finding.message}`;
  if (!showSource) {
    return [header];
  }
  return [header, finding.sourceLine, `${" ".repeat(Math.max(0, finding.column - 1))}^`];
}

export function formatStatistics(statistics: RuleStatistic[]): string[] {
  return statistics.map((entry) => `${String(entry.count).padEnd(6)}${entry.rule}`);
}

/** Findings (optionally with their source line), then per-rule statistics. */
export function formatLintReport(report: LintReport, options: { showSource: boolean }): string[] {
  return [
    ...report.findings.flatMap((finding) => formatFinding(finding, options.showSource)),
    ...formatStatistics(report.statistics)
  ];
}
