// src/reporter.ts — Findings report and exit status

import type { Finding, Report } from "./types.js";

export function countHighSeverity(findings: readonly Finding[]): number {
  return findings.filter((f) => f.severity === "HIGH").length;
}

/**
 * Render findings as plain text lines and decide the exit code:
 * 1 iff at least one HIGH finding, otherwise 0.
 */
export function buildReport(findings: readonly Finding[]): Report {
  if (findings.length === 0) {
    return {
      lines: [
        "PASS: No dysfunction patterns detected.",
        "Architecture appears to follow contract-first coordination principles.",
      ],
      findingCount: 0,
      highCount: 0,
      verdict: "pass",
      exitCode: 0,
    };
  }

  const lines: string[] = [
    `FINDINGS: ${findings.length} potential dysfunction pattern(s) detected`,
    "",
  ];

  findings.forEach((f, i) => {
    lines.push(`  [${f.severity}] ${i + 1}. ${f.pattern}`);
    lines.push(`    Problem:  ${f.description}`);
    lines.push(`    Evidence: ${f.evidence}`);
    lines.push(`    Fix:      ${f.fix}`);
    lines.push("");
  });

  const highCount = countHighSeverity(findings);
  if (highCount > 0) {
    lines.push(`FAIL: ${highCount} HIGH severity issue(s). Architecture needs redesign.`);
    return { lines, findingCount: findings.length, highCount, verdict: "fail", exitCode: 1 };
  }

  lines.push("WARN: Issues found but none are HIGH severity. Review recommended.");
  return { lines, findingCount: findings.length, highCount: 0, verdict: "warn", exitCode: 0 };
}

export function formatReport(report: Report): string {
  return report.lines.join("\n") + "\n";
}
