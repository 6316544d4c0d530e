import type { Finding } from "../scanner/types.js";
import type { ReportInput, ScanReport } from "./types.js";

export function buildJsonReport(input: ReportInput): ScanReport {
  return {
    tool: { name: "leakgate", version: input.toolVersion },
    summary: {
      total: input.findings.length,
      files_scanned: input.filesScanned,
      files_skipped: input.filesSkipped,
      by_rule: countByRule(input.findings),
    },
    findings: input.findings,
  };
}

export function renderJsonReport(input: ReportInput): string {
  return JSON.stringify(buildJsonReport(input), null, 2);
}

function countByRule(findings: readonly Finding[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const finding of findings) {
    counts[finding.rule_name] = (counts[finding.rule_name] ?? 0) + 1;
  }
  return counts;
}
