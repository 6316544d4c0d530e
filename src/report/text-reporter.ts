import type { Finding } from "../scanner/types.js";

export const ALERT_LINE = "Potential secrets detected:";
export const REVIEW_HINT = "Review the lines above before committing.";

export function formatFinding(finding: Finding): string {
  return `${finding.path}:${finding.line_number} - Potential ${finding.rule_name}`;
}

export interface TextRenderOptions {
  /** Drops the closing hint; the alert and finding lines always print. */
  readonly quiet?: boolean;
}

export function renderTextReport(
  findings: readonly Finding[],
  options: TextRenderOptions = {},
): string {
  if (findings.length === 0) {
    return "";
  }
  const lines = [ALERT_LINE, ...findings.map(formatFinding)];
  if (!options.quiet) {
    lines.push(REVIEW_HINT);
  }
  return lines.join("\n");
}
