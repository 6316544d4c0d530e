import { isCommentLine } from "./comment-filter.js";
import type { Finding, Rule, RuleRegistry, ScanTarget } from "./types.js";

export function scanContent(
  target: ScanTarget,
  registry: RuleRegistry,
): Finding[] {
  const rules = registry.rules();
  const lines = target.content.split(/\r?\n/);
  const findings: Finding[] = [];

  lines.forEach((line, index) => {
    if (isCommentLine(line)) {
      return;
    }
    const rule = firstMatchingRule(line, rules);
    if (rule) {
      findings.push({
        path: target.path,
        line_number: index + 1,
        rule_name: rule.name,
      });
    }
  });

  return findings;
}

export function firstMatchingRule(
  line: string,
  rules: readonly Rule[],
): Rule | undefined {
  return rules.find((rule) => rule.pattern.test(line));
}
