import type { Rule, RuleDefinition, RuleDocument, RuleRegistry } from "./types.js";

const STATEFUL_FLAGS = /[gy]/;

/**
 * Compiles every definition once, in the order given. Matching walks the
 * result in that same order, so earlier rules win ties.
 *
 * Throws if a pattern does not compile, carries a stateful flag, or if a
 * rule name is empty or repeated.
 */
export function createRuleRegistry(document: RuleDocument): RuleRegistry {
  const seen = new Set<string>();
  const compiled: Rule[] = [];

  for (const definition of document.rules) {
    const name = definition.name.trim();
    if (!name) {
      throw new Error("Rule name must not be empty");
    }
    if (seen.has(name)) {
      throw new Error(`Duplicate rule name: ${name}`);
    }
    seen.add(name);
    compiled.push(
      Object.freeze({
        name,
        pattern: compilePattern(name, definition),
      }),
    );
  }

  const rules: readonly Rule[] = Object.freeze(compiled);
  return Object.freeze({
    version: document.rule_format_version,
    rules: () => rules,
  });
}

function compilePattern(name: string, definition: RuleDefinition): RegExp {
  const flags = definition.flags ?? "";
  if (STATEFUL_FLAGS.test(flags)) {
    throw new Error(
      `Rule "${name}" uses stateful flags "${flags}". Remove g and y.`,
    );
  }
  try {
    return new RegExp(definition.pattern, flags);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Rule "${name}" has an invalid pattern: ${message}`);
  }
}
