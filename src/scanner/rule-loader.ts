import fs from "node:fs/promises";
import yaml from "js-yaml";
import type { RuleDefinition, RuleDocument } from "./types.js";

export async function loadRuleDefinitions(
  rulesFile: string,
): Promise<RuleDocument> {
  const raw = await fs.readFile(rulesFile, "utf8");
  return parseRuleDocument(raw, rulesFile);
}

export function parseRuleDocument(raw: string, source: string): RuleDocument {
  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid rules file ${source}: ${message}`);
  }
  if (!isRecord(doc)) {
    throw new Error(`Invalid rules file format: ${source}`);
  }

  const version = doc.rule_format_version;
  if (typeof version !== "string" && typeof version !== "number") {
    throw new Error(`Missing rule_format_version in ${source}`);
  }

  if (!Array.isArray(doc.rules) || doc.rules.length === 0) {
    throw new Error(`Rules list missing or empty in ${source}`);
  }

  const rules = doc.rules.map((entry: unknown, index: number) =>
    toRuleDefinition(entry, index, source),
  );
  return { rule_format_version: String(version), rules };
}

function toRuleDefinition(
  entry: unknown,
  index: number,
  source: string,
): RuleDefinition {
  if (!isRecord(entry)) {
    throw new Error(`Rule #${index + 1} is not a mapping in ${source}`);
  }
  const { name, pattern, flags, description } = entry;
  if (typeof name !== "string" || typeof pattern !== "string") {
    throw new Error(`Rule #${index + 1} missing name/pattern in ${source}`);
  }
  if (flags !== undefined && typeof flags !== "string") {
    throw new Error(`Rule "${name}" has non-string flags in ${source}`);
  }
  if (description !== undefined && typeof description !== "string") {
    throw new Error(`Rule "${name}" has non-string description in ${source}`);
  }
  return { name, pattern, flags, description };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
