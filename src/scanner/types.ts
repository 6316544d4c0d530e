export interface RuleDefinition {
  readonly name: string;
  readonly pattern: string;
  readonly flags?: string;
  readonly description?: string;
}

export interface RuleDocument {
  readonly rule_format_version: string;
  readonly rules: readonly RuleDefinition[];
}

export interface Rule {
  readonly name: string;
  readonly pattern: RegExp;
}

export interface RuleRegistry {
  readonly version: string;
  rules(): readonly Rule[];
}

export interface ScanTarget {
  readonly path: string;
  readonly content: string;
}

export interface Finding {
  readonly path: string;
  readonly line_number: number;
  readonly rule_name: string;
}

export type SkipReason =
  | "missing"
  | "not-a-file"
  | "too-large"
  | "binary"
  | "unreadable";

export interface SkippedFile {
  readonly path: string;
  readonly reason: SkipReason;
  readonly detail?: string;
}
