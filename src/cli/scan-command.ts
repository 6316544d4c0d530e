import { loadRuleDefinitions } from "../scanner/rule-loader.js";
import { createRuleRegistry } from "../scanner/rule-registry.js";
import { scanFiles } from "../scanner/scan-files.js";
import { renderJsonReport } from "../report/json-reporter.js";
import { renderTextReport } from "../report/text-reporter.js";
import { resolveRulesFile } from "./runtime-paths.js";
import type { Finding, RuleRegistry } from "../scanner/types.js";

export const USAGE_MESSAGE = "Usage: leakgate [scan] <file...>";

export type OutputFormat = "text" | "json";

export interface ScanOptions {
  readonly files: readonly string[];
  readonly format?: OutputFormat;
  readonly rulesFile?: string;
  readonly baseDir?: string;
  readonly maxFileSizeBytes?: number;
  readonly quiet?: boolean;
  readonly onDiagnostic?: (message: string) => void;
}

export interface ScanResult {
  readonly findings: Finding[];
  readonly output: string;
  readonly exitCode: number;
}

export async function loadRegistry(rulesFile?: string): Promise<RuleRegistry> {
  const resolved = await resolveRulesFile(rulesFile);
  const document = await loadRuleDefinitions(resolved);
  return createRuleRegistry(document);
}

export async function runScanCommand(
  options: ScanOptions,
  toolVersion: string,
): Promise<ScanResult> {
  if (options.files.length === 0) {
    throw new Error(USAGE_MESSAGE);
  }

  const diagnostic = options.onDiagnostic;
  const registry = await loadRegistry(options.rulesFile);
  diagnostic?.(
    `Loaded ${registry.rules().length} rules (format v${registry.version})`,
  );

  const result = await scanFiles(options.files, registry, {
    baseDir: options.baseDir,
    maxFileSizeBytes: options.maxFileSizeBytes,
    onSkip: (skipped) => {
      const detail = skipped.detail ? `: ${skipped.detail}` : "";
      diagnostic?.(`Skipped ${skipped.path} (${skipped.reason}${detail})`);
    },
  });

  const output =
    options.format === "json"
      ? renderJsonReport({
          toolVersion,
          findings: result.findings,
          filesScanned: result.filesScanned,
          filesSkipped: result.skipped.length,
        })
      : renderTextReport(result.findings, { quiet: options.quiet });

  return {
    findings: result.findings,
    output,
    exitCode: result.findings.length > 0 ? 1 : 0,
  };
}
