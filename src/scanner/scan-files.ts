import path from "node:path";
import { readScanTarget, type ReadTargetOptions } from "../ingest/file-reader.js";
import { scanContent } from "./content-scanner.js";
import type { Finding, RuleRegistry, SkippedFile } from "./types.js";

export interface ScanFilesOptions extends ReadTargetOptions {
  /** Relative paths are read from here but reported as given. */
  readonly baseDir?: string;
  readonly onSkip?: (skipped: SkippedFile) => void;
}

export interface ScanFilesResult {
  readonly findings: Finding[];
  readonly filesScanned: number;
  readonly skipped: SkippedFile[];
}

/**
 * Scans each path in argument order, one file at a time. Findings keep that
 * order, then ascending line number within a file. A file that cannot be
 * read is recorded as skipped and never stops the remaining paths.
 */
export async function scanFiles(
  paths: readonly string[],
  registry: RuleRegistry,
  options: ScanFilesOptions = {},
): Promise<ScanFilesResult> {
  const findings: Finding[] = [];
  const skipped: SkippedFile[] = [];
  let filesScanned = 0;

  const skip = (entry: SkippedFile): void => {
    skipped.push(entry);
    options.onSkip?.(entry);
  };

  for (const filePath of paths) {
    try {
      const readPath = options.baseDir
        ? path.resolve(options.baseDir, filePath)
        : filePath;
      const result = await readScanTarget(readPath, options);
      if (!result.ok) {
        skip({ path: filePath, reason: result.reason, detail: result.detail });
        continue;
      }
      const target = { path: filePath, content: result.target.content };
      findings.push(...scanContent(target, registry));
      filesScanned += 1;
    } catch (error) {
      skip({
        path: filePath,
        reason: "unreadable",
        detail: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return { findings, filesScanned, skipped };
}
