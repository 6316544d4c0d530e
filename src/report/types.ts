import type { Finding } from "../scanner/types.js";

export interface ToolInfo {
  readonly name: "leakgate";
  readonly version: string;
}

export interface SummaryInfo {
  readonly total: number;
  readonly files_scanned: number;
  readonly files_skipped: number;
  readonly by_rule: Record<string, number>;
}

export interface ScanReport {
  readonly tool: ToolInfo;
  readonly summary: SummaryInfo;
  readonly findings: readonly Finding[];
}

export interface ReportInput {
  readonly toolVersion: string;
  readonly findings: readonly Finding[];
  readonly filesScanned: number;
  readonly filesSkipped: number;
}
