export { loadRuleDefinitions, parseRuleDocument } from "./scanner/rule-loader.js";
export { createRuleRegistry } from "./scanner/rule-registry.js";
export { COMMENT_MARKERS, isCommentLine } from "./scanner/comment-filter.js";
export { firstMatchingRule, scanContent } from "./scanner/content-scanner.js";
export { scanFiles } from "./scanner/scan-files.js";
export type { ScanFilesOptions, ScanFilesResult } from "./scanner/scan-files.js";
export type {
  Finding,
  Rule,
  RuleDefinition,
  RuleDocument,
  RuleRegistry,
  ScanTarget,
  SkipReason,
  SkippedFile,
} from "./scanner/types.js";
export {
  MAX_FILE_SIZE_BYTES,
  decodeText,
  readScanTarget,
} from "./ingest/file-reader.js";
export type { ReadTargetOptions, ReadTargetResult } from "./ingest/file-reader.js";
export {
  createGitClient,
  createRepoGitClient,
  listStagedFiles,
  resolveHooksDir,
  resolveRepoRoot,
} from "./ingest/staged-files.js";
export type { GitClient } from "./ingest/staged-files.js";
export { buildJsonReport, renderJsonReport } from "./report/json-reporter.js";
export { formatFinding, renderTextReport } from "./report/text-reporter.js";
export type { TextRenderOptions } from "./report/text-reporter.js";
export type { ReportInput, ScanReport } from "./report/types.js";
export {
  installPreCommitHook,
  renderPreCommitHook,
} from "./hook/hook-installer.js";
export { confirmProceed } from "./hook/confirm.js";
export type { Prompter } from "./hook/confirm.js";
export { loadRegistry, runScanCommand } from "./cli/scan-command.js";
