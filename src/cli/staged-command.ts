import { confirmProceed, type Prompter } from "../hook/confirm.js";
import {
  listStagedFiles,
  resolveRepoRoot,
  type GitClient,
} from "../ingest/staged-files.js";
import { runScanCommand } from "./scan-command.js";
import type { Finding } from "../scanner/types.js";

export interface StagedOptions {
  readonly git: GitClient;
  readonly write: (text: string) => Promise<void>;
  readonly rulesFile?: string;
  readonly assumeYes?: boolean;
  readonly quiet?: boolean;
  readonly prompter?: Prompter;
  readonly onDiagnostic?: (message: string) => void;
}

export interface StagedResult {
  readonly files: string[];
  readonly findings: Finding[];
  readonly exitCode: number;
}

export async function runStagedCommand(
  options: StagedOptions,
  toolVersion: string,
): Promise<StagedResult> {
  const root = await resolveRepoRoot(options.git);
  const files = await listStagedFiles(options.git);
  if (files.length === 0) {
    options.onDiagnostic?.("No staged files to scan");
    return { files, findings: [], exitCode: 0 };
  }

  const result = await runScanCommand(
    {
      files,
      format: "text",
      rulesFile: options.rulesFile,
      baseDir: root,
      quiet: options.quiet,
      onDiagnostic: options.onDiagnostic,
    },
    toolVersion,
  );
  if (result.findings.length === 0) {
    return { files, findings: [], exitCode: 0 };
  }

  await options.write(result.output + "\n");

  if (options.assumeYes) {
    return { files, findings: result.findings, exitCode: 0 };
  }
  if (!options.prompter) {
    if (!options.quiet) {
      await options.write("Commit blocked. Re-run with --yes to override.\n");
    }
    return { files, findings: result.findings, exitCode: 1 };
  }

  const proceed = await confirmProceed(options.prompter);
  if (!proceed && !options.quiet) {
    await options.write("Commit aborted.\n");
  }
  return { files, findings: result.findings, exitCode: proceed ? 0 : 1 };
}
