import { installPreCommitHook } from "../hook/hook-installer.js";
import { resolveHooksDir, type GitClient } from "../ingest/staged-files.js";

export interface InstallHookCommandOptions {
  readonly git: GitClient;
  readonly force?: boolean;
}

export async function runInstallHookCommand(
  options: InstallHookCommandOptions,
): Promise<string> {
  const hooksDir = await resolveHooksDir(options.git);
  const result = await installPreCommitHook(hooksDir, { force: options.force });
  return result.replaced
    ? `Replaced pre-commit hook at ${result.hookPath}`
    : `Installed pre-commit hook at ${result.hookPath}`;
}
