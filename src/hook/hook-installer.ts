import fs from "node:fs/promises";
import path from "node:path";

export const HOOK_MARKER = "# installed by leakgate";

export interface InstallHookOptions {
  readonly force?: boolean;
  readonly command?: string;
}

export interface InstallHookResult {
  readonly hookPath: string;
  readonly replaced: boolean;
}

export function renderPreCommitHook(command = "leakgate staged"): string {
  return [
    "#!/bin/sh",
    HOOK_MARKER,
    "",
    "# Give the confirmation prompt a terminal when one is attached.",
    "if [ -t 1 ] && (exec < /dev/tty) 2>/dev/null; then",
    "  exec < /dev/tty",
    "fi",
    "",
    `exec ${command}`,
    "",
  ].join("\n");
}

export async function installPreCommitHook(
  hooksDir: string,
  options: InstallHookOptions = {},
): Promise<InstallHookResult> {
  const hookPath = path.join(hooksDir, "pre-commit");
  const existing = await readExisting(hookPath);
  if (existing !== null && !existing.includes(HOOK_MARKER) && !options.force) {
    throw new Error(
      `A pre-commit hook already exists at ${hookPath}. Re-run with --force to replace it.`,
    );
  }

  await fs.mkdir(hooksDir, { recursive: true });
  await fs.writeFile(hookPath, renderPreCommitHook(options.command), "utf8");
  await fs.chmod(hookPath, 0o755);
  return { hookPath, replaced: existing !== null };
}

async function readExisting(hookPath: string): Promise<string | null> {
  try {
    return await fs.readFile(hookPath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}
