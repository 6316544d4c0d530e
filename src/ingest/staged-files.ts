import path from "node:path";
import { simpleGit } from "simple-git";

/** The slice of simple-git the hook commands rely on. */
export interface GitClient {
  diff(options: string[]): Promise<string>;
  revparse(options: string[]): Promise<string>;
}

export function createGitClient(baseDir?: string): GitClient {
  return baseDir ? simpleGit({ baseDir }) : simpleGit();
}

/** A client whose working directory is the top of the current repository. */
export async function createRepoGitClient(): Promise<GitClient> {
  return createGitClient(await resolveRepoRoot(createGitClient()));
}

export async function resolveRepoRoot(git: GitClient): Promise<string> {
  const root = (await git.revparse(["--show-toplevel"])).trim();
  if (!root) {
    throw new Error("Not inside a git working tree");
  }
  return root;
}

/**
 * Paths staged for the next commit, relative to the repository root.
 * Deleted entries are left out since there is nothing on disk to read.
 * Names are NUL-separated so git neither quotes nor escapes them.
 */
export async function listStagedFiles(git: GitClient): Promise<string[]> {
  const output = await git.diff([
    "--cached",
    "--name-only",
    "--diff-filter=ACMR",
    "-z",
  ]);
  return output.split("\0").filter((name) => name.length > 0);
}

/**
 * Honours core.hooksPath. A relative answer is taken against the
 * repository root, where git runs hooks from.
 */
export async function resolveHooksDir(git: GitClient): Promise<string> {
  const root = await resolveRepoRoot(git);
  const hooksPath = (await git.revparse(["--git-path", "hooks"])).trim();
  if (!hooksPath) {
    throw new Error("Unable to resolve the git hooks directory");
  }
  return path.resolve(root, hooksPath);
}
