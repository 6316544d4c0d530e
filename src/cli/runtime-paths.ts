import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

const RULES_FILE_NAME = "secrets.yaml";

export async function resolveRulesFile(
  customRulesFile?: string,
): Promise<string> {
  if (customRulesFile) {
    const resolved = path.resolve(customRulesFile);
    if (!(await existsFile(resolved))) {
      throw new Error(`Rules file not found: ${resolved}`);
    }
    return resolved;
  }

  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  const bundledRulesFile = path.resolve(
    moduleDir,
    "..",
    "..",
    "rules",
    RULES_FILE_NAME,
  );
  if (await existsFile(bundledRulesFile)) {
    return bundledRulesFile;
  }

  throw new Error(
    "Unable to find built-in rules file. Pass --rules <file> to use a custom rules file.",
  );
}

async function existsFile(targetPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(targetPath);
    return stats.isFile();
  } catch {
    return false;
  }
}
