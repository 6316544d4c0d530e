import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CONFIRM_QUESTION, confirmProceed } from "../../src/hook/confirm.js";
import {
  HOOK_MARKER,
  installPreCommitHook,
  renderPreCommitHook,
} from "../../src/hook/hook-installer.js";

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "leakgate-hook-"));
});

afterEach(async () => {
  if (tempDir) {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

describe("pre-commit hook", () => {
  it("renders a shell script that runs the staged scan", () => {
    const script = renderPreCommitHook();
    expect(script.startsWith("#!/bin/sh\n" + HOOK_MARKER + "\n")).toBe(true);
    expect(script.trimEnd().endsWith("exec leakgate staged")).toBe(true);
  });

  it("installs an executable hook", async () => {
    const hooksDir = path.join(tempDir, "hooks");
    const result = await installPreCommitHook(hooksDir);

    expect(result).toEqual({
      hookPath: path.join(hooksDir, "pre-commit"),
      replaced: false,
    });
    const stats = await fs.stat(result.hookPath);
    expect(stats.mode & 0o777).toBe(0o755);
    expect(await fs.readFile(result.hookPath, "utf8")).toBe(
      renderPreCommitHook(),
    );
  });

  it("refuses to replace a foreign hook", async () => {
    const hookPath = path.join(tempDir, "pre-commit");
    await fs.writeFile(hookPath, "#!/bin/sh\nexit 0\n", "utf8");

    await expect(installPreCommitHook(tempDir)).rejects.toThrow(
      /A pre-commit hook already exists/,
    );
    expect(await fs.readFile(hookPath, "utf8")).toBe("#!/bin/sh\nexit 0\n");
  });

  it("replaces a foreign hook with force", async () => {
    const hookPath = path.join(tempDir, "pre-commit");
    await fs.writeFile(hookPath, "#!/bin/sh\nexit 0\n", "utf8");

    const result = await installPreCommitHook(tempDir, { force: true });
    expect(result.replaced).toBe(true);
    expect(await fs.readFile(hookPath, "utf8")).toContain(HOOK_MARKER);
  });

  it("updates its own hook without force", async () => {
    await installPreCommitHook(tempDir);
    const result = await installPreCommitHook(tempDir, {
      command: "npx leakgate staged",
    });
    expect(result.replaced).toBe(true);
    expect(await fs.readFile(result.hookPath, "utf8")).toContain(
      "exec npx leakgate staged",
    );
  });
});

describe("confirmProceed", () => {
  const answering = (answer: string) => {
    const asked: string[] = [];
    return {
      asked,
      question: async (query: string): Promise<string> => {
        asked.push(query);
        return answer;
      },
    };
  };

  it.each(["y", "Y", " yes "])("proceeds on %j", async (answer) => {
    const prompter = answering(answer);
    expect(await confirmProceed(prompter)).toBe(true);
    expect(prompter.asked).toEqual([CONFIRM_QUESTION]);
  });

  it.each(["", "n", "no", "maybe"])("blocks on %j", async (answer) => {
    expect(await confirmProceed(answering(answer))).toBe(false);
  });
});
