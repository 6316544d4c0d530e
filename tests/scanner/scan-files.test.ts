import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { scanFiles } from "../../src/scanner/scan-files.js";
import type { RuleRegistry, SkippedFile } from "../../src/scanner/types.js";

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "leakgate-files-"));
});

afterEach(async () => {
  if (tempDir) {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

class FailingPattern extends RegExp {
  override test(input: string): boolean {
    if (input.includes("explode")) {
      throw new Error("matcher failed");
    }
    return super.test(input);
  }
}

const registry: RuleRegistry = {
  version: "1",
  rules: () => [{ name: "Marker", pattern: new FailingPattern("marker") }],
};

describe("scanFiles", () => {
  it("skips a file whose scan throws and keeps going", async () => {
    const broken = path.join(tempDir, "broken.txt");
    const good = path.join(tempDir, "good.txt");
    await fs.writeFile(broken, "explode\n", "utf8");
    await fs.writeFile(good, "marker\n", "utf8");
    const reported: SkippedFile[] = [];

    const result = await scanFiles([broken, good], registry, {
      onSkip: (entry) => reported.push(entry),
    });

    expect(result.findings).toEqual([
      { path: good, line_number: 1, rule_name: "Marker" },
    ]);
    expect(result.filesScanned).toBe(1);
    expect(result.skipped).toEqual([
      { path: broken, reason: "unreadable", detail: "matcher failed" },
    ]);
    expect(reported).toEqual(result.skipped);
  });

  it("reads relative paths from the base directory and reports them as given", async () => {
    await fs.mkdir(path.join(tempDir, "conf"));
    await fs.writeFile(path.join(tempDir, "conf", "a.txt"), "x\nmarker\n", "utf8");

    const result = await scanFiles(["conf/a.txt"], registry, {
      baseDir: tempDir,
    });

    expect(result.findings).toEqual([
      { path: "conf/a.txt", line_number: 2, rule_name: "Marker" },
    ]);
  });
});
