#!/usr/bin/env node
import fs from "node:fs/promises";
import path from "node:path";
import readline from "node:readline/promises";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import { createRepoGitClient } from "../ingest/staged-files.js";
import { runInstallHookCommand } from "./install-hook-command.js";
import { runScanCommand, type OutputFormat } from "./scan-command.js";
import { runStagedCommand } from "./staged-command.js";

interface GlobalOptions {
  readonly verbose?: boolean;
  readonly quiet?: boolean;
}

interface ScanCliOptions {
  readonly format: string;
  readonly rules?: string;
}

interface StagedCliOptions {
  readonly rules?: string;
  readonly yes?: boolean;
}

interface InstallHookCliOptions {
  readonly force?: boolean;
}

const program = new Command();
const toolVersion = await loadVersion();

program
  .name("leakgate")
  .description("Flag lines that look like secrets before they are committed")
  .version(toolVersion)
  .option("--verbose", "Report skipped files and loaded rules on stderr")
  .option("--quiet", "Suppress non-essential output");

program
  .command("scan", { isDefault: true })
  .description("Scan the given files and exit non-zero if secrets are found")
  .argument("[files...]", "Files to scan")
  .option("--format <format>", "Output format (text|json)", "text")
  .option("--rules <file>", "Replace the built-in rules file")
  .action(async (files: string[], options: ScanCliOptions) => {
    try {
      const result = await runScanCommand(
        {
          files,
          format: parseFormat(options.format),
          rulesFile: options.rules,
          quiet: Boolean(program.opts<GlobalOptions>().quiet),
          onDiagnostic: diagnosticWriter(),
        },
        toolVersion,
      );
      if (result.output) {
        await writeStdout(result.output + "\n");
      }
      process.exitCode = result.exitCode;
    } catch (error) {
      await writeError(error);
      process.exitCode = 1;
    }
  });

program
  .command("staged")
  .description("Scan staged files and ask before letting the commit through")
  .option("--rules <file>", "Replace the built-in rules file")
  .option("--yes", "Allow the commit without asking when secrets are found")
  .action(async (options: StagedCliOptions) => {
    const rl = process.stdin.isTTY
      ? readline.createInterface({
          input: process.stdin,
          output: process.stdout,
        })
      : undefined;
    try {
      const result = await runStagedCommand(
        {
          git: await createRepoGitClient(),
          write: writeStdout,
          rulesFile: options.rules,
          assumeYes: Boolean(options.yes),
          quiet: Boolean(program.opts<GlobalOptions>().quiet),
          prompter: rl,
          onDiagnostic: diagnosticWriter(),
        },
        toolVersion,
      );
      process.exitCode = result.exitCode;
    } catch (error) {
      await writeError(error);
      process.exitCode = 1;
    } finally {
      rl?.close();
    }
  });

program
  .command("install-hook")
  .description("Install a git pre-commit hook that runs `leakgate staged`")
  .option("--force", "Replace an existing pre-commit hook")
  .action(async (options: InstallHookCliOptions) => {
    try {
      const message = await runInstallHookCommand({
        git: await createRepoGitClient(),
        force: Boolean(options.force),
      });
      if (!program.opts<GlobalOptions>().quiet) {
        await writeStdout(message + "\n");
      }
    } catch (error) {
      await writeError(error);
      process.exitCode = 1;
    }
  });

async function loadVersion(): Promise<string> {
  const dir = path.dirname(fileURLToPath(import.meta.url));
  const rootPath = path.resolve(dir, "..", "..");
  const raw = await fs.readFile(path.join(rootPath, "package.json"), "utf8");
  const json = JSON.parse(raw) as { version?: string };
  return json.version ?? "0.0.0";
}

function parseFormat(value: string): OutputFormat {
  if (value === "text" || value === "json") {
    return value;
  }
  throw new Error(`Unsupported format: ${value}`);
}

function diagnosticWriter(): ((message: string) => void) | undefined {
  const globals = program.opts<GlobalOptions>();
  if (!globals.verbose || globals.quiet) {
    return undefined;
  }
  return (message) => {
    process.stderr.write(message + "\n");
  };
}

async function writeStdout(message: string): Promise<void> {
  await writeTo(process.stdout, message);
}

// Errors always print; --verbose adds the stack when there is one.
async function writeError(error: unknown): Promise<void> {
  const { verbose } = program.opts<GlobalOptions>();
  const message =
    error instanceof Error
      ? (verbose && error.stack) || error.message
      : String(error);
  await writeTo(process.stderr, message + "\n");
}

function writeTo(stream: NodeJS.WriteStream, message: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    stream.write(message, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

await program.parseAsync(process.argv);
