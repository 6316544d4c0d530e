import type { Stats } from "node:fs";
import fs from "node:fs/promises";
import type { ScanTarget, SkipReason } from "../scanner/types.js";

export const MAX_FILE_SIZE_BYTES = 1024 * 1024;

export interface ReadTargetOptions {
  readonly maxFileSizeBytes?: number;
}

export type ReadTargetResult =
  | { readonly ok: true; readonly target: ScanTarget }
  | {
      readonly ok: false;
      readonly reason: SkipReason;
      readonly detail?: string;
    };

export async function readScanTarget(
  filePath: string,
  options: ReadTargetOptions = {},
): Promise<ReadTargetResult> {
  const maxFileSize = options.maxFileSizeBytes ?? MAX_FILE_SIZE_BYTES;

  let stats: Stats;
  try {
    stats = await fs.stat(filePath);
  } catch (error) {
    if (isErrnoCode(error, "ENOENT") || isErrnoCode(error, "ENOTDIR")) {
      return { ok: false, reason: "missing" };
    }
    return { ok: false, reason: "unreadable", detail: describe(error) };
  }

  if (!stats.isFile()) {
    return { ok: false, reason: "not-a-file" };
  }
  if (stats.size > maxFileSize) {
    return {
      ok: false,
      reason: "too-large",
      detail: `${stats.size} bytes`,
    };
  }

  let bytes: Buffer;
  try {
    bytes = await fs.readFile(filePath);
  } catch (error) {
    return { ok: false, reason: "unreadable", detail: describe(error) };
  }

  const content = decodeText(bytes);
  if (content === null) {
    return { ok: false, reason: "binary" };
  }
  return { ok: true, target: { path: filePath, content } };
}

export function decodeText(bytes: Uint8Array): string | null {
  const decoder = new TextDecoder("utf-8", { fatal: true });
  try {
    return decoder.decode(bytes);
  } catch {
    return null;
  }
}

function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
