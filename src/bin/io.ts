// src/bin/io.ts — Console and file helpers shared by the CLI commands

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import type { Warning } from "../types.js";

export function stderr(msg: string): void {
  process.stderr.write(msg + "\n");
}

export function stdout(msg: string): void {
  process.stdout.write(msg + "\n");
}

export function printWarnings(warnings: readonly Warning[], quiet: boolean): void {
  if (quiet) return;
  for (const w of warnings) {
    const where = w.file ? ` (${w.file})` : "";
    stderr(`[${w.level}] ${w.module}: ${w.message}${where}`);
  }
}

/** Auto-create the output directory before writing. */
export function writeFileSafe(filePath: string, content: string | Uint8Array): void {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, content);
}
