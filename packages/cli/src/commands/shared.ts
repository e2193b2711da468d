/**
 * Helpers shared by the commands: input, import directories and reporting
 */

import { readdir } from "node:fs/promises";
import { delimiter, join } from "node:path";
import { type Diagnostic, type RootSource, formatDiagnostic } from "@avdl/core";
import chalk from "chalk";

/** Options every compiling command accepts */
export interface ImportOptions {
  importDir?: string[];
}

/** Commander collector for repeatable options */
export function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

/**
 * Import search path: explicit `--import-dir` values first, then the entries
 * of AVDL_IMPORT_PATH.
 */
export function importDirs(
  options: ImportOptions,
  env: NodeJS.ProcessEnv = process.env
): string[] {
  const fromEnv = (env.AVDL_IMPORT_PATH ?? "").split(delimiter).filter((dir) => dir.length > 0);
  return [...(options.importDir ?? []), ...fromEnv];
}

/** Turn a command-line input into a compile root; `-` or nothing reads stdin */
export async function rootFor(input: string | undefined): Promise<RootSource> {
  if (input === undefined || input === "-") {
    return { text: await readStdin(), name: "<stdin>" };
  }
  return { path: input };
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}

/** Every `.avdl` file under a directory, sorted by path */
export async function collectIdlFiles(directory: string): Promise<string[]> {
  const entries = await readdir(directory, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    const fullPath = join(directory, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await collectIdlFiles(fullPath)));
      continue;
    }
    if (entry.isFile() && entry.name.endsWith(".avdl")) {
      files.push(fullPath);
    }
  }

  return files.sort();
}

/** Print warnings in yellow and errors in red, to stderr */
export function printDiagnostics(result: { errors: Diagnostic[]; warnings: Diagnostic[] }): void {
  for (const warning of result.warnings) {
    console.error(chalk.yellow(formatDiagnostic(warning)));
  }
  for (const error of result.errors) {
    console.error(chalk.red(formatDiagnostic(error)));
  }
}

/** Error message of an unknown thrown value */
export function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
