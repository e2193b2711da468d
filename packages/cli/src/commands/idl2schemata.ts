/**
 * IDL to Schemata Command
 * Writes one .avsc document per named type
 */

import { mkdir, stat, writeFile } from "node:fs/promises";
import { join, relative } from "node:path";
import { type SchemaDocument, compileToNamedSchemata, formatJson } from "@avdl/core";
import chalk from "chalk";
import ora from "ora";
import {
  type ImportOptions,
  collectIdlFiles,
  importDirs,
  messageOf,
  printDiagnostics,
} from "./shared.js";

/** File name a schema document is written to */
export function schemaFileName(document: SchemaDocument): string {
  return `${document.name}.avsc`;
}

export async function idl2schemataCommand(
  input: string,
  outdir: string | undefined,
  options: ImportOptions
): Promise<void> {
  const target = outdir ?? ".";
  let hasErrors = false;

  try {
    const info = await stat(input);
    const files = info.isDirectory() ? await collectIdlFiles(input) : [input];

    if (files.length === 0) {
      console.error(chalk.yellow(`No .avdl files found in ${input}`));
      process.exit(1);
    }

    await mkdir(target, { recursive: true });

    for (const file of files) {
      const name = relative(process.cwd(), file) || file;
      const spinner = ora({ text: `Compiling ${name}...`, stream: process.stderr }).start();
      const result = compileToNamedSchemata({ path: file }, { importDirs: importDirs(options) });

      if (!result.success) {
        spinner.fail(chalk.red(`✗ ${name}`));
        printDiagnostics(result);
        hasErrors = true;
        continue;
      }

      for (const document of result.schemata) {
        await writeFile(join(target, schemaFileName(document)), `${formatJson(document.schema)}\n`, "utf8");
      }
      spinner.succeed(chalk.green(`✓ ${name}`));
      printDiagnostics(result);
      console.error(chalk.dim(`  ${result.schemata.length} schema(s) written to ${target}`));
    }
  } catch (error) {
    console.error(chalk.red(`Failed to compile: ${messageOf(error)}`));
    process.exit(1);
  }

  if (hasErrors) {
    process.exit(1);
  }
}
