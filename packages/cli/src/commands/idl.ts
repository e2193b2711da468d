/**
 * IDL Command
 * Compiles one IDL file to a protocol or schema document
 */

import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { compile, formatJson } from "@avdl/core";
import chalk from "chalk";
import ora from "ora";
import { type ImportOptions, importDirs, messageOf, printDiagnostics, rootFor } from "./shared.js";

interface IdlOptions extends ImportOptions {
  output?: string;
}

export async function idlCommand(
  input: string | undefined,
  output: string | undefined,
  options: IdlOptions
): Promise<void> {
  const target = output ?? options.output;
  const label = input === undefined || input === "-" ? "standard input" : input;
  const spinner = ora({ text: `Compiling ${label}...`, stream: process.stderr }).start();

  try {
    const root = await rootFor(input);
    const result = compile(root, { importDirs: importDirs(options) });

    if (!result.success || result.output === undefined) {
      spinner.fail(chalk.red("Compilation failed"));
      printDiagnostics(result);
      process.exit(1);
    }

    spinner.succeed(chalk.green("Compilation successful"));
    printDiagnostics(result);

    const json = `${formatJson(result.output)}\n`;
    if (target) {
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, json, "utf8");
      console.error(chalk.dim(`Written to ${target}`));
    } else {
      process.stdout.write(json);
    }
  } catch (error) {
    spinner.fail(chalk.red(`Failed to compile: ${messageOf(error)}`));
    process.exit(1);
  }
}
