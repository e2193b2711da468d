/**
 * Check Command
 * Compiles IDL files and reports diagnostics without writing output
 */

import { relative } from "node:path";
import { type CompilationResult, type Diagnostic, compile, locate } from "@avdl/core";
import chalk from "chalk";
import { type ImportOptions, importDirs, printDiagnostics, rootFor } from "./shared.js";

interface CheckOptions extends ImportOptions {
  strict?: boolean;
  json?: boolean;
}

type DiagnosticSummary = { code: string; message: string; line?: number };

export type CheckSummary = {
  file: string;
  success: boolean;
  errors: DiagnosticSummary[];
  warnings: DiagnosticSummary[];
};

function summarizeDiagnostic(diagnostic: Diagnostic): DiagnosticSummary {
  const line =
    diagnostic.source && diagnostic.span
      ? locate(diagnostic.source.text, diagnostic.span.offset).line
      : undefined;
  return { code: diagnostic.code, message: diagnostic.message, line };
}

/** Reduce a result to what `--json` prints; strict mode fails on warnings */
export function summarize(file: string, result: CompilationResult, strict = false): CheckSummary {
  return {
    file,
    success: result.success && !(strict && result.warnings.length > 0),
    errors: result.errors.map(summarizeDiagnostic),
    warnings: result.warnings.map(summarizeDiagnostic),
  };
}

export async function checkCommand(inputs: string[], options: CheckOptions): Promise<void> {
  const targets = inputs.length > 0 ? inputs : ["-"];
  const summaries: CheckSummary[] = [];

  for (const input of targets) {
    const file = input === "-" ? "<stdin>" : relative(process.cwd(), input) || input;
    const result = compile(await rootFor(input), { importDirs: importDirs(options) });
    const summary = summarize(file, result, options.strict);
    summaries.push(summary);

    if (options.json) continue;

    if (summary.success) {
      const note = result.warnings.length > 0 ? " (with warnings)" : "";
      console.log(chalk.green(`✓ ${file}${note}`));
    } else if (result.success) {
      console.log(chalk.red(`✗ ${file} (strict mode)`));
    } else {
      console.log(chalk.red(`✗ ${file}`));
    }
    printDiagnostics(result);
  }

  if (options.json) {
    console.log(JSON.stringify(summaries, null, 2));
  }

  if (summaries.some((summary) => !summary.success)) {
    process.exit(1);
  }
}
