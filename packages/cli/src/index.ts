#!/usr/bin/env node
/**
 * avdl CLI
 * Command-line interface for compiling Avro IDL
 */

import { Command } from "commander";
import { checkCommand } from "./commands/check.js";
import { idlCommand } from "./commands/idl.js";
import { idl2schemataCommand } from "./commands/idl2schemata.js";
import { collect } from "./commands/shared.js";

const program = new Command();

program
  .name("avdl")
  .description("Compile Avro IDL to Avro JSON protocols and schemas")
  .version("0.1.0");

// IDL command
program
  .command("idl [input] [output]")
  .description("Compile an IDL file to a protocol (.avpr) or schema (.avsc); '-' reads stdin")
  .option("-o, --output <file>", "Output file (default: stdout)")
  .option("-I, --import-dir <dir>", "Directory searched for imports (repeatable)", collect)
  .action(idlCommand);

// IDL to schemata command
program
  .command("idl2schemata <input> [outdir]")
  .description("Write one .avsc file per named type from an IDL file or a directory of them")
  .option("-I, --import-dir <dir>", "Directory searched for imports (repeatable)", collect)
  .action(idl2schemataCommand);

// Check command
program
  .command("check [inputs...]")
  .description("Compile IDL files and report diagnostics without writing output")
  .option("-I, --import-dir <dir>", "Directory searched for imports (repeatable)", collect)
  .option("--strict", "Treat warnings as errors")
  .option("--json", "Output results as JSON")
  .action(checkCommand);

await program.parseAsync();
