/**
 * idxmeta command line program
 */

import { Command, CommanderError } from "commander";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { createBuildCommand } from "./commands/build.js";
import { createCompareCommand } from "./commands/compare.js";
import { createShowCommand } from "./commands/show.js";
import { globalOptions } from "./lib/context.js";
import type { CliContext } from "./lib/context.js";
import { formatCliError, mapSdkErrorToExitCode, EXIT_OK } from "./lib/errors.js";
import { processIo } from "./lib/io.js";
import type { CliIo } from "./lib/io.js";
import { colorize } from "./lib/render.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Version from package.json
 */
function readVersion(): string {
  const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf-8"));
  if (
    typeof packageJson === "object" &&
    packageJson !== null &&
    "version" in packageJson &&
    typeof packageJson.version === "string"
  ) {
    return packageJson.version;
  }
  return "0.0.0";
}

/**
 * Build the command tree for one invocation
 */
export function createProgram(context: CliContext): Command {
  const program = new Command();
  const { io } = context;

  // Route all commander output through the context and never exit the process
  program
    .configureOutput({
      writeOut: (str) => io.stdout(str),
      writeErr: (str) => io.stderr(str),
      outputError: (str, write) => write(colorize(str, "red", io.stderrIsTTY)),
    })
    .exitOverride();

  program
    .name("idxmeta")
    .description("Build, inspect and compare index descriptions")
    .version(readVersion())
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output");

  createBuildCommand(program, context);
  createShowCommand(program, context);
  createCompareCommand(program, context);

  return program;
}

/**
 * Run the CLI and resolve to its exit code
 * @param argv - Full argv, including the node and script entries
 */
export async function run(argv: readonly string[], io: CliIo = processIo()): Promise<number> {
  const context: CliContext = { io, exitCode: EXIT_OK };
  const program = createProgram(context);

  try {
    await program.parseAsync([...argv]);
    return context.exitCode;
  } catch (err) {
    // Commander has already written help, version or usage errors
    if (err instanceof CommanderError) {
      return err.exitCode;
    }

    const { verbose } = globalOptions(program);
    io.stderr(`Error: ${formatCliError(err, verbose)}\n`);
    return mapSdkErrorToExitCode(err);
  }
}
