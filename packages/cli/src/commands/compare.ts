/**
 * compare: check two descriptions for value equality
 */

import type { Command } from "commander";
import { readIndexDescriptions } from "@idxmeta/sdk";
import type { IndexDescription } from "@idxmeta/sdk";
import { globalOptions } from "../lib/context.js";
import type { CliContext } from "../lib/context.js";
import { CliError, EXIT_DIFFERENT } from "../lib/errors.js";
import { colorize, formatDifferences, printLines } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";

async function readFirst(file: string): Promise<IndexDescription> {
  const [first] = await readIndexDescriptions(file);
  if (!first) {
    throw new CliError(`No index descriptions in ${file}`);
  }
  return first;
}

export function createCompareCommand(program: Command, context: CliContext): Command {
  return program
    .command("compare <left> <right>")
    .description("Compare the first description of two files (exit 3 when they differ)")
    .action(async (left: string, right: string) => {
      const { verbose } = globalOptions(program);

      await withTiming("cli.compare", { io: context.io, verbose }, async () => {
        const a = await readFirst(left);
        const b = await readFirst(right);

        if (a.equals(b)) {
          context.io.stdout(`${colorize("equal", "green", context.io.stdoutIsTTY)}\n`);
          return;
        }

        printLines(context.io, formatDifferences(a, b));
        context.exitCode = EXIT_DIFFERENT;
      });
    });
}
