/**
 * show: print the descriptions held in a file
 */

import type { Command } from "commander";
import { WIRE_FIELD_ORDER, encodeIndexDescription, readIndexDescriptions, stableStringify } from "@idxmeta/sdk";
import { parseNonNegativeInt } from "../lib/arg.js";
import { globalOptions } from "../lib/context.js";
import type { CliContext } from "../lib/context.js";
import { formatCoverage, printLines } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";

interface ShowOptions {
  json?: boolean;
  limit?: number;
}

export function createShowCommand(program: Command, context: CliContext): Command {
  return program
    .command("show <file>")
    .description("Show the index descriptions in a JSON file")
    .option("--json", "Print canonical wire JSON instead of text")
    .option("--limit <n>", "Show at most n descriptions", (value: string) => parseNonNegativeInt(value, "--limit"))
    .action(async (file: string, options: ShowOptions) => {
      const { verbose } = globalOptions(program);

      await withTiming("cli.show", { io: context.io, verbose }, async () => {
        const all = await readIndexDescriptions(file);
        const descriptions = options.limit === undefined ? all : all.slice(0, options.limit);

        if (options.json) {
          const records = descriptions.map((description) => encodeIndexDescription(description));
          context.io.stdout(stableStringify(records, 2, WIRE_FIELD_ORDER));
          return;
        }

        printLines(
          context.io,
          descriptions.flatMap((description) => [description.toString(), `  ${formatCoverage(description)}`])
        );
      });
    });
}
