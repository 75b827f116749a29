/**
 * build: assemble a description from flags
 */

import type { Command } from "commander";
import { IndexDescription, formatIndexDescription, writeIndexDescriptions } from "@idxmeta/sdk";
import { resolve } from "node:path";
import { parseRowCount } from "../lib/arg.js";
import { globalOptions } from "../lib/context.js";
import type { CliContext } from "../lib/context.js";
import { withTiming } from "../lib/telemetry.js";

interface BuildOptions {
  indexType?: string;
  distanceType?: string;
  indexedRows?: bigint;
  unindexedRows?: bigint;
  raw?: boolean;
  nulls?: boolean;
  out?: string;
}

export function createBuildCommand(program: Command, context: CliContext): Command {
  return program
    .command("build")
    .description("Build an index description and print its wire JSON")
    .option("--index-type <type>", "Index algorithm, e.g. IVF_PQ, BTREE, BITMAP, HNSW")
    .option("--distance-type <type>", "Distance metric, e.g. l2, cosine, dot")
    .option("--indexed-rows <count>", "Rows covered by the index", parseRowCount)
    .option("--unindexed-rows <count>", "Rows not yet covered by the index", parseRowCount)
    .option("--raw", "Output compact JSON")
    .option("--nulls", "Write absent fields as null instead of leaving them out")
    .option("--out <file>", "Write to a file instead of stdout")
    .addHelpText(
      "after",
      `
Examples:
  $ idxmeta build --index-type IVF_PQ --distance-type cosine --indexed-rows 1000 --unindexed-rows 0
  $ idxmeta build --index-type BTREE --out ./btree.json`
    )
    .action(async (options: BuildOptions) => {
      const { verbose, quiet } = globalOptions(program);

      await withTiming("cli.build", { io: context.io, verbose }, async () => {
        const description = IndexDescription.builder()
          .indexType(options.indexType)
          .distanceType(options.distanceType)
          .numIndexedRows(options.indexedRows)
          .numUnindexedRows(options.unindexedRows)
          .build();

        if (options.out) {
          await writeIndexDescriptions(options.out, [description]);
          if (!quiet) {
            context.io.stdout(`Wrote ${resolve(options.out)}\n`);
          }
          return;
        }

        context.io.stdout(
          formatIndexDescription(description, {
            indent: options.raw ? 0 : 2,
            absent: options.nulls ? "null" : "omit",
          })
        );
      });
    });
}
