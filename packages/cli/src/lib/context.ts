/**
 * Per-invocation state shared by commands
 */

import type { Command } from "commander";
import { isVerbose } from "./env.js";
import type { CliIo } from "./io.js";

export interface GlobalOptions {
  verbose?: boolean;
  quiet?: boolean;
}

export interface CliContext {
  io: CliIo;
  /** Exit code for a run that completes without throwing */
  exitCode: number;
}

/**
 * Resolve global flags for the current invocation
 */
export function globalOptions(program: Command): { verbose: boolean; quiet: boolean } {
  const opts = program.opts<GlobalOptions>();
  return {
    verbose: opts.verbose === true || isVerbose(),
    quiet: opts.quiet === true,
  };
}
