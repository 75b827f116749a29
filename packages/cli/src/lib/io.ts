/**
 * Output sinks for the CLI
 */

/**
 * Where command output goes. Commands never touch process streams directly.
 */
export interface CliIo {
  stdout: (content: string) => void;
  stderr: (content: string) => void;
  stdoutIsTTY: boolean;
  stderrIsTTY: boolean;
}

/**
 * Sinks bound to the process streams
 */
export function processIo(): CliIo {
  return {
    stdout: (content) => {
      process.stdout.write(content);
    },
    stderr: (content) => {
      process.stderr.write(content);
    },
    stdoutIsTTY: process.stdout.isTTY ?? false,
    stderrIsTTY: process.stderr.isTTY ?? false,
  };
}
