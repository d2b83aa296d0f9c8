/**
 * Compiler process invocation
 */

import { spawnSync } from "node:child_process";
import { CommandResult, CommandRunner } from "./types";

/**
 * Run a command without a shell and capture its output
 */
export const runCommand: CommandRunner = (command, options = {}) => {
  const [executable, ...args] = command;
  const proc = spawnSync(executable, args, {
    encoding: "utf8",
    maxBuffer: 64 * 1024 * 1024,
    timeout: options.timeoutMs,
  });

  const result: CommandResult = {
    command,
    stdout: proc.stdout ?? "",
    stderr: proc.stderr ?? "",
    status: proc.status,
    signal: proc.signal,
  };
  if (proc.error) {
    result.error = proc.error;
  }
  return result;
};

/**
 * True when the process ran to completion and exited zero
 */
export function succeeded(result: CommandResult): boolean {
  return result.error === undefined && result.status === 0 && result.signal === null;
}
