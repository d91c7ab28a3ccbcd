/**
 * Child process helper
 *
 * Arguments are always passed as an array; no shell parses them.
 */

import { spawn } from "child_process";

export interface CommandResult {
  /** Exit code, or null when the process could not be started or was killed */
  code: number | null;
  stdout: string;
  stderr: string;
  /** Spawn failure (e.g. ENOENT) */
  error?: Error;
}

/**
 * Run a command to completion and collect its output
 *
 * Never rejects: spawn failures are reported through `error`.
 */
export function runCommand(
  command: string,
  args: string[]
): Promise<CommandResult> {
  return new Promise((resolve) => {
    let stdout = "";
    let stderr = "";
    let settled = false;

    const finish = (result: CommandResult) => {
      if (settled) return;
      settled = true;
      resolve(result);
    };

    const child = spawn(command, args, {
      stdio: ["ignore", "pipe", "pipe"],
    });

    // Decode as a stream so multibyte characters split across chunks survive
    child.stdout?.setEncoding("utf8");
    child.stderr?.setEncoding("utf8");

    child.stdout?.on("data", (data: string) => {
      stdout += data;
    });

    child.stderr?.on("data", (data: string) => {
      stderr += data;
    });

    child.on("error", (error) => {
      finish({ code: null, stdout, stderr, error });
    });

    child.on("close", (code) => {
      finish({ code, stdout, stderr });
    });
  });
}
