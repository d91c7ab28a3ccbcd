/**
 * Launcher script construction
 *
 * The script changes into the working directory, runs the tool with the
 * prompt as one literal argument, and deletes itself when the shell exits.
 * Cleanup lives inside the script because the launching process is gone
 * long before the interactive session ends.
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";

export const SCRIPT_FILE_NAME = "launch.sh";
export const SCRIPT_DIR_PREFIX = "termhook-";

/**
 * Quote a single shell word: wrap in single quotes and rewrite each
 * embedded quote as '\''
 */
export function shellQuote(arg: string): string {
  return `'${arg.replace(/'/g, "'\\''")}'`;
}

export function buildCommandLine(
  command: string,
  args: readonly string[],
  prompt: string
): string {
  return [command, ...args, prompt].map(shellQuote).join(" ");
}

export interface LauncherScriptOptions {
  scriptPath: string;
  scriptDir: string;
  directory: string;
  command: string;
  args: readonly string[];
  prompt: string;
}

export function renderLauncherScript(options: LauncherScriptOptions): string {
  const scriptPath = shellQuote(options.scriptPath);
  const scriptDir = shellQuote(options.scriptDir);

  return [
    "#!/bin/bash",
    `cleanup() { rm -f -- ${scriptPath}; rmdir -- ${scriptDir} 2>/dev/null || true; }`,
    "trap cleanup EXIT",
    // Exit on signals so the EXIT trap still runs
    "trap 'exit 129' HUP",
    "trap 'exit 130' INT",
    "trap 'exit 143' TERM",
    `cd -- ${shellQuote(options.directory)} || exit 1`,
    buildCommandLine(options.command, options.args, options.prompt),
    "",
  ].join("\n");
}

export interface LauncherScript {
  path: string;
  /** Private directory holding the script */
  directory: string;
  contents: string;
}

export interface WriteLauncherScriptOptions {
  directory: string;
  command: string;
  args: readonly string[];
  prompt: string;
  /** Parent for the private script directory, defaults to the OS temp dir */
  tempRoot?: string;
}

/**
 * Write the launcher script into a fresh mkdtemp directory (mode 700)
 */
export async function writeLauncherScript(
  options: WriteLauncherScriptOptions
): Promise<LauncherScript> {
  const scriptDir = await fs.mkdtemp(
    path.join(options.tempRoot ?? os.tmpdir(), SCRIPT_DIR_PREFIX)
  );
  const scriptPath = path.join(scriptDir, SCRIPT_FILE_NAME);
  const contents = renderLauncherScript({
    scriptPath,
    scriptDir,
    directory: options.directory,
    command: options.command,
    args: options.args,
    prompt: options.prompt,
  });

  try {
    await fs.writeFile(scriptPath, contents, { mode: 0o700, flag: "wx" });
  } catch (error) {
    await fs.rm(scriptDir, { recursive: true, force: true });
    throw error;
  }

  return { path: scriptPath, directory: scriptDir, contents };
}

/**
 * Remove a script that will never run (no terminal took it)
 */
export async function removeLauncherScript(script: LauncherScript): Promise<void> {
  await fs.rm(script.directory, { recursive: true, force: true });
}
