/**
 * Terminal dispatch
 *
 * Opens a new terminal window running the launcher script. Strategies are
 * tried in a fixed order; a missing program or a failed launch falls through
 * to the next one.
 *
 * Default chain ("auto"):
 *   1. ghostty CLI on PATH        ghostty +new-window --command=<script>
 *   2. Ghostty.app installed      open -na Ghostty.app --args --command=<script>
 *   3. Terminal.app               osascript ... do script "/bin/bash <script>"
 */

import which from "which";
import type {
  TerminalPreference,
  TerminalStrategyName,
} from "./types.js";
import { NoTerminalAvailableError } from "./errors.js";
import { isDirectory } from "./fs-utils.js";
import { logger } from "./logger.js";
import { runCommand } from "./process.js";
import { shellQuote, type LauncherScript } from "./command-builder.js";

export const GHOSTTY_APP_PATH = "/Applications/Ghostty.app";
export const ITERM_APP_PATH = "/Applications/iTerm.app";

/**
 * Host facilities used by the strategies
 */
export interface TerminalEnvironment {
  /** Absolute path of an executable on PATH, or null */
  findExecutable(name: string): Promise<string | null>;
  /** Whether an application bundle is installed */
  hasApplication(appPath: string): boolean;
  /** Run a command to completion; null when it could not be started */
  run(command: string, args: string[]): Promise<number | null>;
}

export const nodeTerminalEnvironment: TerminalEnvironment = {
  async findExecutable(name: string): Promise<string | null> {
    try {
      return await which(name);
    } catch {
      return null;
    }
  },

  hasApplication(appPath: string): boolean {
    return isDirectory(appPath);
  },

  async run(command: string, args: string[]): Promise<number | null> {
    const result = await runCommand(command, args);
    if (result.code !== 0) {
      logger.debug(`${command} failed`, {
        code: result.code,
        stderr: result.stderr.trim(),
        error: result.error?.message,
      });
    }
    return result.code;
  },
};

export interface DispatchOptions {
  preference: TerminalPreference;
  fullscreen: boolean;
  env?: TerminalEnvironment;
}

type Strategy = (
  script: LauncherScript,
  env: TerminalEnvironment,
  fullscreen: boolean
) => Promise<boolean>;

const GHOSTTY_FULLSCREEN_ARGS = [
  "--fullscreen=true",
  "--macos-non-native-fullscreen=visible-menu",
];

export const TERMINAL_APP_SCRIPT = [
  "on run argv",
  '  tell application "Terminal"',
  "    activate",
  "    do script (item 1 of argv)",
  "  end tell",
  "end run",
].join("\n");

export const ITERM_SCRIPT = [
  "on run argv",
  '  tell application "iTerm2"',
  "    create window with default profile command (item 1 of argv)",
  "  end tell",
  "end run",
].join("\n");

function ghosttyArgs(script: LauncherScript, fullscreen: boolean): string[] {
  return [`--command=${script.path}`, ...(fullscreen ? GHOSTTY_FULLSCREEN_ARGS : [])];
}

/**
 * The shell command a scripted terminal types into its new window
 */
export function shellInvocation(script: LauncherScript): string {
  return `/bin/bash ${shellQuote(script.path)}`;
}

const STRATEGIES: Record<TerminalStrategyName, Strategy> = {
  "ghostty-cli": async (script, env, fullscreen) => {
    const ghostty = await env.findExecutable("ghostty");
    if (!ghostty) return false;
    const code = await env.run(ghostty, [
      "+new-window",
      ...ghosttyArgs(script, fullscreen),
    ]);
    return code === 0;
  },

  "ghostty-app": async (script, env, fullscreen) => {
    if (!env.hasApplication(GHOSTTY_APP_PATH)) return false;
    const code = await env.run("open", [
      "-na",
      "Ghostty.app",
      "--args",
      ...ghosttyArgs(script, fullscreen),
    ]);
    return code === 0;
  },

  "terminal-app": async (script, env) => {
    const osascript = await env.findExecutable("osascript");
    if (!osascript) return false;
    const code = await env.run(osascript, [
      "-e",
      TERMINAL_APP_SCRIPT,
      "--",
      shellInvocation(script),
    ]);
    return code === 0;
  },

  iterm: async (script, env) => {
    if (!env.hasApplication(ITERM_APP_PATH)) return false;
    const code = await env.run("osascript", [
      "-e",
      ITERM_SCRIPT,
      "--",
      shellInvocation(script),
    ]);
    return code === 0;
  },
};

export const STRATEGY_CHAINS: Record<TerminalPreference, TerminalStrategyName[]> = {
  auto: ["ghostty-cli", "ghostty-app", "terminal-app"],
  ghostty: ["ghostty-cli", "ghostty-app"],
  iterm: ["iterm"],
  terminal: ["terminal-app"],
};

/**
 * Run the script in the first terminal that accepts it
 *
 * @returns the strategy that launched the window
 * @throws NoTerminalAvailableError when every strategy fails
 */
export async function dispatchToTerminal(
  script: LauncherScript,
  options: DispatchOptions
): Promise<TerminalStrategyName> {
  const env = options.env ?? nodeTerminalEnvironment;
  const attempted: TerminalStrategyName[] = [];

  for (const name of STRATEGY_CHAINS[options.preference]) {
    attempted.push(name);
    try {
      if (await STRATEGIES[name](script, env, options.fullscreen)) {
        logger.debug("terminal launched", { strategy: name });
        return name;
      }
    } catch (error) {
      logger.debug(`strategy ${name} threw`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
    logger.debug("terminal strategy unavailable", { strategy: name });
  }

  throw new NoTerminalAvailableError(attempted);
}

/**
 * Pick the terminal `termhook init` writes into a new config
 */
export async function detectTerminal(
  env: TerminalEnvironment = nodeTerminalEnvironment
): Promise<Exclude<TerminalPreference, "auto">> {
  if (
    (await env.findExecutable("ghostty")) !== null ||
    env.hasApplication(GHOSTTY_APP_PATH)
  ) {
    return "ghostty";
  }
  if (env.hasApplication(ITERM_APP_PATH)) {
    return "iterm";
  }
  return "terminal";
}
