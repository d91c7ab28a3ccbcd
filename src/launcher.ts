/**
 * URL -> terminal pipeline
 *
 * parse -> resolve project -> confirm -> write script -> dispatch
 */

import * as os from "os";
import * as path from "path";
import type {
  LauncherConfig,
  TerminalPreference,
  TerminalStrategyName,
} from "./types.js";
import { parseLaunchUrl } from "./url-parser.js";
import { resolveProject, type ProjectStore } from "./project-resolver.js";
import { confirmLaunch } from "./confirmation.js";
import {
  SCRIPT_DIR_PREFIX,
  SCRIPT_FILE_NAME,
  removeLauncherScript,
  renderLauncherScript,
  writeLauncherScript,
} from "./command-builder.js";
import {
  dispatchToTerminal,
  type TerminalEnvironment,
} from "./terminal-dispatcher.js";
import { logger } from "./logger.js";
import type { Prompter } from "./prompters/index.js";

export interface LaunchDependencies {
  config: LauncherConfig;
  prompter: Prompter;
  store: ProjectStore;
  /** Overrides config.terminal */
  terminal?: TerminalPreference;
  terminalEnv?: TerminalEnvironment;
  /** Stop after confirmation and return the script instead of running it */
  dryRun?: boolean;
  /** Working directory when the URL names none; defaults to the home directory */
  defaultDirectory?: string;
  /** Parent directory for launcher scripts; defaults to the OS temp dir */
  tempRoot?: string;
}

export type LaunchOutcome =
  | {
      status: "launched";
      strategy: TerminalStrategyName;
      scriptPath: string;
      directory: string;
    }
  | { status: "cancelled"; stage: "project-selection" | "confirmation" }
  | { status: "dry-run"; script: string; directory: string };

export async function runLaunch(
  rawUrl: string,
  deps: LaunchDependencies
): Promise<LaunchOutcome> {
  const request = parseLaunchUrl(rawUrl);
  logger.debug("parsed launch request", {
    promptLength: request.prompt.length,
    dir: request.targetDirectory,
    project: request.projectName,
  });

  let directory = request.targetDirectory ?? deps.defaultDirectory ?? os.homedir();

  if (request.projectName !== undefined) {
    const resolution = await resolveProject(request.projectName, {
      store: deps.store,
      discovery: {
        projectRoots: deps.config.projectRoots,
        historyDir: deps.config.historyDir,
      },
      prompter: deps.prompter,
    });
    if (resolution.kind === "cancelled") {
      return { status: "cancelled", stage: "project-selection" };
    }
    directory = resolution.directory;
  }

  const decision = await confirmLaunch(
    { prompt: request.prompt, directory, command: deps.config.command },
    deps.prompter
  );
  if (decision.outcome === "cancel") {
    return { status: "cancelled", stage: "confirmation" };
  }

  if (deps.dryRun) {
    const placeholderDir = path.join(
      deps.tempRoot ?? os.tmpdir(),
      `${SCRIPT_DIR_PREFIX}XXXXXX`
    );
    const script = renderLauncherScript({
      scriptPath: path.join(placeholderDir, SCRIPT_FILE_NAME),
      scriptDir: placeholderDir,
      directory,
      command: deps.config.command,
      args: deps.config.args,
      prompt: request.prompt,
    });
    return { status: "dry-run", script, directory };
  }

  const script = await writeLauncherScript({
    directory,
    command: deps.config.command,
    args: deps.config.args,
    prompt: request.prompt,
    tempRoot: deps.tempRoot,
  });
  logger.debug("launcher script written", { path: script.path });

  try {
    const strategy = await dispatchToTerminal(script, {
      preference: deps.terminal ?? deps.config.terminal,
      fullscreen: deps.config.fullscreen,
      env: deps.terminalEnv,
    });
    return { status: "launched", strategy, scriptPath: script.path, directory };
  } catch (error) {
    // No terminal will ever run the script, so its trap cannot clean up
    await removeLauncherScript(script);
    throw error;
  }
}
