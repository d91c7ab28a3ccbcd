/**
 * CLI handler for `termhook handle <url>`
 */

import chalk from "chalk";
import {
  EXIT_SUCCESS,
  EXIT_UNEXPECTED,
  type PrompterKind,
  type TerminalPreference,
} from "../types.js";
import { loadConfig, VALID_PROMPTERS, VALID_TERMINALS } from "../config.js";
import { formatErrorMessage, isLaunchError } from "../errors.js";
import { logger, setVerbose } from "../logger.js";
import { runLaunch, type LaunchOutcome } from "../launcher.js";
import { ConfigProjectStore } from "../project-resolver.js";
import { createPrompter, type Prompter } from "../prompters/index.js";
import type { TerminalEnvironment } from "../terminal-dispatcher.js";

export interface HandleOptions {
  terminal?: string;
  prompter?: string;
  dryRun?: boolean;
  verbose?: boolean;
}

/**
 * Overrides for tests
 */
export interface HandleOverrides {
  prompter?: Prompter;
  terminalEnv?: TerminalEnvironment;
  defaultDirectory?: string;
  tempRoot?: string;
}

function parseTerminalOption(value: string | undefined): TerminalPreference | undefined {
  if (value === undefined) return undefined;
  const match = VALID_TERMINALS.find((terminal) => terminal === value);
  if (!match) {
    throw new Error(
      `unknown terminal '${value}' (expected one of: ${VALID_TERMINALS.join(", ")})`
    );
  }
  return match;
}

function parsePrompterOption(value: string | undefined): PrompterKind | undefined {
  if (value === undefined) return undefined;
  const match = VALID_PROMPTERS.find((prompter) => prompter === value);
  if (!match) {
    throw new Error(
      `unknown prompter '${value}' (expected one of: ${VALID_PROMPTERS.join(", ")})`
    );
  }
  return match;
}

function reportOutcome(outcome: LaunchOutcome): void {
  switch (outcome.status) {
    case "launched":
      logger.debug("handed off to terminal", {
        strategy: outcome.strategy,
        directory: outcome.directory,
      });
      break;
    case "cancelled":
      console.error(chalk.dim("Cancelled. Nothing was launched."));
      break;
    case "dry-run":
      process.stdout.write(outcome.script);
      break;
  }
}

/**
 * Handle a launch URL
 * @returns process exit code
 */
export async function handleLaunch(
  url: string,
  options: HandleOptions = {},
  overrides: HandleOverrides = {}
): Promise<number> {
  setVerbose(options.verbose ?? false);

  try {
    const terminal = parseTerminalOption(options.terminal);
    const prompterKind = parsePrompterOption(options.prompter);
    const config = await loadConfig({
      onWarning: (warning) => logger.warn(`config: ${warning}`),
    });

    const outcome = await runLaunch(url, {
      config,
      prompter: overrides.prompter ?? createPrompter(prompterKind ?? config.prompter),
      store: new ConfigProjectStore(config.projects),
      terminal,
      terminalEnv: overrides.terminalEnv,
      dryRun: options.dryRun,
      defaultDirectory: overrides.defaultDirectory,
      tempRoot: overrides.tempRoot,
    });

    reportOutcome(outcome);
    return EXIT_SUCCESS;
  } catch (error) {
    logger.error(formatErrorMessage(error));
    return isLaunchError(error) ? error.exitCode : EXIT_UNEXPECTED;
  }
}
