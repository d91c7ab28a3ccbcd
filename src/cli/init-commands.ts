/**
 * CLI handler for `termhook init`
 */

import chalk from "chalk";
import type { LauncherConfig } from "../types.js";
import {
  configFileExists,
  defaultConfig,
  getConfigFilePath,
  writeConfig,
} from "../config.js";
import { formatErrorMessage, isLaunchError } from "../errors.js";
import { logger } from "../logger.js";
import {
  detectTerminal,
  type TerminalEnvironment,
} from "../terminal-dispatcher.js";

export interface InitOptions {
  force?: boolean;
}

/**
 * Write a default config with the detected terminal
 * @returns the written config, or null when a config already exists
 */
export async function performInitialization(
  options: InitOptions = {},
  env?: TerminalEnvironment
): Promise<LauncherConfig | null> {
  if (!options.force && (await configFileExists())) {
    return null;
  }

  const config: LauncherConfig = {
    ...defaultConfig(),
    terminal: await detectTerminal(env),
  };
  await writeConfig(config);
  return config;
}

export async function handleInit(options: InitOptions = {}): Promise<number> {
  try {
    const config = await performInitialization(options);
    if (!config) {
      logger.error(`termhook: config already exists at ${getConfigFilePath()}`);
      console.error(chalk.dim("Use --force to overwrite it."));
      return 1;
    }
    logger.success(`Created ${getConfigFilePath()}`);
    console.log(`  terminal: ${config.terminal}`);
    return 0;
  } catch (error) {
    logger.error(formatErrorMessage(error));
    return isLaunchError(error) ? error.exitCode : 1;
  }
}
