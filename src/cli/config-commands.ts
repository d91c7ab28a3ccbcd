/**
 * CLI handlers for config inspection
 */

import { getConfigFilePath, loadConfig } from "../config.js";
import { formatErrorMessage, isLaunchError } from "../errors.js";
import { logger } from "../logger.js";

export function handleConfigPath(): number {
  console.log(getConfigFilePath());
  return 0;
}

export async function handleConfigShow(): Promise<number> {
  try {
    const config = await loadConfig({
      onWarning: (warning) => logger.warn(`config: ${warning}`),
    });
    console.log(JSON.stringify(config, null, 2));
    return 0;
  } catch (error) {
    logger.error(formatErrorMessage(error));
    return isLaunchError(error) ? error.exitCode : 1;
  }
}
