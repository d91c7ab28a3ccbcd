/**
 * Console output helpers
 *
 * Diagnostics go to stderr so that stdout stays usable for dry-run output.
 */

import chalk from "chalk";

let verbose = process.env.TERMHOOK_DEBUG === "1";

export function setVerbose(enabled: boolean): void {
  verbose = enabled || process.env.TERMHOOK_DEBUG === "1";
}

export const logger = {
  info: (message: string) => console.log(message),
  success: (message: string) => console.log(chalk.green(`✓ ${message}`)),
  warn: (message: string) => console.error(chalk.yellow(`⚠ ${message}`)),
  error: (message: string) => console.error(chalk.red(message)),
  debug: (message: string, data?: Record<string, unknown>) => {
    if (!verbose) return;
    const suffix = data ? ` ${JSON.stringify(data)}` : "";
    console.error(chalk.dim(`[termhook] ${message}${suffix}`));
  },
};
