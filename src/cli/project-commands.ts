/**
 * CLI handlers for project mapping management
 */

import chalk from "chalk";
import Table from "cli-table3";
import * as path from "path";
import {
  loadConfig,
  removeProjectMapping,
  saveProjectMapping,
} from "../config.js";
import { formatErrorMessage, isLaunchError } from "../errors.js";
import { isDirectory } from "../fs-utils.js";
import { logger } from "../logger.js";

export interface ProjectListOptions {
  json?: boolean;
}

function failure(error: unknown): number {
  logger.error(formatErrorMessage(error));
  return isLaunchError(error) ? error.exitCode : 1;
}

export async function handleProjectList(
  options: ProjectListOptions = {}
): Promise<number> {
  try {
    const config = await loadConfig();
    const names = Object.keys(config.projects).sort();

    if (options.json) {
      console.log(JSON.stringify(config.projects, null, 2));
      return 0;
    }

    if (names.length === 0) {
      console.log(chalk.gray("No projects mapped yet"));
      return 0;
    }

    const table = new Table({
      head: [chalk.cyan("Project"), chalk.cyan("Directory"), chalk.cyan("Status")],
    });
    for (const name of names) {
      const directory = config.projects[name];
      table.push([
        name,
        directory,
        isDirectory(directory) ? chalk.green("ok") : chalk.yellow("missing"),
      ]);
    }

    console.log(table.toString());
    console.log();
    console.log(chalk.gray("To map another project: termhook project add <name> <directory>"));
    return 0;
  } catch (error) {
    return failure(error);
  }
}

export async function handleProjectAdd(
  name: string,
  directory: string
): Promise<number> {
  try {
    if (!path.isAbsolute(directory)) {
      logger.error(`✗ Directory must be an absolute path: ${directory}`);
      return 1;
    }
    const resolved = path.resolve(directory);
    if (!isDirectory(resolved)) {
      logger.error(`✗ Not a directory: ${resolved}`);
      return 1;
    }
    await saveProjectMapping(name, resolved);
    logger.success(`Mapped ${name} -> ${resolved}`);
    return 0;
  } catch (error) {
    return failure(error);
  }
}

export async function handleProjectRemove(name: string): Promise<number> {
  try {
    const removed = await removeProjectMapping(name);
    if (!removed) {
      logger.error(`✗ Project not mapped: ${name}`);
      return 1;
    }
    logger.success(`Removed ${name}`);
    return 0;
  } catch (error) {
    return failure(error);
  }
}
