#!/usr/bin/env node

/**
 * termhook CLI - open termhook:// URLs in a terminal
 */

import { Command } from "commander";
import { handleLaunch, type HandleOptions } from "./cli/launch-commands.js";
import { handleInit, type InitOptions } from "./cli/init-commands.js";
import {
  handleProjectAdd,
  handleProjectList,
  handleProjectRemove,
  type ProjectListOptions,
} from "./cli/project-commands.js";
import { handleConfigPath, handleConfigShow } from "./cli/config-commands.js";
import { VERSION } from "./version.js";

const program = new Command();

program
  .name("termhook")
  .description("termhook - launch a CLI tool in a terminal from a termhook:// URL")
  .version(VERSION);

// ============================================================================
// HANDLE COMMAND
// ============================================================================

program
  .command("handle <url>")
  .description("Validate a termhook:// URL, confirm it, and open a terminal")
  .option("-t, --terminal <terminal>", "Terminal (auto, ghostty, iterm, terminal)")
  .option("--prompter <kind>", "Confirmation prompt (dialog, tty)")
  .option("--dry-run", "Print the launcher script instead of running it")
  .option("--verbose", "Print debug output")
  .action(async (url: string, options: HandleOptions) => {
    process.exitCode = await handleLaunch(url, options);
  });

// ============================================================================
// INIT COMMAND
// ============================================================================

program
  .command("init")
  .description("Create a default config file with the detected terminal")
  .option("--force", "Overwrite an existing config")
  .action(async (options: InitOptions) => {
    process.exitCode = await handleInit(options);
  });

// ============================================================================
// PROJECT COMMANDS
// ============================================================================

const project = program
  .command("project")
  .alias("projects")
  .description("Manage project name -> directory mappings");

project
  .command("list")
  .description("List mapped projects")
  .option("--json", "Output in JSON format")
  .action(async (options: ProjectListOptions) => {
    process.exitCode = await handleProjectList(options);
  });

project
  .command("add <name> <directory>")
  .description("Map a project name to a directory")
  .action(async (name: string, directory: string) => {
    process.exitCode = await handleProjectAdd(name, directory);
  });

project
  .command("remove <name>")
  .description("Remove a project mapping")
  .action(async (name: string) => {
    process.exitCode = await handleProjectRemove(name);
  });

// ============================================================================
// CONFIG COMMANDS
// ============================================================================

const config = program.command("config").description("Inspect configuration");

config
  .command("path")
  .description("Print the config file location")
  .action(() => {
    process.exitCode = handleConfigPath();
  });

config
  .command("show")
  .description("Print the effective configuration")
  .action(async () => {
    process.exitCode = await handleConfigShow();
  });

await program.parseAsync(process.argv);
