/**
 * User configuration and project mapping storage
 *
 * The config file lives at $XDG_CONFIG_HOME/termhook/config.json (or
 * ~/.config/termhook/config.json). Each process reads it once and writes
 * it at most once, replacing the whole file atomically.
 */

import * as fs from "fs/promises";
import * as path from "path";
import * as os from "os";
import { randomBytes } from "crypto";
import type {
  LauncherConfig,
  PrompterKind,
  TerminalPreference,
} from "./types.js";
import { ConfigIoError } from "./errors.js";
import { isErrnoException } from "./fs-utils.js";

export const VALID_TERMINALS: readonly TerminalPreference[] = [
  "auto",
  "ghostty",
  "iterm",
  "terminal",
];

export const VALID_PROMPTERS: readonly PrompterKind[] = ["dialog", "tty"];

const KNOWN_KEYS = new Set([
  "terminal",
  "command",
  "args",
  "fullscreen",
  "prompter",
  "projectRoots",
  "historyDir",
  "projects",
]);

/**
 * Get configuration directory path
 * Uses XDG_CONFIG_HOME if set, otherwise ~/.config/termhook
 */
export function getConfigDir(): string {
  return process.env.XDG_CONFIG_HOME
    ? path.join(process.env.XDG_CONFIG_HOME, "termhook")
    : path.join(os.homedir(), ".config", "termhook");
}

/**
 * Get config file path (evaluated on each call so tests can move it)
 */
export function getConfigFilePath(): string {
  return path.join(getConfigDir(), "config.json");
}

export function defaultConfig(): LauncherConfig {
  return {
    terminal: "auto",
    command: "claude",
    args: [],
    fullscreen: false,
    prompter: process.platform === "darwin" ? "dialog" : "tty",
    projectRoots: ["~/Projects"],
    historyDir: "~/.claude/projects",
    projects: {},
  };
}

/**
 * Result of validating a config object
 */
export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  config: LauncherConfig;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function hasOwnKey(record: Record<string, unknown>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, key);
}

/**
 * Assign as an own property, so names like "__proto__" stay ordinary keys
 */
function setEntry<T>(record: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(record, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function isTerminalPreference(value: unknown): value is TerminalPreference {
  return VALID_TERMINALS.some((terminal) => terminal === value);
}

function isPrompterKind(value: unknown): value is PrompterKind {
  return VALID_PROMPTERS.some((prompter) => prompter === value);
}

/**
 * Validate a parsed config file and merge it over the defaults
 *
 * Errors make the config unusable; warnings (unknown keys) do not.
 */
export function validateConfig(raw: unknown): ConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const config = defaultConfig();

  if (!isPlainObject(raw)) {
    return {
      valid: false,
      errors: ["config must be a JSON object"],
      warnings,
      config,
    };
  }

  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.has(key)) {
      warnings.push(`unknown key '${key}' ignored`);
    }
  }

  if (raw.terminal !== undefined) {
    if (isTerminalPreference(raw.terminal)) {
      config.terminal = raw.terminal;
    } else {
      errors.push(`terminal must be one of: ${VALID_TERMINALS.join(", ")}`);
    }
  }

  if (raw.command !== undefined) {
    if (typeof raw.command === "string" && raw.command.trim() !== "") {
      config.command = raw.command;
    } else {
      errors.push("command must be a non-empty string");
    }
  }

  if (raw.args !== undefined) {
    if (isStringArray(raw.args)) {
      config.args = raw.args;
    } else {
      errors.push("args must be an array of strings");
    }
  }

  if (raw.fullscreen !== undefined) {
    if (typeof raw.fullscreen === "boolean") {
      config.fullscreen = raw.fullscreen;
    } else {
      errors.push("fullscreen must be a boolean");
    }
  }

  if (raw.prompter !== undefined) {
    if (isPrompterKind(raw.prompter)) {
      config.prompter = raw.prompter;
    } else {
      errors.push(`prompter must be one of: ${VALID_PROMPTERS.join(", ")}`);
    }
  }

  if (raw.projectRoots !== undefined) {
    if (isStringArray(raw.projectRoots)) {
      config.projectRoots = raw.projectRoots;
    } else {
      errors.push("projectRoots must be an array of strings");
    }
  }

  if (raw.historyDir !== undefined) {
    if (raw.historyDir === null || typeof raw.historyDir === "string") {
      config.historyDir = raw.historyDir;
    } else {
      errors.push("historyDir must be a string or null");
    }
  }

  if (raw.projects !== undefined) {
    if (!isPlainObject(raw.projects)) {
      errors.push("projects must be an object");
    } else {
      for (const [name, directory] of Object.entries(raw.projects)) {
        if (typeof directory !== "string" || !path.isAbsolute(directory)) {
          errors.push(`projects.${name} must be an absolute path`);
          continue;
        }
        setEntry(config.projects, name, directory);
      }
    }
  }

  return { valid: errors.length === 0, errors, warnings, config };
}

/**
 * Read the raw config object, or null when the file does not exist
 */
async function readConfigObject(): Promise<unknown> {
  const configPath = getConfigFilePath();
  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return null;
    }
    throw new ConfigIoError(
      `Failed to read config file`,
      configPath,
      error instanceof Error ? error : undefined
    );
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw new ConfigIoError(
      `Config file is not valid JSON`,
      configPath,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Options for loading configuration
 */
export interface LoadConfigOptions {
  /** Called with validation warnings (unknown keys) */
  onWarning?: (warning: string) => void;
}

/**
 * Load configuration, falling back to defaults when no file exists
 *
 * @throws ConfigIoError when the file cannot be read or is invalid
 */
export async function loadConfig(
  options: LoadConfigOptions = {}
): Promise<LauncherConfig> {
  const raw = await readConfigObject();
  if (raw === null) {
    return defaultConfig();
  }

  const result = validateConfig(raw);
  if (!result.valid) {
    throw new ConfigIoError(
      `Invalid config: ${result.errors.join("; ")}`,
      getConfigFilePath()
    );
  }
  for (const warning of result.warnings) {
    options.onWarning?.(warning);
  }
  return result.config;
}

export async function configFileExists(): Promise<boolean> {
  try {
    await fs.access(getConfigFilePath());
    return true;
  } catch {
    return false;
  }
}

/**
 * Ensure config directory exists (mode 700)
 */
async function ensureConfigDir(): Promise<void> {
  await fs.mkdir(getConfigDir(), { recursive: true, mode: 0o700 });
}

/**
 * Replace the config file atomically: write a uniquely named temp file in
 * the same directory, then rename it over the target.
 */
async function writeConfigObject(contents: Record<string, unknown>): Promise<void> {
  const configPath = getConfigFilePath();
  const tempFile = `${configPath}.${process.pid}.${randomBytes(6).toString("hex")}.tmp`;
  try {
    await ensureConfigDir();
    await fs.writeFile(tempFile, `${JSON.stringify(contents, null, 2)}\n`, {
      mode: 0o600,
      flag: "wx",
    });
    await fs.rename(tempFile, configPath);
  } catch (error) {
    await fs.rm(tempFile, { force: true });
    throw new ConfigIoError(
      `Failed to write config file`,
      configPath,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Read the config object for an update
 *
 * @returns null when the file does not exist
 * @throws ConfigIoError when the file is unusable, so it is never replaced
 */
async function readValidConfigObject(): Promise<Record<string, unknown> | null> {
  const raw = await readConfigObject();
  if (raw === null) {
    return null;
  }
  const result = validateConfig(raw);
  if (!result.valid || !isPlainObject(raw)) {
    throw new ConfigIoError(
      `Invalid config: ${result.errors.join("; ")}`,
      getConfigFilePath()
    );
  }
  return raw;
}

/**
 * Re-read the file and apply a change, preserving keys this version
 * does not know about.
 */
async function updateConfigObject(
  mutate: (current: Record<string, unknown>) => void
): Promise<void> {
  const raw = await readValidConfigObject();
  const current: Record<string, unknown> = raw !== null ? { ...raw } : {};
  mutate(current);
  await writeConfigObject(current);
}

/**
 * Write a complete configuration (used by `termhook init`)
 */
export async function writeConfig(config: LauncherConfig): Promise<void> {
  await writeConfigObject({
    terminal: config.terminal,
    command: config.command,
    args: config.args,
    fullscreen: config.fullscreen,
    prompter: config.prompter,
    projectRoots: config.projectRoots,
    historyDir: config.historyDir,
    projects: config.projects,
  });
}

export async function saveProjectMapping(
  name: string,
  directory: string
): Promise<void> {
  await updateConfigObject((current) => {
    const projects: Record<string, unknown> = isPlainObject(current.projects)
      ? { ...current.projects }
      : {};
    setEntry(projects, name, directory);
    current.projects = projects;
  });
}

/**
 * Remove a project mapping
 * @returns false when the name was not mapped
 */
export async function removeProjectMapping(name: string): Promise<boolean> {
  const raw = await readValidConfigObject();
  if (raw === null || !isPlainObject(raw.projects) || !hasOwnKey(raw.projects, name)) {
    return false;
  }
  await updateConfigObject((current) => {
    const projects: Record<string, unknown> = isPlainObject(current.projects)
      ? { ...current.projects }
      : {};
    delete projects[name];
    current.projects = projects;
  });
  return true;
}
