/**
 * Error types for the launch pipeline
 *
 * Every failure maps to a distinct process exit code so that callers
 * scripting termhook can tell them apart. User cancellation is not an error.
 */

import { EXIT_CODES, type LaunchErrorCode } from "./types.js";

/**
 * Base class for all launch errors
 */
export class LaunchError extends Error {
  public readonly exitCode: number;

  constructor(
    message: string,
    public readonly code: LaunchErrorCode,
    public readonly hint?: string
  ) {
    super(message);
    this.name = "LaunchError";
    this.exitCode = EXIT_CODES[code];
    Object.setPrototypeOf(this, LaunchError.prototype);
  }
}

export class InvalidUrlError extends LaunchError {
  constructor(message: string, public readonly url: string) {
    super(message, "INVALID_URL");
    this.name = "InvalidUrlError";
    Object.setPrototypeOf(this, InvalidUrlError.prototype);
  }
}

export class MissingPromptError extends LaunchError {
  constructor() {
    super("missing or empty 'prompt' parameter", "MISSING_PROMPT");
    this.name = "MissingPromptError";
    Object.setPrototypeOf(this, MissingPromptError.prototype);
  }
}

export class PromptTooLongError extends LaunchError {
  constructor(
    public readonly length: number,
    public readonly limit: number
  ) {
    super(
      `prompt is ${length} characters long (limit: ${limit})`,
      "PROMPT_TOO_LONG"
    );
    this.name = "PromptTooLongError";
    Object.setPrototypeOf(this, PromptTooLongError.prototype);
  }
}

export class InvalidDirectoryError extends LaunchError {
  constructor(message: string, public readonly directory: string) {
    super(message, "INVALID_DIRECTORY");
    this.name = "InvalidDirectoryError";
    Object.setPrototypeOf(this, InvalidDirectoryError.prototype);
  }
}

export class ConflictingParametersError extends LaunchError {
  constructor() {
    super(
      "'dir' and 'project' cannot be used together",
      "CONFLICTING_PARAMETERS"
    );
    this.name = "ConflictingParametersError";
    Object.setPrototypeOf(this, ConflictingParametersError.prototype);
  }
}

export class ProjectNotFoundError extends LaunchError {
  constructor(
    public readonly projectName: string,
    public readonly searched: string[]
  ) {
    super(
      `unknown project: '${projectName}' (not in config and no matching directory found)`,
      "PROJECT_NOT_FOUND",
      `termhook project add ${projectName} <directory>`
    );
    this.name = "ProjectNotFoundError";
    Object.setPrototypeOf(this, ProjectNotFoundError.prototype);
  }
}

export class NoTerminalAvailableError extends LaunchError {
  constructor(public readonly attempted: string[]) {
    super(
      attempted.length > 0
        ? `no terminal could be launched (tried: ${attempted.join(", ")})`
        : "no terminal could be launched",
      "NO_TERMINAL_AVAILABLE"
    );
    this.name = "NoTerminalAvailableError";
    Object.setPrototypeOf(this, NoTerminalAvailableError.prototype);
  }
}

export class ConfigIoError extends LaunchError {
  constructor(
    message: string,
    public readonly configPath: string,
    public readonly originalError?: Error
  ) {
    super(message, "CONFIG_IO_ERROR");
    this.name = "ConfigIoError";
    Object.setPrototypeOf(this, ConfigIoError.prototype);
  }
}

/**
 * Type guard to check if an error is a launch error
 */
export function isLaunchError(error: unknown): error is LaunchError {
  return error instanceof LaunchError;
}

/**
 * Format error message with consistent styling
 *
 * Format:
 * ✗ Error Title
 *
 *   Detailed explanation of what went wrong
 *
 *   Suggested action:
 *     command to run or steps to take
 */
export interface FormattedError {
  title: string;
  explanation: string;
  action?: string;
  command?: string;
  context?: string;
}

/**
 * Render any thrown value for CLI output
 */
export function formatErrorMessage(error: unknown): string {
  if (error instanceof InvalidUrlError) {
    return formatErrorOutput({
      title: "Invalid URL",
      explanation: error.message,
      context: error.url,
      action: "Expected a URL like",
      command: "termhook://open?prompt=hello+world",
    });
  }

  if (error instanceof ProjectNotFoundError) {
    return formatErrorOutput({
      title: `Project '${error.projectName}' not found`,
      explanation: error.message,
      context:
        error.searched.length > 0
          ? `searched ${error.searched.join(", ")}`
          : undefined,
      action: "To map it to a directory",
      command: error.hint,
    });
  }

  if (error instanceof NoTerminalAvailableError) {
    return formatErrorOutput({
      title: "No terminal available",
      explanation: error.message,
      action: "Install Ghostty or choose another terminal with",
      command: "termhook handle <url> --terminal terminal",
    });
  }

  if (error instanceof ConfigIoError) {
    return formatErrorOutput({
      title: "Configuration could not be used",
      explanation: error.message,
      context: error.originalError?.message,
      action: "Check or recreate the file at",
      command: error.configPath,
    });
  }

  if (isLaunchError(error)) {
    return formatErrorOutput({
      title: "Launch rejected",
      explanation: error.message,
      action: error.hint ? "Try" : undefined,
      command: error.hint,
    });
  }

  if (error instanceof Error) {
    return formatErrorOutput({
      title: "An error occurred",
      explanation: error.message,
    });
  }

  return formatErrorOutput({
    title: "An unexpected error occurred",
    explanation: String(error),
  });
}

/**
 * Format error output with consistent structure
 */
function formatErrorOutput(error: FormattedError): string {
  const lines: string[] = [];

  lines.push(`✗ ${error.title}`);
  lines.push("");

  if (error.explanation) {
    lines.push(`  ${error.explanation}`);
    lines.push("");
  }

  if (error.context) {
    lines.push(`  Context: ${error.context}`);
    lines.push("");
  }

  if (error.action) {
    lines.push(`  ${error.action}:`);
    if (error.command) {
      lines.push(`    ${error.command}`);
    }
  }

  return lines.join("\n");
}
