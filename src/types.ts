/**
 * Core types for termhook
 */

/**
 * A validated launch request decoded from a termhook:// URL
 */
export interface LaunchRequest {
  readonly prompt: string;
  readonly targetDirectory?: string;
  readonly projectName?: string;
  readonly version: number;
}

/**
 * Terminal selection preference.
 * "auto" walks the default fallback chain.
 */
export type TerminalPreference = "auto" | "ghostty" | "iterm" | "terminal";

export type PrompterKind = "dialog" | "tty";

/**
 * User configuration, stored in ~/.config/termhook/config.json
 */
export interface LauncherConfig {
  terminal: TerminalPreference;
  /** Interactive tool to run in the terminal */
  command: string;
  /** Extra arguments placed before the prompt */
  args: string[];
  fullscreen: boolean;
  prompter: PrompterKind;
  /** Directories whose immediate children are project candidates */
  projectRoots: string[];
  /** Agent session history directory used for discovery, null disables */
  historyDir: string | null;
  /** Project name -> absolute directory */
  projects: Record<string, string>;
}

export type ConfirmationOutcome = "proceed" | "cancel";

export interface ConfirmationDecision {
  outcome: ConfirmationOutcome;
  /** Exact text that was shown to the user */
  shownText: string;
}

export type LaunchErrorCode =
  | "INVALID_URL"
  | "MISSING_PROMPT"
  | "PROMPT_TOO_LONG"
  | "INVALID_DIRECTORY"
  | "CONFLICTING_PARAMETERS"
  | "PROJECT_NOT_FOUND"
  | "NO_TERMINAL_AVAILABLE"
  | "CONFIG_IO_ERROR";

/**
 * Process exit status for each failure, 0 is success (including cancellation)
 */
export const EXIT_CODES: Record<LaunchErrorCode, number> = {
  INVALID_URL: 2,
  MISSING_PROMPT: 3,
  PROMPT_TOO_LONG: 4,
  INVALID_DIRECTORY: 5,
  CONFLICTING_PARAMETERS: 6,
  PROJECT_NOT_FOUND: 7,
  NO_TERMINAL_AVAILABLE: 8,
  CONFIG_IO_ERROR: 9,
};

export const EXIT_SUCCESS = 0;
export const EXIT_UNEXPECTED = 1;

export type TerminalStrategyName =
  | "ghostty-cli"
  | "ghostty-app"
  | "terminal-app"
  | "iterm";
