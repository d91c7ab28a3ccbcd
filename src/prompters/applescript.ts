/**
 * macOS dialogs through osascript
 *
 * The scripts below are constant. Everything user-supplied travels as
 * osascript arguments (read with `on run argv`), so the dialog layer never
 * parses prompt text as AppleScript.
 */

import { runCommand } from "../process.js";
import { logger } from "../logger.js";
import type { Prompter } from "./types.js";

export const DIALOG_TITLE = "termhook";
export const PROCEED_BUTTON = "Run";
export const CANCEL_BUTTON = "Cancel";

export const CONFIRM_SCRIPT = [
  "on run argv",
  "  try",
  `    set reply to display dialog (item 1 of argv) with title "${DIALOG_TITLE}" buttons {"${CANCEL_BUTTON}", "${PROCEED_BUTTON}"} default button "${CANCEL_BUTTON}" cancel button "${CANCEL_BUTTON}" with icon caution`,
  "  on error number -128",
  '    return "cancel"',
  "  end try",
  `  if button returned of reply is "${PROCEED_BUTTON}" then return "proceed"`,
  '  return "cancel"',
  "end run",
].join("\n");

export const CHOOSE_SCRIPT = [
  "on run argv",
  "  set candidateList to rest of argv",
  `  set chosen to choose from list candidateList with title "${DIALOG_TITLE}" with prompt (item 1 of argv) default items {item 1 of candidateList}`,
  '  if chosen is false then return ""',
  "  return item 1 of chosen",
  "end run",
].join("\n");

export class AppleScriptPrompter implements Prompter {
  async confirm(message: string): Promise<boolean> {
    const result = await runCommand("osascript", [
      "-e",
      CONFIRM_SCRIPT,
      "--",
      message,
    ]);

    if (result.code !== 0) {
      logger.debug("confirmation dialog dismissed", {
        code: result.code,
        stderr: result.stderr.trim(),
        error: result.error?.message,
      });
      return false;
    }
    return result.stdout.trim() === "proceed";
  }

  async choose(title: string, candidates: string[]): Promise<string | null> {
    if (candidates.length === 0) {
      return null;
    }

    const result = await runCommand("osascript", [
      "-e",
      CHOOSE_SCRIPT,
      "--",
      title,
      ...candidates,
    ]);

    if (result.code !== 0) {
      logger.debug("selection dialog dismissed", {
        code: result.code,
        stderr: result.stderr.trim(),
        error: result.error?.message,
      });
      return null;
    }

    // osascript terminates its output with a newline; paths keep inner spaces
    const chosen = result.stdout.replace(/\r?\n$/, "");
    return candidates.includes(chosen) ? chosen : null;
  }
}
