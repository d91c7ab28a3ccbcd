import type { PrompterKind } from "../types.js";
import { AppleScriptPrompter } from "./applescript.js";
import { TerminalPrompter } from "./tty.js";
import type { Prompter } from "./types.js";

export type { Prompter } from "./types.js";
export { AppleScriptPrompter } from "./applescript.js";
export { TerminalPrompter } from "./tty.js";

export function createPrompter(kind: PrompterKind): Prompter {
  return kind === "dialog" ? new AppleScriptPrompter() : new TerminalPrompter();
}
