/**
 * Confirmation gate
 *
 * Nothing is written or spawned unless the user explicitly approves the
 * exact prompt and directory shown here.
 */

import type { ConfirmationDecision } from "./types.js";
import type { Prompter } from "./prompters/index.js";

/** Prompts longer than this are shortened for display only */
export const DISPLAY_LIMIT = 500;

export function truncateForDisplay(prompt: string): string {
  const characters = Array.from(prompt);
  if (characters.length <= DISPLAY_LIMIT) {
    return prompt;
  }
  return `${characters.slice(0, DISPLAY_LIMIT).join("")}… [truncated, ${characters.length} characters total]`;
}

export interface ConfirmationDetails {
  prompt: string;
  directory: string;
  command: string;
}

export function formatConfirmationText(details: ConfirmationDetails): string {
  return [
    `Launch ${details.command} with this prompt?`,
    "",
    truncateForDisplay(details.prompt),
    "",
    `Directory: ${details.directory}`,
  ].join("\n");
}

export async function confirmLaunch(
  details: ConfirmationDetails,
  prompter: Prompter
): Promise<ConfirmationDecision> {
  const shownText = formatConfirmationText(details);
  const approved = await prompter.confirm(shownText);
  return { outcome: approved ? "proceed" : "cancel", shownText };
}
