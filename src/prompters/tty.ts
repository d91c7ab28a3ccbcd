/**
 * Terminal prompts through readline, for hosts without dialogs
 */

import * as readline from "readline";
import chalk from "chalk";
import type { Prompter } from "./types.js";

/**
 * Ask a single question on stdin/stdout
 */
function ask(question: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    let answered = false;
    rl.on("close", () => {
      // Ctrl-D or a closed stdin counts as an empty answer
      if (!answered) resolve("");
    });
    rl.question(question, (answer) => {
      answered = true;
      rl.close();
      resolve(answer);
    });
  });
}

export class TerminalPrompter implements Prompter {
  async confirm(message: string): Promise<boolean> {
    console.log(`\n${message}\n`);
    const answer = await ask("Proceed? (y/N): ");
    const normalized = answer.trim().toLowerCase();
    return normalized === "y" || normalized === "yes";
  }

  async choose(title: string, candidates: string[]): Promise<string | null> {
    if (candidates.length === 0) {
      return null;
    }

    console.log(`\n${chalk.bold(title)}`);
    candidates.forEach((candidate, index) => {
      console.log(`  ${index + 1}) ${candidate}`);
    });

    const answer = (await ask("Enter a number (blank to cancel): ")).trim();
    if (!/^\d+$/.test(answer)) {
      return null;
    }
    const index = Number(answer) - 1;
    return index >= 0 && index < candidates.length ? candidates[index] : null;
  }
}
