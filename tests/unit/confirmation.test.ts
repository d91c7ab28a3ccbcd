/**
 * Unit tests for the confirmation gate
 */

import { describe, it, expect, vi } from "vitest";
import {
  confirmLaunch,
  formatConfirmationText,
  truncateForDisplay,
  DISPLAY_LIMIT,
} from "../../src/confirmation.js";
import type { Prompter } from "../../src/prompters/index.js";

function fakePrompter(approve: boolean): Prompter {
  return {
    confirm: vi.fn().mockResolvedValue(approve),
    choose: vi.fn().mockResolvedValue(null),
  };
}

describe("truncateForDisplay", () => {
  it("returns short prompts unchanged", () => {
    expect(truncateForDisplay("fix the bug")).toBe("fix the bug");
  });

  it("keeps a prompt of exactly the display limit", () => {
    const prompt = "a".repeat(DISPLAY_LIMIT);
    expect(truncateForDisplay(prompt)).toBe(prompt);
  });

  it("shortens long prompts and reports the full length", () => {
    const prompt = "a".repeat(1200);
    expect(truncateForDisplay(prompt)).toBe(
      `${"a".repeat(500)}… [truncated, 1200 characters total]`
    );
  });

  it("never splits a surrogate pair", () => {
    const prompt = "😀".repeat(501);
    expect(truncateForDisplay(prompt)).toBe(
      `${"😀".repeat(500)}… [truncated, 501 characters total]`
    );
  });
});

describe("formatConfirmationText", () => {
  it("shows the command, the prompt and the directory", () => {
    expect(
      formatConfirmationText({
        prompt: 'fix the bug in "main.py"',
        directory: "/home/user/app",
        command: "claude",
      })
    ).toBe(
      'Launch claude with this prompt?\n\nfix the bug in "main.py"\n\nDirectory: /home/user/app'
    );
  });
});

describe("confirmLaunch", () => {
  const details = { prompt: "hello", directory: "/tmp", command: "claude" };

  it("proceeds when the user approves", async () => {
    const prompter = fakePrompter(true);

    const decision = await confirmLaunch(details, prompter);

    expect(decision.outcome).toBe("proceed");
    expect(prompter.confirm).toHaveBeenCalledWith(decision.shownText);
  });

  it("cancels when the user declines", async () => {
    const decision = await confirmLaunch(details, fakePrompter(false));

    expect(decision).toEqual({
      outcome: "cancel",
      shownText: "Launch claude with this prompt?\n\nhello\n\nDirectory: /tmp",
    });
  });
});
