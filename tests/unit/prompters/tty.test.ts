/**
 * Unit tests for readline prompts
 */

import {
  describe,
  it,
  expect,
  vi,
  beforeEach,
  afterEach,
  type MockInstance,
} from "vitest";
import { TerminalPrompter } from "../../../src/prompters/tty.js";
import { createPrompter, AppleScriptPrompter } from "../../../src/prompters/index.js";

// null simulates stdin closing before an answer
const input = vi.hoisted((): { answer: string | null } => ({ answer: "y" }));

vi.mock("readline", () => ({
  createInterface: vi.fn(() => ({
    on: vi.fn((event: string, callback: () => void) => {
      if (event === "close" && input.answer === null) {
        callback();
      }
    }),
    question: vi.fn((message: string, callback: (answer: string) => void) => {
      if (input.answer !== null) {
        callback(input.answer);
      }
    }),
    close: vi.fn(),
  })),
}));

describe("TerminalPrompter", () => {
  const prompter = new TerminalPrompter();
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  describe("confirm", () => {
    it.each(["y", "Y", "yes", " YES "])("proceeds on %j", async (answer) => {
      input.answer = answer;
      await expect(prompter.confirm("Run?")).resolves.toBe(true);
    });

    it.each(["", "n", "no", "yep"])("cancels on %j", async (answer) => {
      input.answer = answer;
      await expect(prompter.confirm("Run?")).resolves.toBe(false);
    });

    it("cancels when stdin closes", async () => {
      input.answer = null;
      await expect(prompter.confirm("Run?")).resolves.toBe(false);
    });

    it("prints the full message before asking", async () => {
      input.answer = "n";
      await prompter.confirm("Launch claude with this prompt?");
      expect(logSpy).toHaveBeenCalledWith("\nLaunch claude with this prompt?\n");
    });
  });

  describe("choose", () => {
    const candidates = ["/a/app", "/b/app"];

    it("returns the numbered candidate", async () => {
      input.answer = "2";
      await expect(prompter.choose("Pick", candidates)).resolves.toBe("/b/app");
      expect(logSpy).toHaveBeenCalledWith("  1) /a/app");
      expect(logSpy).toHaveBeenCalledWith("  2) /b/app");
    });

    it.each(["", "q", "0", "3", "1.5"])("cancels on %j", async (answer) => {
      input.answer = answer;
      await expect(prompter.choose("Pick", candidates)).resolves.toBeNull();
    });
  });
});

describe("createPrompter", () => {
  it("creates the dialog prompter", () => {
    expect(createPrompter("dialog")).toBeInstanceOf(AppleScriptPrompter);
  });

  it("creates the terminal prompter", () => {
    expect(createPrompter("tty")).toBeInstanceOf(TerminalPrompter);
  });
});
