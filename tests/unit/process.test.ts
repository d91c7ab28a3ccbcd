/**
 * Unit tests for the child process helper
 */

import { describe, it, expect } from "vitest";
import { runCommand } from "../../src/process.js";

describe("runCommand", () => {
  it("collects output and the exit code", async () => {
    const result = await runCommand("/bin/sh", [
      "-c",
      "printf out; printf err >&2; exit 3",
    ]);

    expect(result).toEqual({ code: 3, stdout: "out", stderr: "err" });
  });

  it("passes arguments without shell parsing", async () => {
    const result = await runCommand("/bin/sh", [
      "-c",
      'printf "%s" "$1"',
      "sh",
      "$(echo nope) 'quoted'",
    ]);

    expect(result.stdout).toBe("$(echo nope) 'quoted'");
    expect(result.code).toBe(0);
  });

  it("keeps multibyte characters intact across output chunks", async () => {
    // 3-byte characters, far more than one pipe read
    const result = await runCommand("/bin/sh", [
      "-c",
      'i=0; while [ $i -lt 20000 ]; do printf "%s" "$1"; i=$((i+1)); done',
      "sh",
      "€".repeat(10),
    ]);

    expect(result.code).toBe(0);
    expect(result.stdout.length).toBe(200000);
    expect(result.stdout).toBe("€".repeat(200000));
  });

  it("resolves with an error when the command does not exist", async () => {
    const result = await runCommand("termhook-no-such-command", []);

    expect(result.code).toBeNull();
    expect(result.error).toBeInstanceOf(Error);
  });
});
