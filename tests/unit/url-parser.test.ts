/**
 * Unit tests for termhook:// URL parsing
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  parseLaunchUrl,
  characterLength,
  MAX_PROMPT_LENGTH,
} from "../../src/url-parser.js";
import {
  ConflictingParametersError,
  InvalidDirectoryError,
  InvalidUrlError,
  MissingPromptError,
  PromptTooLongError,
} from "../../src/errors.js";

describe("parseLaunchUrl", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "termhook-url-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe("prompt decoding", () => {
    it("decodes a percent-encoded prompt", () => {
      const request = parseLaunchUrl(
        "termhook://open?prompt=fix%20the%20bug%20in%20%22main.py%22"
      );

      expect(request).toEqual({ prompt: 'fix the bug in "main.py"', version: 1 });
    });

    it("decodes plus signs as spaces", () => {
      const request = parseLaunchUrl("termhook://open?prompt=hello+world");
      expect(request.prompt).toBe("hello world");
    });

    it("keeps shell metacharacters verbatim", () => {
      const request = parseLaunchUrl(
        "termhook://open?prompt=%24(rm%20-rf%20~)%3B%20echo%20'x'"
      );
      expect(request.prompt).toBe("$(rm -rf ~); echo 'x'");
    });

    it("accepts a trailing slash after the host", () => {
      const request = parseLaunchUrl("termhook://open/?prompt=hi");
      expect(request.prompt).toBe("hi");
    });

    it("uses the last value when a key is repeated", () => {
      const request = parseLaunchUrl("termhook://open?prompt=first&prompt=second");
      expect(request.prompt).toBe("second");
    });

    it("stores the prompt without trimming", () => {
      const request = parseLaunchUrl("termhook://open?prompt=%20padded%20");
      expect(request.prompt).toBe(" padded ");
    });
  });

  describe("missing prompt", () => {
    it("rejects a URL without prompt", () => {
      expect(() => parseLaunchUrl("termhook://open")).toThrow(MissingPromptError);
    });

    it("rejects an empty prompt", () => {
      expect(() => parseLaunchUrl("termhook://open?prompt=")).toThrow(
        MissingPromptError
      );
    });

    it("rejects a whitespace-only prompt", () => {
      expect(() => parseLaunchUrl("termhook://open?prompt=%20%20+")).toThrow(
        MissingPromptError
      );
    });
  });

  describe("prompt length", () => {
    it("accepts a prompt of exactly the limit", () => {
      const prompt = "a".repeat(MAX_PROMPT_LENGTH);
      const request = parseLaunchUrl(`termhook://open?prompt=${prompt}`);
      expect(request.prompt).toHaveLength(2000);
    });

    it("rejects a prompt one character over the limit", () => {
      const prompt = "a".repeat(MAX_PROMPT_LENGTH + 1);

      try {
        parseLaunchUrl(`termhook://open?prompt=${prompt}`);
        expect.fail("expected PromptTooLongError");
      } catch (error) {
        expect(error).toBeInstanceOf(PromptTooLongError);
        if (error instanceof PromptTooLongError) {
          expect(error.length).toBe(2001);
          expect(error.limit).toBe(2000);
          expect(error.exitCode).toBe(4);
        }
      }
    });

    it("counts code points rather than UTF-16 units", () => {
      const prompt = encodeURIComponent("😀".repeat(MAX_PROMPT_LENGTH));
      const request = parseLaunchUrl(`termhook://open?prompt=${prompt}`);
      expect(characterLength(request.prompt)).toBe(2000);
    });
  });

  describe("scheme and host", () => {
    it("rejects another scheme", () => {
      expect(() => parseLaunchUrl("https://open?prompt=hi")).toThrow(
        "unexpected scheme: 'https' (expected 'termhook')"
      );
    });

    it("rejects another host", () => {
      expect(() => parseLaunchUrl("termhook://run?prompt=hi")).toThrow(
        "unexpected host: 'run' (expected 'open')"
      );
    });

    it("rejects a URL with credentials", () => {
      expect(() => parseLaunchUrl("termhook://user@open?prompt=hi")).toThrow(
        InvalidUrlError
      );
    });

    it("rejects a string that is not a URL", () => {
      expect(() => parseLaunchUrl("not a url")).toThrow("not a valid URL");
    });
  });

  describe("version", () => {
    it("defaults to version 1", () => {
      expect(parseLaunchUrl("termhook://open?prompt=hi").version).toBe(1);
    });

    it("accepts v=1", () => {
      expect(parseLaunchUrl("termhook://open?prompt=hi&v=1").version).toBe(1);
    });

    it("rejects an unsupported version", () => {
      expect(() => parseLaunchUrl("termhook://open?prompt=hi&v=2")).toThrow(
        "unsupported version: 2 (supported: 1)"
      );
    });

    it("rejects a non-numeric version", () => {
      expect(() => parseLaunchUrl("termhook://open?prompt=hi&v=one")).toThrow(
        InvalidUrlError
      );
    });

    it("checks the version before the prompt", () => {
      expect(() => parseLaunchUrl("termhook://open?v=9")).toThrow(InvalidUrlError);
    });
  });

  describe("directory and project", () => {
    it("returns an existing absolute directory verbatim", () => {
      const request = parseLaunchUrl(
        `termhook://open?prompt=hi&dir=${encodeURIComponent(tempDir)}`
      );

      expect(request).toEqual({
        prompt: "hi",
        version: 1,
        targetDirectory: tempDir,
      });
    });

    it("rejects a relative directory", () => {
      expect(() =>
        parseLaunchUrl("termhook://open?prompt=hi&dir=relative%2Fpath")
      ).toThrow("directory must be an absolute path: relative/path");
    });

    it("rejects a directory that does not exist", () => {
      const missing = path.join(tempDir, "missing");

      expect(() =>
        parseLaunchUrl(
          `termhook://open?prompt=hi&dir=${encodeURIComponent(missing)}`
        )
      ).toThrow(InvalidDirectoryError);
    });

    it("rejects a path that is a file", () => {
      const file = path.join(tempDir, "file.txt");
      fs.writeFileSync(file, "x");

      expect(() =>
        parseLaunchUrl(`termhook://open?prompt=hi&dir=${encodeURIComponent(file)}`)
      ).toThrow(`directory does not exist: ${file}`);
    });

    it("returns the project name", () => {
      const request = parseLaunchUrl("termhook://open?prompt=hi&project=myapp");
      expect(request).toEqual({ prompt: "hi", version: 1, projectName: "myapp" });
    });

    it("treats an empty project as absent", () => {
      const request = parseLaunchUrl("termhook://open?prompt=hi&project=");
      expect(request.projectName).toBeUndefined();
    });

    it("rejects dir and project together", () => {
      expect(() =>
        parseLaunchUrl(
          `termhook://open?prompt=hi&dir=${encodeURIComponent(tempDir)}&project=myapp`
        )
      ).toThrow(ConflictingParametersError);
    });

    it("reports the conflict before checking the directory", () => {
      expect(() =>
        parseLaunchUrl("termhook://open?prompt=hi&dir=%2Fno%2Fsuch&project=x")
      ).toThrow(ConflictingParametersError);
    });
  });
});
