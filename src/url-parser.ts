/**
 * termhook:// URL parsing and validation
 *
 * Accepted shape: termhook://open?prompt=...&dir=...|project=...&v=1
 *
 * Query values use form decoding (percent escapes and "+" for space).
 * When a key is repeated the last occurrence wins.
 */

import * as path from "path";
import type { LaunchRequest } from "./types.js";
import {
  ConflictingParametersError,
  InvalidDirectoryError,
  InvalidUrlError,
  MissingPromptError,
  PromptTooLongError,
} from "./errors.js";
import { isDirectory } from "./fs-utils.js";

export const URL_SCHEME = "termhook";
export const URL_HOST = "open";
export const MAX_PROMPT_LENGTH = 2000;
export const SUPPORTED_VERSIONS: readonly number[] = [1];
export const DEFAULT_VERSION = 1;

/**
 * Length in Unicode code points, so an emoji counts as one character
 */
export function characterLength(text: string): number {
  return Array.from(text).length;
}

function lastValue(params: URLSearchParams, key: string): string | undefined {
  const values = params.getAll(key);
  return values.length > 0 ? values[values.length - 1] : undefined;
}

function parseVersion(raw: string | undefined, url: string): number {
  if (raw === undefined || raw.trim() === "") {
    return DEFAULT_VERSION;
  }
  if (!/^\d+$/.test(raw.trim())) {
    throw new InvalidUrlError(
      `invalid 'v' parameter: '${raw}' (expected integer)`,
      url
    );
  }
  const version = Number(raw.trim());
  if (!SUPPORTED_VERSIONS.includes(version)) {
    throw new InvalidUrlError(
      `unsupported version: ${version} (supported: ${SUPPORTED_VERSIONS.join(", ")})`,
      url
    );
  }
  return version;
}

/**
 * Parse and validate a launch URL
 *
 * Validation only stats the `dir` value; nothing is written or spawned.
 *
 * @throws LaunchError subclasses for each rejected input
 */
export function parseLaunchUrl(raw: string): LaunchRequest {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new InvalidUrlError("not a valid URL", raw);
  }

  const scheme = url.protocol.replace(/:$/, "");
  if (scheme !== URL_SCHEME) {
    throw new InvalidUrlError(
      `unexpected scheme: '${scheme}' (expected '${URL_SCHEME}')`,
      raw
    );
  }

  if (url.host !== URL_HOST || url.username !== "" || url.password !== "") {
    throw new InvalidUrlError(
      `unexpected host: '${url.host}' (expected '${URL_HOST}')`,
      raw
    );
  }

  const params = url.searchParams;
  const version = parseVersion(lastValue(params, "v"), raw);

  const prompt = lastValue(params, "prompt");
  if (prompt === undefined || prompt.trim() === "") {
    throw new MissingPromptError();
  }

  const length = characterLength(prompt);
  if (length > MAX_PROMPT_LENGTH) {
    throw new PromptTooLongError(length, MAX_PROMPT_LENGTH);
  }

  // Empty values count as absent
  const dir = lastValue(params, "dir") || undefined;
  const rawProject = lastValue(params, "project");
  const project =
    rawProject !== undefined && rawProject.trim() !== "" ? rawProject : undefined;

  if (dir !== undefined && project !== undefined) {
    throw new ConflictingParametersError();
  }

  if (dir !== undefined) {
    if (!path.isAbsolute(dir)) {
      throw new InvalidDirectoryError(
        `directory must be an absolute path: ${dir}`,
        dir
      );
    }
    if (!isDirectory(dir)) {
      throw new InvalidDirectoryError(`directory does not exist: ${dir}`, dir);
    }
  }

  return {
    prompt,
    version,
    ...(dir !== undefined ? { targetDirectory: dir } : {}),
    ...(project !== undefined ? { projectName: project } : {}),
  };
}
