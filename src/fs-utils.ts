import * as fs from "fs";
import * as os from "os";
import * as path from "path";

export function isErrnoException(
  error: unknown
): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * True when the path exists and is a directory (symlinks are followed)
 */
export function isDirectory(target: string): boolean {
  try {
    return fs.statSync(target).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Expand a leading "~" to the user's home directory
 */
export function expandHome(target: string): string {
  if (target === "~") {
    return os.homedir();
  }
  if (target.startsWith("~/")) {
    return path.join(os.homedir(), target.slice(2));
  }
  return target;
}
