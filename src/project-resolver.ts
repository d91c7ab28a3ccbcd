/**
 * Project name -> working directory resolution
 *
 * Lookup order: persisted mapping, then discovery. Discovery matches
 * directory base names exactly (case-sensitive) in two places:
 *   - immediate subdirectories of each configured project root
 *   - directories named by the agent session history
 *     (~/.claude/projects/-Users-me-work-myapp -> /Users/me/work/myapp)
 */

import * as fs from "fs";
import * as path from "path";
import { InvalidDirectoryError, ProjectNotFoundError } from "./errors.js";
import { expandHome, isDirectory } from "./fs-utils.js";
import { saveProjectMapping } from "./config.js";
import { logger } from "./logger.js";
import type { Prompter } from "./prompters/index.js";

/**
 * Narrow read/write access to the persisted project mapping
 */
export interface ProjectStore {
  lookup(name: string): string | undefined;
  remember(name: string, directory: string): Promise<void>;
}

/**
 * ProjectStore over the mapping loaded from the config file
 */
export class ConfigProjectStore implements ProjectStore {
  constructor(private readonly projects: Readonly<Record<string, string>>) {}

  lookup(name: string): string | undefined {
    return Object.prototype.hasOwnProperty.call(this.projects, name)
      ? this.projects[name]
      : undefined;
  }

  async remember(name: string, directory: string): Promise<void> {
    await saveProjectMapping(name, directory);
  }
}

export interface DiscoveryOptions {
  projectRoots: readonly string[];
  historyDir: string | null;
}

/**
 * Immediate subdirectories of the roots whose name equals `name`
 */
function discoverInRoots(name: string, roots: readonly string[]): string[] {
  const found: string[] = [];
  for (const root of roots) {
    const expanded = expandHome(root);
    let entries: string[];
    try {
      entries = fs.readdirSync(expanded);
    } catch {
      logger.debug("project root not readable", { root: expanded });
      continue;
    }
    for (const entry of entries) {
      if (entry !== name) continue;
      const candidate = path.join(expanded, entry);
      if (isDirectory(candidate)) {
        found.push(candidate);
      }
    }
  }
  return found;
}

/**
 * Decoder for session-history directory names.
 *
 * The agent stores sessions under a directory named after the absolute
 * working directory with "/" and "." replaced by "-". That encoding is
 * lossy, so every "-" is tried as a separator, a literal "-" or a literal
 * ".", keeping only branches that match entries on disk.
 */
class HistoryNameDecoder {
  private readonly listings = new Map<string, string[]>();

  decode(encoded: string): string[] {
    const body = encoded.startsWith("-") ? encoded.slice(1) : encoded;
    if (body === "") {
      return [];
    }
    const results: string[] = [];
    this.walk(path.sep, "", body, results);
    return results;
  }

  private list(directory: string): string[] {
    let entries = this.listings.get(directory);
    if (!entries) {
      try {
        entries = fs.readdirSync(directory);
      } catch {
        entries = [];
      }
      this.listings.set(directory, entries);
    }
    return entries;
  }

  private hasEntryStartingWith(directory: string, prefix: string): boolean {
    return this.list(directory).some((entry) => entry.startsWith(prefix));
  }

  private walk(
    parent: string,
    component: string,
    rest: string,
    results: string[]
  ): void {
    const dash = rest.indexOf("-");
    if (dash === -1) {
      const name = component + rest;
      const candidate = path.join(parent, name);
      if (name !== "" && this.list(parent).includes(name) && isDirectory(candidate)) {
        results.push(candidate);
      }
      return;
    }

    const head = component + rest.slice(0, dash);
    const tail = rest.slice(dash + 1);

    // "-" as a path separator
    if (head !== "" && this.list(parent).includes(head)) {
      const next = path.join(parent, head);
      if (isDirectory(next)) {
        this.walk(next, "", tail, results);
      }
    }

    // "-" as a literal character inside the component
    const literals = head === "" ? ["."] : ["-", "."];
    for (const literal of literals) {
      const prefix = head + literal;
      if (this.hasEntryStartingWith(parent, prefix)) {
        this.walk(parent, prefix, tail, results);
      }
    }
  }
}

function encodeForHistory(name: string): string {
  return name.replace(/[/.]/g, "-");
}

function discoverInHistory(name: string, historyDir: string | null): string[] {
  if (historyDir === null) {
    return [];
  }
  const expanded = expandHome(historyDir);
  let entries: string[];
  try {
    entries = fs.readdirSync(expanded);
  } catch {
    logger.debug("session history not readable", { historyDir: expanded });
    return [];
  }

  const suffix = `-${encodeForHistory(name)}`;
  const decoder = new HistoryNameDecoder();
  const found: string[] = [];
  for (const entry of entries) {
    if (!entry.endsWith(suffix)) continue;
    if (!isDirectory(path.join(expanded, entry))) continue;
    for (const decoded of decoder.decode(entry)) {
      if (path.basename(decoded) === name) {
        found.push(decoded);
      }
    }
  }
  return found;
}

/**
 * Decode one session-history directory name into existing directories
 */
export function decodeHistoryEntry(encoded: string): string[] {
  return new HistoryNameDecoder().decode(encoded);
}

/**
 * All directories whose base name equals `name`, sorted and de-duplicated
 */
export function discoverProjectCandidates(
  name: string,
  options: DiscoveryOptions
): string[] {
  const candidates = new Set<string>([
    ...discoverInRoots(name, options.projectRoots),
    ...discoverInHistory(name, options.historyDir),
  ]);
  return [...candidates].sort();
}

export type ProjectResolution =
  | {
      kind: "resolved";
      directory: string;
      source: "mapping" | "discovered" | "selected";
    }
  | { kind: "cancelled" };

export interface ResolveProjectDependencies {
  store: ProjectStore;
  discovery: DiscoveryOptions;
  prompter: Pick<Prompter, "choose">;
}

/**
 * Resolve a project name to a directory
 *
 * @throws InvalidDirectoryError when a mapped directory no longer exists
 * @throws ProjectNotFoundError when discovery finds nothing
 */
export async function resolveProject(
  name: string,
  deps: ResolveProjectDependencies
): Promise<ProjectResolution> {
  const mapped = deps.store.lookup(name);
  if (mapped !== undefined) {
    if (!isDirectory(mapped)) {
      throw new InvalidDirectoryError(
        `directory for project '${name}' does not exist: ${mapped}`,
        mapped
      );
    }
    logger.debug("project resolved from mapping", { name, directory: mapped });
    return { kind: "resolved", directory: mapped, source: "mapping" };
  }

  const candidates = discoverProjectCandidates(name, deps.discovery);
  logger.debug("project candidates", { name, candidates });

  if (candidates.length === 0) {
    const searched = [
      ...deps.discovery.projectRoots.map(expandHome),
      ...(deps.discovery.historyDir !== null
        ? [expandHome(deps.discovery.historyDir)]
        : []),
    ];
    throw new ProjectNotFoundError(name, searched);
  }

  if (candidates.length === 1) {
    const directory = candidates[0];
    await deps.store.remember(name, directory);
    return { kind: "resolved", directory, source: "discovered" };
  }

  const chosen = await deps.prompter.choose(
    `Select directory for project "${name}":`,
    candidates
  );
  if (chosen === null || !candidates.includes(chosen)) {
    return { kind: "cancelled" };
  }

  await deps.store.remember(name, chosen);
  return { kind: "resolved", directory: chosen, source: "selected" };
}
