// Executable search-path probing. Every detection in devstrap (escalator,
// package manager, process manager) goes through an EnvironmentProbe so the
// decision logic can be exercised against a fake PATH.
import { accessSync, constants, readdirSync, statSync } from "node:fs";
import { delimiter, join } from "node:path";
import { logger } from "../logger.js";

/** Read-only view of the executables reachable on the host. */
export interface EnvironmentProbe {
  /** Every executable name on the search path, sorted, first occurrence wins. */
  listExecutables(): string[];
  isExecutableAvailable(name: string): boolean;
}

/** Probe backed by the directories of a PATH-style string. */
export class PathProbe implements EnvironmentProbe {
  private readonly dirs: readonly string[];

  constructor(searchPath: string = process.env.PATH ?? "") {
    // Empty segments would mean the cwd to a shell; devstrap never looks there.
    this.dirs = searchPath.split(delimiter).filter((dir) => dir.length > 0);
  }

  listExecutables(): string[] {
    const found = new Set<string>();
    for (const dir of this.dirs) {
      let entries: string[];
      try {
        entries = readdirSync(dir);
      } catch (err) {
        logger.debug({ dir, error: err }, "Skipping unreadable PATH entry");
        continue;
      }
      for (const entry of entries) {
        if (!found.has(entry) && isExecutableFile(join(dir, entry))) found.add(entry);
      }
    }
    return [...found].sort();
  }

  isExecutableAvailable(name: string): boolean {
    if (name.length === 0 || name.includes("/")) return false;
    return this.dirs.some((dir) => isExecutableFile(join(dir, name)));
  }
}

/** Check that a path is a regular file the current user may execute. */
function isExecutableFile(path: string): boolean {
  try {
    if (!statSync(path).isFile()) return false;
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}
