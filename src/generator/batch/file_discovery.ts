/**
 * Input discovery for the batch generator
 */

import fs from "node:fs";
import path from "node:path";
import { CONFIG_FILE_NAME } from "../config/configuration.js";
import { compareOrdinal } from "../frontend/inheritance_resolver.js";

export interface FileDiscoveryOptions {
  projectDir: string;
  /** Directory names skipped wherever they occur. */
  excludeDirs?: string[];
  /** Specific directories skipped, such as the output directory. */
  excludePaths?: string[];
}

export interface ProjectFiles {
  scripts: string[];
  csharpSources: string[];
}

export const DEFAULT_EXCLUDES = [".godot", ".git", "bin", "obj", "node_modules"];

/**
 * GDScript and C# files under the project, in sorted walk order so that
 * every run sees its inputs in the same order.
 */
export function discoverProjectFiles(options: FileDiscoveryOptions): ProjectFiles {
  const exclude = new Set(options.excludeDirs ?? DEFAULT_EXCLUDES);
  const excludedPaths = new Set(
    (options.excludePaths ?? []).map((dir) => path.resolve(dir)),
  );
  const scripts: string[] = [];
  const csharpSources: string[] = [];

  const walk = (dir: string) => {
    const entries = fs
      .readdirSync(dir, { withFileTypes: true })
      .sort((a, b) => compareOrdinal(a.name, b.name));
    for (const entry of entries) {
      const entryPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (exclude.has(entry.name) || excludedPaths.has(path.resolve(entryPath))) {
          continue;
        }
        walk(entryPath);
        continue;
      }
      if (!entry.isFile()) continue;
      if (entry.name.endsWith(".gd")) scripts.push(entryPath);
      else if (entry.name.endsWith(".cs")) csharpSources.push(entryPath);
    }
  };

  walk(options.projectDir);
  return { scripts, csharpSources };
}

/**
 * First configuration file found breadth-first from the project root;
 * null when there is none.
 */
export function findConfigurationFile(options: FileDiscoveryOptions): string | null {
  const exclude = new Set(options.excludeDirs ?? DEFAULT_EXCLUDES);
  const queue = [options.projectDir];

  while (queue.length > 0) {
    const dir = queue.shift();
    if (dir === undefined) break;
    const entries = fs
      .readdirSync(dir, { withFileTypes: true })
      .sort((a, b) => compareOrdinal(a.name, b.name));
    const match = entries.find(
      (entry) => entry.isFile() && entry.name === CONFIG_FILE_NAME,
    );
    if (match) return path.join(dir, match.name);
    for (const entry of entries) {
      if (entry.isDirectory() && !exclude.has(entry.name)) {
        queue.push(path.join(dir, entry.name));
      }
    }
  }
  return null;
}
