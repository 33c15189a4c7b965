/**
 * Node.js DirectoryReader
 *
 * Synchronous and read-only. Uses `lstat`, so symbolic links are
 * classified as links and never followed.
 */

import { type Dirent, lstatSync, readdirSync, type Stats } from "node:fs";
import { join } from "node:path";
import type { DirectoryReader, EntryKind } from "./types.ts";

const kindOf = (entry: Dirent | Stats): EntryKind => {
  if (entry.isSymbolicLink()) return "symlink";
  if (entry.isFile()) return "file";
  if (entry.isDirectory()) return "directory";
  return "other";
};

/**
 * Create a reader backed by the host filesystem
 */
export const createNodeDirectoryReader = (): DirectoryReader => ({
  list: (dirPath) =>
    readdirSync(dirPath, { withFileTypes: true }).map((entry) => ({
      name: entry.name,
      path: join(dirPath, entry.name),
      kind: kindOf(entry),
    })),

  stat: (entryPath) => {
    const stats = lstatSync(entryPath);
    return { kind: kindOf(stats), size: stats.size };
  },
});
