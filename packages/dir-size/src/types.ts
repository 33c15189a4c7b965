/**
 * @bytetools/dir-size — Types
 */

import type { DirSizeError } from "./errors.ts";

// ============================================================================
// Entries & Reader Port
// ============================================================================

/**
 * Entry classification. Symbolic links are reported as `symlink`, never
 * as the kind of their target.
 */
export type EntryKind = "file" | "directory" | "symlink" | "other";

export type DirectoryEntry = {
  name: string;
  /** Full path, usable with `DirectoryReader.list` / `stat` */
  path: string;
  kind: EntryKind;
};

export type EntryStat = {
  kind: EntryKind;
  /** Size in bytes as reported by the filesystem */
  size: number;
};

/**
 * Read-only filesystem access used by the aggregator.
 *
 * Both methods throw on failure; a thrown value carrying a string `code`
 * (ENOENT, EACCES, ENOTDIR, ...) is recorded as the error cause.
 */
export interface DirectoryReader {
  list(dirPath: string): DirectoryEntry[];
  stat(entryPath: string): EntryStat;
}

// ============================================================================
// Aggregation
// ============================================================================

/**
 * - `flat`: every visited entry adds its own size, directories included
 * - `nested`: only regular files add their size
 */
export type SizeStrategy = "flat" | "nested";

export const SIZE_STRATEGIES: readonly SizeStrategy[] = ["flat", "nested"];

export type DirectorySizeOptions = {
  /** Default: "nested" */
  strategy?: SizeStrategy;
  /** Default: Node.js reader */
  reader?: DirectoryReader;
  /** Called for every recovered error, in traversal order */
  onError?: (error: DirSizeError) => void;
};

export type SizeReport = {
  root: string;
  strategy: SizeStrategy;
  totalBytes: number;
  /** Regular files counted */
  files: number;
  /** Directories visited, root included */
  directories: number;
  /** Symlinks and other entries that contributed nothing */
  skipped: number;
  /** Errors recovered during traversal */
  errors: DirSizeError[];
};

export type AggregateResult =
  | { ok: true; value: SizeReport }
  | { ok: false; error: DirSizeError; partial: SizeReport };
