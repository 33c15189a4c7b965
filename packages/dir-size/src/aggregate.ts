/**
 * Directory size aggregation
 *
 * One depth-first traversal core shared by both strategies. The strategy
 * only decides which entries add their own size:
 *
 * - `nested`: regular files only. Directories contribute their subtree,
 *   everything else is skipped.
 * - `flat`: every entry except symlinks adds its own size, so directories
 *   (the root included) add the metadata size the filesystem reports for
 *   them on top of their contents.
 *
 * Symbolic links are never followed in either strategy, except when the
 * root itself is one: it is listed, and its own size is not counted.
 *
 * Failures below the root are recorded and traversal continues; only a
 * root that cannot be stat'ed or listed fails the whole call.
 */

import { createDirSizeError, type DirSizeError, errorMessage, systemErrorCode } from "./errors.ts";
import { createNodeDirectoryReader } from "./node-reader.ts";
import type {
  AggregateResult,
  DirectoryEntry,
  DirectoryReader,
  DirectorySizeOptions,
  EntryStat,
  SizeReport,
  SizeStrategy,
} from "./types.ts";

type TraversalPolicy = {
  /** Directories add their own reported size */
  includeDirectorySize: boolean;
  /** Devices, sockets and FIFOs add their own reported size */
  includeOtherEntries: boolean;
};

const POLICIES: Record<SizeStrategy, TraversalPolicy> = {
  flat: { includeDirectorySize: true, includeOtherEntries: true },
  nested: { includeDirectorySize: false, includeOtherEntries: false },
};

const traversalError = (path: string, error: unknown): DirSizeError =>
  createDirSizeError(
    "TraversalError",
    path,
    `Cannot read directory ${path}: ${errorMessage(error)}`,
    systemErrorCode(error)
  );

const entryAccessError = (path: string, error: unknown): DirSizeError =>
  createDirSizeError(
    "EntryAccessError",
    path,
    `Cannot read size of ${path}: ${errorMessage(error)}`,
    systemErrorCode(error)
  );

/**
 * Per-entry access with local recovery: a failure is recorded and the
 * caller gets a neutral value back.
 */
const createGuardedReader = (reader: DirectoryReader, record: (error: DirSizeError) => void) => ({
  sizeOf: (path: string): number | undefined => {
    try {
      return reader.stat(path).size;
    } catch (error) {
      record(entryAccessError(path, error));
      return undefined;
    }
  },
  listOf: (path: string): DirectoryEntry[] => {
    try {
      return reader.list(path);
    } catch (error) {
      record(traversalError(path, error));
      return [];
    }
  },
});

/**
 * Compute the total size of everything under `root`.
 *
 * @example
 * ```ts
 * const result = directorySize("/var/log", { strategy: "nested" });
 * if (result.ok) console.log(result.value.totalBytes);
 * ```
 */
export function directorySize(root: string, options: DirectorySizeOptions = {}): AggregateResult {
  const strategy = options.strategy ?? "nested";
  const reader = options.reader ?? createNodeDirectoryReader();
  const policy = POLICIES[strategy];

  const report: SizeReport = {
    root,
    strategy,
    totalBytes: 0,
    files: 0,
    directories: 0,
    skipped: 0,
    errors: [],
  };

  // ---- Root: failures here are surfaced, not recovered ----

  let rootStat: EntryStat;
  try {
    rootStat = reader.stat(root);
  } catch (error) {
    return { ok: false, error: traversalError(root, error), partial: report };
  }

  if (rootStat.kind === "file" || rootStat.kind === "other") {
    return {
      ok: false,
      error: createDirSizeError("TraversalError", root, `Not a directory: ${root}`, "ENOTDIR"),
      partial: report,
    };
  }

  if (policy.includeDirectorySize && rootStat.kind === "directory") {
    report.totalBytes += rootStat.size;
  }

  // A symlinked root is resolved here; one that does not lead to a
  // directory fails with ENOTDIR
  let rootEntries: DirectoryEntry[];
  try {
    rootEntries = reader.list(root);
  } catch (error) {
    return { ok: false, error: traversalError(root, error), partial: report };
  }
  report.directories++;

  // ---- Subtree: failures are recorded and skipped ----

  const guarded = createGuardedReader(reader, (error) => {
    report.errors.push(error);
    options.onError?.(error);
  });

  // Pushed in reverse so entries pop in listing order
  const stack = [...rootEntries].reverse();
  let entry = stack.pop();

  while (entry !== undefined) {
    switch (entry.kind) {
      case "file": {
        const size = guarded.sizeOf(entry.path);
        if (size !== undefined) {
          report.totalBytes += size;
          report.files++;
        }
        break;
      }
      case "directory": {
        report.directories++;
        if (policy.includeDirectorySize) {
          report.totalBytes += guarded.sizeOf(entry.path) ?? 0;
        }
        const children = guarded.listOf(entry.path);
        for (let i = children.length - 1; i >= 0; i--) {
          const child = children[i];
          if (child) stack.push(child);
        }
        break;
      }
      case "other": {
        if (policy.includeOtherEntries) {
          report.totalBytes += guarded.sizeOf(entry.path) ?? 0;
        } else {
          report.skipped++;
        }
        break;
      }
      case "symlink":
        report.skipped++;
        break;
    }
    entry = stack.pop();
  }

  return { ok: true, value: report };
}
