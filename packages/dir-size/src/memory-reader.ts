/**
 * In-memory DirectoryReader
 *
 * Describes a tree as plain objects so traversal can be exercised without
 * touching the disk, including failures the host filesystem rarely
 * produces on demand (permission errors, entries vanishing mid-walk).
 */

import { posix } from "node:path";
import type { DirectoryEntry, DirectoryReader, EntryKind, EntryStat } from "./types.ts";

/** Size reported for directories that do not set one */
export const MEMORY_DIRECTORY_SIZE = 4096;

export type MemoryFailure = "EACCES" | "ENOENT" | "EIO";

export type MemoryNode =
  | { type: "file"; size: number; statError?: MemoryFailure }
  | {
      type: "directory";
      children: Record<string, MemoryNode>;
      size?: number;
      statError?: MemoryFailure;
      listError?: MemoryFailure;
    }
  | { type: "symlink"; target: string }
  | { type: "other"; size?: number };

export type MemoryDirectoryReader = DirectoryReader & {
  /** Paths passed to `list`, in call order */
  listed: () => string[];
};

const SYSTEM_MESSAGES: Record<MemoryFailure | "ENOTDIR", string> = {
  EACCES: "permission denied",
  ENOENT: "no such file or directory",
  EIO: "i/o error",
  ENOTDIR: "not a directory",
};

const systemError = (code: MemoryFailure | "ENOTDIR", syscall: string, path: string): Error =>
  Object.assign(new Error(`${code}: ${SYSTEM_MESSAGES[code]}, ${syscall} '${path}'`), {
    code,
    syscall,
    path,
  });

const kindOf = (node: MemoryNode): EntryKind => (node.type === "other" ? "other" : node.type);

/**
 * Create a reader over an in-memory tree mounted at `/`
 */
export const createMemoryDirectoryReader = (root: MemoryNode): MemoryDirectoryReader => {
  const listed: string[] = [];

  const lookup = (path: string, syscall: string): MemoryNode => {
    const segments = posix.resolve("/", path).split("/").filter(Boolean);
    let node = root;
    for (const segment of segments) {
      if (node.type !== "directory") {
        throw systemError("ENOTDIR", syscall, path);
      }
      const child = Object.hasOwn(node.children, segment) ? node.children[segment] : undefined;
      if (!child) {
        throw systemError("ENOENT", syscall, path);
      }
      node = child;
    }
    return node;
  };

  const list = (dirPath: string): DirectoryEntry[] => {
    listed.push(dirPath);
    const node = lookup(dirPath, "scandir");
    if (node.type !== "directory") {
      throw systemError("ENOTDIR", "scandir", dirPath);
    }
    if (node.listError) {
      throw systemError(node.listError, "scandir", dirPath);
    }
    return Object.entries(node.children).map(([name, child]) => ({
      name,
      path: posix.join(dirPath, name),
      kind: kindOf(child),
    }));
  };

  const stat = (entryPath: string): EntryStat => {
    const node = lookup(entryPath, "lstat");
    switch (node.type) {
      case "file":
        if (node.statError) throw systemError(node.statError, "lstat", entryPath);
        return { kind: "file", size: node.size };
      case "directory":
        if (node.statError) throw systemError(node.statError, "lstat", entryPath);
        return { kind: "directory", size: node.size ?? MEMORY_DIRECTORY_SIZE };
      case "symlink":
        return { kind: "symlink", size: node.target.length };
      case "other":
        return { kind: "other", size: node.size ?? 0 };
    }
  };

  return { list, stat, listed: () => [...listed] };
};
