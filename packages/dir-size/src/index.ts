/**
 * @bytetools/dir-size
 *
 * Total byte size of a directory tree, with two strategies sharing one
 * traversal core:
 *
 * - `nested` (default): sum of regular file sizes
 * - `flat`: every entry adds its own reported size, directories included
 *
 * Filesystem access goes through the `DirectoryReader` port. The Node.js
 * reader is synchronous and read-only; the in-memory reader exists for
 * tests and for callers that aggregate virtual trees.
 *
 * @packageDocumentation
 */

export { directorySize } from "./aggregate.ts";
export {
  createDirSizeError,
  type DirSizeError,
  type DirSizeErrorCode,
  isDirSizeError,
} from "./errors.ts";
export {
  createMemoryDirectoryReader,
  MEMORY_DIRECTORY_SIZE,
  type MemoryDirectoryReader,
  type MemoryFailure,
  type MemoryNode,
} from "./memory-reader.ts";
export { createNodeDirectoryReader } from "./node-reader.ts";
export {
  type AggregateResult,
  type DirectoryEntry,
  type DirectoryReader,
  type DirectorySizeOptions,
  type EntryKind,
  type EntryStat,
  SIZE_STRATEGIES,
  type SizeReport,
  type SizeStrategy,
} from "./types.ts";
