export type DirSizeErrorCode = "TraversalError" | "EntryAccessError";

export type DirSizeError = {
  readonly name: "DirSizeError";
  readonly code: DirSizeErrorCode;
  /** Path of the directory or entry that failed */
  path: string;
  message: string;
  /** System error code of the underlying failure, e.g. "EACCES" */
  cause?: string;
};

export function createDirSizeError(
  code: DirSizeErrorCode,
  path: string,
  message: string,
  cause?: string
): DirSizeError {
  return cause === undefined
    ? { name: "DirSizeError", code, path, message }
    : { name: "DirSizeError", code, path, message, cause };
}

export function isDirSizeError(x: unknown): x is DirSizeError {
  return (
    typeof x === "object" &&
    x !== null &&
    "name" in x &&
    x.name === "DirSizeError" &&
    "code" in x
  );
}

/**
 * Extract the system error code (ENOENT, EACCES, ...) from a thrown value.
 */
export function systemErrorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
