/**
 * Encoding errors and the Result union shared by the codec functions.
 */

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type EncodingErrorCode = "InvalidEncodingInput" | "EncodingInternalError";

export type EncodingError = {
  readonly name: "EncodingError";
  readonly code: EncodingErrorCode;
  message: string;
  /** Zero-based index of the offending element or character */
  position?: number;
  /** Offending character, for decode failures */
  character?: string;
};

export function createEncodingError(
  code: EncodingErrorCode,
  message: string,
  details: { position?: number; character?: string } = {}
): EncodingError {
  return { name: "EncodingError", code, message, ...details };
}

export function isEncodingError(x: unknown): x is EncodingError {
  return (
    typeof x === "object" &&
    x !== null &&
    "name" in x &&
    x.name === "EncodingError" &&
    "code" in x
  );
}
