/**
 * @bytetools/encoding
 *
 * - Hex encode/decode with explicit Result values
 * - Human-readable size formatting (formatSize)
 *
 * Zero runtime dependencies.
 */

export {
  createEncodingError,
  type EncodingError,
  type EncodingErrorCode,
  isEncodingError,
  type Result,
} from "./errors.ts";
export { type FormatSizeOptions, formatSize } from "./format.ts";
export { type ByteSequence, decodeHex, encodeHex, isValidHex } from "./hex.ts";
