/**
 * Hex encoding/decoding
 *
 * Every byte maps to exactly two digits, so a valid encoding always has
 * even length. Decoding accepts either case.
 */

import { createEncodingError, type EncodingError, type Result } from "./errors.ts";

export type ByteSequence = Uint8Array | readonly number[];

const HEX_UPPER = "0123456789ABCDEF";
const HEX_LOWER = "0123456789abcdef";

const HEX_DECODE = new Map<string, number>();
for (let i = 0; i < 16; i++) {
  HEX_DECODE.set(HEX_UPPER.charAt(i), i);
  HEX_DECODE.set(HEX_LOWER.charAt(i), i);
}

/**
 * Encode bytes to a hex string.
 *
 * Fails only for `number[]` input holding a value that is not a byte.
 *
 * @param data - Bytes to encode
 * @param uppercase - Use A-F (default) instead of a-f
 *
 * @example encodeHex([0xba, 0xad, 0xf0, 0x0d]) → { ok: true, value: "BAADF00D" }
 */
export function encodeHex(data: ByteSequence, uppercase = true): Result<string, EncodingError> {
  const alphabet = uppercase ? HEX_UPPER : HEX_LOWER;
  let out = "";

  for (let i = 0; i < data.length; i++) {
    const byte = data[i];
    if (byte === undefined || !Number.isInteger(byte) || byte < 0 || byte > 0xff) {
      return {
        ok: false,
        error: createEncodingError(
          "EncodingInternalError",
          `Value at position ${i} is not a byte: ${String(byte)}`,
          { position: i }
        ),
      };
    }
    out += alphabet.charAt(byte >> 4) + alphabet.charAt(byte & 0x0f);
  }

  return { ok: true, value: out };
}

/**
 * Decode a hex string to bytes.
 *
 * Reports the first invalid character with its position; odd-length input
 * is rejected before any character is inspected. Positions count UTF-16
 * code units, and `character` is the whole code point found there.
 */
export function decodeHex(text: string): Result<Uint8Array, EncodingError> {
  if (text.length % 2 !== 0) {
    return {
      ok: false,
      error: createEncodingError(
        "InvalidEncodingInput",
        `Hex string must have even length (got ${text.length})`,
        { position: text.length }
      ),
    };
  }

  const bytes = new Uint8Array(text.length / 2);
  for (let i = 0; i < text.length; i += 2) {
    const high = HEX_DECODE.get(text.charAt(i));
    const low = HEX_DECODE.get(text.charAt(i + 1));
    if (high === undefined || low === undefined) {
      const position = high === undefined ? i : i + 1;
      const character = String.fromCodePoint(text.codePointAt(position) ?? 0);
      return {
        ok: false,
        error: createEncodingError(
          "InvalidEncodingInput",
          `Invalid hex character '${character}' at position ${position}`,
          { position, character }
        ),
      };
    }
    bytes[i / 2] = (high << 4) | low;
  }

  return { ok: true, value: bytes };
}

/**
 * Check if a string is a valid hex encoding (even length, hex digits only).
 */
export function isValidHex(text: string): boolean {
  return text.length % 2 === 0 && /^[0-9a-fA-F]*$/.test(text);
}
