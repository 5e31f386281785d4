import { SourceError, marker, span } from "./types.js";

export type Encoding = "utf-8" | "utf-16le" | "utf-16be";

/** What to do with byte sequences the detected encoding cannot decode */
export type MalformedPolicy = "strict" | "replace";

export interface DecodeOptions {
  onMalformed: MalformedPolicy;
}

export const DEFAULT_DECODE_OPTIONS: Readonly<DecodeOptions> = Object.freeze({
  onMalformed: "strict",
});

/**
 * Detect the encoding from a byte order mark, or from the position of the
 * zero byte among the first two (an ASCII character in UTF-16).
 */
export function detectEncoding(bytes: Uint8Array): { encoding: Encoding; bomLength: number } {
  const [b0, b1, b2] = bytes;
  if (b0 === 0xef && b1 === 0xbb && b2 === 0xbf) return { encoding: "utf-8", bomLength: 3 };
  if (b0 === 0xff && b1 === 0xfe) return { encoding: "utf-16le", bomLength: 2 };
  if (b0 === 0xfe && b1 === 0xff) return { encoding: "utf-16be", bomLength: 2 };
  if (b0 !== undefined && b1 !== undefined) {
    if (b0 === 0 && b1 !== 0) return { encoding: "utf-16be", bomLength: 0 };
    if (b0 !== 0 && b1 === 0) return { encoding: "utf-16le", bomLength: 0 };
  }
  return { encoding: "utf-8", bomLength: 0 };
}

/** Decode a byte buffer to a string without its byte order mark */
export function decode(bytes: Uint8Array, options: Partial<DecodeOptions> = {}): string {
  const { onMalformed } = { ...DEFAULT_DECODE_OPTIONS, ...options };
  const { encoding, bomLength } = detectEncoding(bytes);
  const decoder = new TextDecoder(encoding, { fatal: onMalformed === "strict", ignoreBOM: true });
  try {
    return decoder.decode(bytes.subarray(bomLength));
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new SourceError(`invalid ${encoding} input: ${reason}`, span(marker(bomLength, 1, 0)));
  }
}
