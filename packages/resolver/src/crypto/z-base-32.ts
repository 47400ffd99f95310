/**
 * z-base-32
 *
 * Human-oriented base-32 (alphabet "ybndrfg8ejkmcpqxot1uwisza345h769")
 * used for the textual form of public keys. Encoding is delegated to z32;
 * decoding is strict: unknown symbols and non-canonical trailing bits are
 * rejected.
 */

import z32 from 'z32'

const Z_BASE_32_PATTERN = /^[ybndrfg8ejkmcpqxot1uwisza345h769]*$/

export function zBase32Encode(data: Uint8Array): string {
  return z32.encode(data)
}

/**
 * Decode z-base-32 text.
 *
 * @throws Error when the text contains symbols outside the alphabet or is
 *   not the canonical encoding of the decoded bytes
 */
export function zBase32Decode(text: string): Uint8Array {
  if (!Z_BASE_32_PATTERN.test(text)) {
    throw new Error('Invalid z-base-32 character')
  }
  const decoded = new Uint8Array(z32.decode(text)).slice(0, Math.floor((text.length * 5) / 8))
  if (z32.encode(decoded) !== text) {
    throw new Error('Non-canonical z-base-32 encoding')
  }
  return decoded
}

/**
 * Length of the z-base-32 text for a byte length.
 */
export function zBase32Length(byteLength: number): number {
  return Math.ceil((byteLength * 8) / 5)
}
