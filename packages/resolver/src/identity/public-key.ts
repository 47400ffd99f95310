/**
 * Public Key
 *
 * A 32-byte Ed25519 verifying key. The canonical text form is z-base-32.
 */

import { PUBLIC_KEY_BYTES, verify, zBase32Decode, zBase32Encode, zBase32Length } from '../crypto'
import { IdentityError, errorMessage } from '../errors'
import { equals, toHex } from '../utils/buffer'

/** Length of the z-base-32 text of a public key (52 symbols). */
export const PUBLIC_KEY_Z32_LENGTH = zBase32Length(PUBLIC_KEY_BYTES)

export class PublicKey {
  private readonly key: Uint8Array
  private z32?: string

  /**
   * @param key - raw 32 bytes or z-base-32 text
   * @throws IdentityError on wrong length or invalid text
   */
  constructor(key: Uint8Array | string) {
    if (typeof key === 'string') {
      this.key = PublicKey.decodeText(key)
    } else {
      if (key.length !== PUBLIC_KEY_BYTES) {
        throw new IdentityError(
          `Public key must be ${PUBLIC_KEY_BYTES} bytes long, got ${key.length} bytes`,
        )
      }
      this.key = key.slice()
    }
  }

  static fromZ32(text: string): PublicKey {
    return new PublicKey(text)
  }

  static fromBytes(bytes: Uint8Array): PublicKey {
    return new PublicKey(bytes)
  }

  private static decodeText(text: string): Uint8Array {
    const normalized = text.trim().toLowerCase()
    if (normalized.length !== PUBLIC_KEY_Z32_LENGTH) {
      throw new IdentityError(
        `Invalid z-base-32 encoded public key: expected ${PUBLIC_KEY_Z32_LENGTH} characters, got ${normalized.length}`,
      )
    }
    try {
      return zBase32Decode(normalized)
    } catch (err) {
      throw new IdentityError(`Invalid z-base-32 encoded public key: ${errorMessage(err)}`)
    }
  }

  /** Copy of the raw key bytes. */
  toBytes(): Uint8Array {
    return this.key.slice()
  }

  toZ32(): string {
    if (this.z32 === undefined) {
      this.z32 = zBase32Encode(this.key)
    }
    return this.z32
  }

  toHex(): string {
    return toHex(this.key)
  }

  equals(other: PublicKey): boolean {
    return equals(this.key, other.key)
  }

  verify(message: Uint8Array, signature: Uint8Array): boolean {
    return verify(this.key, message, signature)
  }

  toString(): string {
    return this.toZ32()
  }
}
