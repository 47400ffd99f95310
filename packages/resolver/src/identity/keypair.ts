/**
 * Keypair
 *
 * A 32-byte Ed25519 secret seed and the public key derived from it.
 */

import { SECRET_KEY_BYTES, derivePublicKey, generateSecretKey, sign } from '../crypto'
import { IdentityError } from '../errors'
import { PublicKey } from './public-key'

export class Keypair {
  private readonly secret: Uint8Array
  readonly publicKey: PublicKey

  private constructor(secretKey: Uint8Array) {
    if (secretKey.length !== SECRET_KEY_BYTES) {
      throw new IdentityError(
        `Secret key must be ${SECRET_KEY_BYTES} bytes long, got ${secretKey.length} bytes`,
      )
    }
    this.secret = secretKey.slice()
    this.publicKey = new PublicKey(derivePublicKey(this.secret))
  }

  static random(): Keypair {
    return new Keypair(generateSecretKey())
  }

  static fromSecretKey(secretKey: Uint8Array): Keypair {
    return new Keypair(secretKey)
  }

  /** Copy of the secret seed. */
  secretKey(): Uint8Array {
    return this.secret.slice()
  }

  sign(message: Uint8Array): Uint8Array {
    return sign(this.secret, message)
  }

  verify(message: Uint8Array, signature: Uint8Array): boolean {
    return this.publicKey.verify(message, signature)
  }

  toString(): string {
    return `Keypair(public_key=${this.publicKey.toZ32()})`
  }
}
