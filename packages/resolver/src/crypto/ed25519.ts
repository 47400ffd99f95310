/**
 * Ed25519 signing
 *
 * Thin wrapper over @noble/ed25519 using its synchronous API. The library
 * needs a SHA-512 implementation for sync operation; it is wired from
 * @noble/hashes once, when this module loads.
 */

import * as ed from '@noble/ed25519'
import { sha512 } from '@noble/hashes/sha512'
import { PUBLIC_KEY_BYTES, SECRET_KEY_BYTES, SIGNATURE_BYTES } from './constants'

ed.etc.sha512Sync = (...m) => sha512(ed.etc.concatBytes(...m))

/**
 * Generate a random 32-byte secret seed.
 */
export function generateSecretKey(): Uint8Array {
  return ed.utils.randomPrivateKey()
}

/**
 * Derive the 32-byte verifying key for a secret seed.
 */
export function derivePublicKey(secretKey: Uint8Array): Uint8Array {
  if (secretKey.length !== SECRET_KEY_BYTES) {
    throw new Error(`Secret key must be ${SECRET_KEY_BYTES} bytes long, got ${secretKey.length}`)
  }
  return ed.getPublicKey(secretKey)
}

export function sign(secretKey: Uint8Array, message: Uint8Array): Uint8Array {
  if (secretKey.length !== SECRET_KEY_BYTES) {
    throw new Error(`Secret key must be ${SECRET_KEY_BYTES} bytes long, got ${secretKey.length}`)
  }
  return ed.sign(message, secretKey)
}

/**
 * Verify a signature. Malformed keys or signatures verify as false.
 */
export function verify(publicKey: Uint8Array, message: Uint8Array, signature: Uint8Array): boolean {
  if (publicKey.length !== PUBLIC_KEY_BYTES || signature.length !== SIGNATURE_BYTES) {
    return false
  }
  try {
    return ed.verify(signature, message, publicKey)
  } catch {
    // Point decoding failures surface as exceptions
    return false
  }
}
