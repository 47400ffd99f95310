import { sha1 as nobleSha1 } from '@noble/hashes/sha1'
import { randomBytes as nobleRandomBytes } from '@noble/hashes/utils'

/**
 * SHA-1 digest (20 bytes). Used to derive DHT info-hashes.
 */
export function sha1(data: Uint8Array): Uint8Array {
  return nobleSha1(data)
}

/**
 * Cryptographically secure random bytes.
 */
export function randomBytes(size: number): Uint8Array {
  return nobleRandomBytes(size)
}
