/**
 * Crypto provider
 *
 * Key generation, signing, verification, hashing and the z-base-32 codec.
 */

export { PUBLIC_KEY_BYTES, SECRET_KEY_BYTES, SIGNATURE_BYTES } from './constants'
export { generateSecretKey, derivePublicKey, sign, verify } from './ed25519'
export { sha1, randomBytes } from './hash'
export { zBase32Encode, zBase32Decode, zBase32Length } from './z-base-32'
