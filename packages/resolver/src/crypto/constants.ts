/**
 * Ed25519 key and signature sizes.
 */

export const PUBLIC_KEY_BYTES = 32

export const SECRET_KEY_BYTES = 32

export const SIGNATURE_BYTES = 64
