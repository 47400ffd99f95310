/**
 * Signed Packet Constants
 *
 * Byte layout: pubkey[32] || signature[64] || timestamp[8, BE] || encoded packet
 */

import { PUBLIC_KEY_BYTES, SIGNATURE_BYTES } from '../crypto/constants'

export const TIMESTAMP_BYTES = 8

/** Offset of the signature in the signed packet byte form. */
export const SIGNATURE_OFFSET = PUBLIC_KEY_BYTES

/** Offset of the big-endian microsecond timestamp. */
export const TIMESTAMP_OFFSET = SIGNATURE_OFFSET + SIGNATURE_BYTES

/** Offset of the encoded DNS packet. */
export const PACKET_OFFSET = TIMESTAMP_OFFSET + TIMESTAMP_BYTES

/**
 * Largest encoded DNS packet that may be signed.
 * BEP 44 caps mutable item values at 1000 bytes.
 */
export const MAX_ENCODED_PACKET_BYTES = 1000

/** Shortest valid byte form: header with an empty encoded packet. */
export const SIGNED_PACKET_MIN_BYTES = PACKET_OFFSET

export const SIGNED_PACKET_MAX_BYTES = PACKET_OFFSET + MAX_ENCODED_PACKET_BYTES

/** Relay payloads omit the public key. */
export const RELAY_PAYLOAD_MIN_BYTES = SIGNED_PACKET_MIN_BYTES - PUBLIC_KEY_BYTES

/** Default TTL floor in seconds (5 minutes). */
export const DEFAULT_MINIMUM_TTL = 300

/** Default TTL ceiling in seconds (24 hours). */
export const DEFAULT_MAXIMUM_TTL = 24 * 60 * 60
