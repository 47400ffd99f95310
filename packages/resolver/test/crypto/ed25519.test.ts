import { describe, it, expect } from 'vitest'
import {
  PUBLIC_KEY_BYTES,
  SECRET_KEY_BYTES,
  SIGNATURE_BYTES,
  derivePublicKey,
  generateSecretKey,
  sha1,
  sign,
  verify,
} from '../../src/crypto'
import { PACKET_OFFSET, SIGNATURE_OFFSET, TIMESTAMP_OFFSET } from '../../src/signed-packet'
import { fromString, toHex } from '../../src/utils/buffer'

describe('key sizes', () => {
  it('match the ed25519 primitives', () => {
    const secret = generateSecretKey()
    expect(secret).toHaveLength(SECRET_KEY_BYTES)
    expect(derivePublicKey(secret)).toHaveLength(PUBLIC_KEY_BYTES)
    expect(sign(secret, fromString('x'))).toHaveLength(SIGNATURE_BYTES)
  })

  it('lay out the signed packet header', () => {
    expect(SIGNATURE_OFFSET).toBe(PUBLIC_KEY_BYTES)
    expect(TIMESTAMP_OFFSET).toBe(PUBLIC_KEY_BYTES + SIGNATURE_BYTES)
    expect(PACKET_OFFSET).toBe(104)
  })
})

describe('ed25519', () => {
  const secret = new Uint8Array(32).fill(7)

  it('derives the same public key for the same seed', () => {
    expect(derivePublicKey(secret)).toEqual(derivePublicKey(secret.slice()))
    expect(derivePublicKey(secret)).toHaveLength(32)
  })

  it('generates distinct 32-byte seeds', () => {
    const a = generateSecretKey()
    const b = generateSecretKey()
    expect(a).toHaveLength(32)
    expect(toHex(a)).not.toBe(toHex(b))
  })

  it('signs and verifies', () => {
    const message = fromString('hello')
    const signature = sign(secret, message)
    expect(signature).toHaveLength(64)
    expect(verify(derivePublicKey(secret), message, signature)).toBe(true)
    expect(verify(derivePublicKey(secret), fromString('hellp'), signature)).toBe(false)
  })

  it('treats malformed keys and signatures as invalid', () => {
    const message = fromString('hello')
    const signature = sign(secret, message)
    expect(verify(new Uint8Array(31), message, signature)).toBe(false)
    expect(verify(derivePublicKey(secret), message, signature.subarray(1))).toBe(false)
  })

  it('rejects seeds of the wrong length', () => {
    expect(() => derivePublicKey(new Uint8Array(16))).toThrow('32 bytes')
  })
})

describe('sha1', () => {
  it('hashes the empty input', () => {
    expect(toHex(sha1(new Uint8Array(0)))).toBe('da39a3ee5e6b4b0d3255bfef95601890afd80709')
  })
})
