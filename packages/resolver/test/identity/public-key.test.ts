import { describe, it, expect } from 'vitest'
import { IdentityError } from '../../src/errors'
import { Keypair, PUBLIC_KEY_Z32_LENGTH, PublicKey } from '../../src/identity'
import { fromString } from '../../src/utils/buffer'

describe('PublicKey', () => {
  const keypair = Keypair.fromSecretKey(new Uint8Array(32).fill(1))

  it('round-trips through z-base-32 text', () => {
    const text = keypair.publicKey.toZ32()
    expect(text).toHaveLength(PUBLIC_KEY_Z32_LENGTH)
    expect(PublicKey.fromZ32(text).equals(keypair.publicKey)).toBe(true)
    expect(new PublicKey(text).toBytes()).toEqual(keypair.publicKey.toBytes())
  })

  it('accepts upper-case and padded text', () => {
    const text = keypair.publicKey.toZ32()
    expect(PublicKey.fromZ32(`  ${text.toUpperCase()} `).toZ32()).toBe(text)
  })

  it('renders hex and toString', () => {
    const key = PublicKey.fromBytes(new Uint8Array(32))
    expect(key.toHex()).toBe('00'.repeat(32))
    expect(String(key)).toBe('y'.repeat(52))
  })

  it('rejects wrong byte lengths', () => {
    expect(() => PublicKey.fromBytes(new Uint8Array(31))).toThrow(IdentityError)
    expect(() => PublicKey.fromBytes(new Uint8Array(31))).toThrow(
      'Public key must be 32 bytes long, got 31 bytes',
    )
  })

  it('rejects text of the wrong length or alphabet', () => {
    expect(() => PublicKey.fromZ32('abc')).toThrow(IdentityError)
    expect(() => PublicKey.fromZ32('l'.repeat(52))).toThrow(IdentityError)
  })

  it('copies the key bytes', () => {
    const bytes = new Uint8Array(32).fill(5)
    const key = PublicKey.fromBytes(bytes)
    bytes[0] = 0
    key.toBytes()[1] = 0
    expect(key.toBytes()).toEqual(new Uint8Array(32).fill(5))
  })

  it('verifies signatures made by the keypair', () => {
    const message = fromString('record')
    const signature = keypair.sign(message)
    expect(keypair.publicKey.verify(message, signature)).toBe(true)
    expect(Keypair.random().publicKey.verify(message, signature)).toBe(false)
  })
})

describe('Keypair', () => {
  it('derives the public key deterministically', () => {
    const seed = new Uint8Array(32).fill(9)
    expect(Keypair.fromSecretKey(seed).publicKey.equals(Keypair.fromSecretKey(seed).publicKey)).toBe(
      true,
    )
  })

  it('returns a copy of the secret key', () => {
    const seed = new Uint8Array(32).fill(9)
    const keypair = Keypair.fromSecretKey(seed)
    keypair.secretKey()[0] = 0
    expect(keypair.secretKey()).toEqual(seed)
  })

  it('rejects seeds of the wrong length', () => {
    expect(() => Keypair.fromSecretKey(new Uint8Array(33))).toThrow(IdentityError)
  })

  it('generates distinct random keypairs', () => {
    expect(Keypair.random().publicKey.equals(Keypair.random().publicKey)).toBe(false)
  })

  it('describes itself by public key', () => {
    const keypair = Keypair.random()
    expect(keypair.toString()).toBe(`Keypair(public_key=${keypair.publicKey.toZ32()})`)
  })
})
