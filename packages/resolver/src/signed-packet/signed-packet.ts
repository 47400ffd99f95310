/**
 * Signed Packet
 *
 * A DNS packet signed by an Ed25519 key, ordered by a microsecond timestamp.
 *
 * Byte form:
 *
 *   pubkey[32] || signature[64] || timestamp[8, big-endian] || encoded packet[<=1000]
 *
 * The signature covers the BEP 44 mutable-item fields without the outer
 * dictionary markers:
 *
 *   "3:seqi" <timestamp> "e1:v" <length> ":" <encoded packet>
 *
 * The encoded packet is kept exactly as received so that toBytes()
 * reproduces the bytes whose signature was verified.
 */

import { type ResourceRecord, Packet, decodePacket, encodePacket, formatResourceRecord, normalizeName } from '../dns'
import {
  InvalidRelayPayloadSize,
  InvalidSignedPacketBytesLength,
  PacketError,
  PacketTooLarge,
  SignatureError,
} from '../errors'
import { PUBLIC_KEY_BYTES } from '../crypto/constants'
import { type Keypair, PublicKey } from '../identity'
import { compare, concat, fromString, readUint64BE, toHex, writeUint64BE } from '../utils/buffer'
import {
  DEFAULT_MAXIMUM_TTL,
  DEFAULT_MINIMUM_TTL,
  MAX_ENCODED_PACKET_BYTES,
  PACKET_OFFSET,
  RELAY_PAYLOAD_MIN_BYTES,
  SIGNATURE_OFFSET,
  SIGNED_PACKET_MAX_BYTES,
  SIGNED_PACKET_MIN_BYTES,
  TIMESTAMP_OFFSET,
} from './constants'
import { monotonicNow, nextTimestamp } from './timestamp'

export interface SignOptions {
  /** Microseconds since the Unix epoch. Defaults to the process-wide monotonic source. */
  timestamp?: number
}

/**
 * Bytes covered by the signature.
 */
export function signable(timestamp: number, encodedPacket: Uint8Array): Uint8Array {
  return concat([fromString(`3:seqi${timestamp}e1:v${encodedPacket.length}:`), encodedPacket])
}

function checkTimestamp(timestamp: number | bigint): number {
  if (typeof timestamp === 'bigint') {
    if (timestamp > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new PacketError(`Timestamp ${timestamp} exceeds the largest supported value`)
    }
    return Number(timestamp)
  }
  if (!Number.isSafeInteger(timestamp) || timestamp < 0) {
    throw new PacketError(`Invalid timestamp: ${timestamp}`)
  }
  return timestamp
}

export class SignedPacket {
  private constructor(
    readonly publicKey: PublicKey,
    private readonly sig: Uint8Array,
    /** Microseconds since the Unix epoch */
    readonly timestamp: number,
    readonly packet: Packet,
    private readonly encoded: Uint8Array,
    /** Local receive/creation instant on the monotonic clock, in milliseconds; never transmitted */
    readonly lastSeen: number,
  ) {}

  /**
   * Encode and sign `packet` with `keypair`.
   *
   * @throws PacketTooLarge when the encoded packet exceeds 1000 bytes
   */
  static sign(keypair: Keypair, packet: Packet, options: SignOptions = {}): SignedPacket {
    const encoded = encodePacket(packet)
    if (encoded.length > MAX_ENCODED_PACKET_BYTES) {
      throw new PacketTooLarge(encoded.length)
    }
    const timestamp = checkTimestamp(options.timestamp ?? nextTimestamp())
    const signature = keypair.sign(signable(timestamp, encoded))
    return new SignedPacket(keypair.publicKey, signature, timestamp, packet, encoded, monotonicNow())
  }

  /**
   * Verify and parse the byte form.
   *
   * @throws InvalidSignedPacketBytesLength below 104 bytes
   * @throws PacketTooLarge above 1104 bytes
   * @throws SignatureError when the signature does not verify
   * @throws PacketError when the encoded packet does not decode
   */
  static fromBytes(bytes: Uint8Array): SignedPacket {
    if (bytes.length < SIGNED_PACKET_MIN_BYTES) {
      throw new InvalidSignedPacketBytesLength(bytes.length)
    }
    if (bytes.length > SIGNED_PACKET_MAX_BYTES) {
      throw new PacketTooLarge(bytes.length - PACKET_OFFSET)
    }

    const publicKey = new PublicKey(bytes.subarray(0, PUBLIC_KEY_BYTES))
    const signature = bytes.slice(SIGNATURE_OFFSET, TIMESTAMP_OFFSET)
    const timestamp = checkTimestamp(readUint64BE(bytes, TIMESTAMP_OFFSET))
    const encoded = bytes.slice(PACKET_OFFSET)

    if (!publicKey.verify(signable(timestamp, encoded), signature)) {
      throw new SignatureError(`Invalid signature for ${publicKey.toZ32()}`)
    }

    const packet = decodePacket(encoded)
    return new SignedPacket(publicKey, signature, timestamp, packet, encoded, monotonicNow())
  }

  /**
   * Verify and parse a relay payload (the byte form without the public key).
   *
   * @throws InvalidRelayPayloadSize below 72 bytes
   */
  static fromRelayPayload(publicKey: PublicKey, payload: Uint8Array): SignedPacket {
    if (payload.length < RELAY_PAYLOAD_MIN_BYTES) {
      throw new InvalidRelayPayloadSize(payload.length)
    }
    return SignedPacket.fromBytes(concat([publicKey.toBytes(), payload]))
  }

  /** Copy of the 64-byte signature. */
  signature(): Uint8Array {
    return this.sig.slice()
  }

  /** Copy of the encoded DNS packet. */
  encodedPacket(): Uint8Array {
    return this.encoded.slice()
  }

  toBytes(): Uint8Array {
    return concat([
      this.publicKey.toBytes(),
      this.sig,
      writeUint64BE(BigInt(this.timestamp)),
      this.encoded,
    ])
  }

  toRelayPayload(): Uint8Array {
    return this.toBytes().subarray(PUBLIC_KEY_BYTES)
  }

  /**
   * Smallest record TTL clamped to [minTtl, maxTtl], in seconds.
   * Without records the result is minTtl.
   */
  ttl(minTtl: number = DEFAULT_MINIMUM_TTL, maxTtl: number = DEFAULT_MAXIMUM_TTL): number {
    if (this.packet.answers.length === 0) {
      return minTtl
    }
    const smallest = Math.min(...this.packet.answers.map((rr) => rr.ttl))
    return Math.min(Math.max(smallest, minTtl), maxTtl)
  }

  /** Whole seconds since lastSeen, never negative. */
  elapsed(): number {
    return Math.max(0, Math.floor((monotonicNow() - this.lastSeen) / 1000))
  }

  /** Seconds until the packet should be considered stale. */
  expiresIn(minTtl: number = DEFAULT_MINIMUM_TTL, maxTtl: number = DEFAULT_MAXIMUM_TTL): number {
    return Math.max(0, this.ttl(minTtl, maxTtl) - this.elapsed())
  }

  /**
   * Answers whose owner name matches `name`, resolved against the signer's
   * key as zone origin ("@" is the apex, "_foo" means "_foo.<key>").
   */
  resourceRecords(name: string): ResourceRecord[] {
    const target = normalizeName(this.publicKey.toZ32(), name)
    return this.packet.answers.filter((rr) => rr.name === target)
  }

  /**
   * Like resourceRecords, minus records whose TTL has run out since lastSeen.
   */
  freshResourceRecords(name: string): ResourceRecord[] {
    const elapsed = this.elapsed()
    return this.resourceRecords(name).filter((rr) => rr.ttl > elapsed)
  }

  /**
   * Ordering used for rollback protection: the later timestamp wins, and
   * equal timestamps fall back to comparing the encoded packets.
   */
  isMoreRecentThan(other: SignedPacket): boolean {
    if (this.timestamp !== other.timestamp) {
      return this.timestamp > other.timestamp
    }
    return compare(this.encoded, other.encoded) > 0
  }

  /** Same signer, timestamp and encoded packet. */
  equals(other: SignedPacket): boolean {
    return (
      this.publicKey.equals(other.publicKey) &&
      this.timestamp === other.timestamp &&
      compare(this.encoded, other.encoded) === 0
    )
  }

  toString(): string {
    const lines = [
      `SignedPacket (${this.publicKey.toZ32()}):`,
      `    last_seen: ${this.elapsed()} seconds ago`,
      `    timestamp: ${this.timestamp}`,
      `    signature: ${toHex(this.sig)}`,
      '    records:',
      ...this.packet.answers.map((rr) => `        ${formatResourceRecord(rr)}`),
    ]
    return lines.join('\n')
  }
}
