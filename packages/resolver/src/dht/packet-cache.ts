/**
 * Packet Cache
 *
 * Verified signed packets keyed by the signer's z-base-32 key, each with an
 * absolute expiry in milliseconds. Entries are never evicted; staleness is
 * checked on read. A write never replaces a cached packet with an older one.
 */

import type { SignedPacket } from '../signed-packet'

export interface CacheEntry {
  packet: SignedPacket
  /** Epoch milliseconds */
  expiresAt: number
}

export class PacketCache {
  private readonly entries = new Map<string, CacheEntry>()

  /**
   * Fresh packet for `key`, or null when missing or expired.
   */
  get(key: string, now: number = Date.now()): SignedPacket | null {
    const entry = this.entries.get(key)
    if (!entry || now >= entry.expiresAt) return null
    return entry.packet
  }

  /**
   * The entry for `key` regardless of freshness.
   */
  peek(key: string): CacheEntry | undefined {
    const entry = this.entries.get(key)
    return entry ? { ...entry } : undefined
  }

  /**
   * Store `packet` under its signer's key with the given expiry.
   *
   * If the cache already holds a more recent packet for the key, that packet
   * is kept and only the expiry is updated.
   *
   * @returns the packet now cached for the key
   */
  put(packet: SignedPacket, expiresAt: number): SignedPacket {
    const key = packet.publicKey.toZ32()
    const existing = this.entries.get(key)
    const kept = existing && existing.packet.isMoreRecentThan(packet) ? existing.packet : packet
    this.entries.set(key, { packet: kept, expiresAt })
    return kept
  }

  delete(key: string): boolean {
    return this.entries.delete(key)
  }

  size(): number {
    return this.entries.size
  }

  clear(): void {
    this.entries.clear()
  }
}
