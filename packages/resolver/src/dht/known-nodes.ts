/**
 * Known Nodes
 *
 * Flat store of DHT nodes seen across lookups, keyed by host:port and capped
 * at a maximum size. Bootstrap nodes are pinned: they are never evicted or
 * removed. When full, the oldest non-bootstrap entry makes room.
 *
 * Mutations are synchronous; reads return copies.
 */

import { MAX_KNOWN_NODES } from './constants'
import type { KnownNode } from './types'

export interface KnownNodesOptions {
  /** Maximum entries, bootstrap nodes included (default: 1000) */
  maxNodes?: number
  /** Pinned entry points */
  bootstrap?: readonly string[]
}

export class KnownNodes {
  private readonly nodes = new Map<string, KnownNode>()
  private readonly maxNodes: number

  constructor(options: KnownNodesOptions = {}) {
    this.maxNodes = options.maxNodes ?? MAX_KNOWN_NODES
    for (const address of options.bootstrap ?? []) {
      this.addBootstrap(address)
    }
  }

  /**
   * Pin an address as a bootstrap node. Bootstrap entries may exceed the cap.
   */
  addBootstrap(address: string): void {
    const existing = this.nodes.get(address)
    if (existing) {
      existing.bootstrap = true
      return
    }
    this.nodes.set(address, { address, bootstrap: true })
  }

  /**
   * Record a node. Existing entries keep their position and gain the id.
   *
   * @returns false when the store is full of bootstrap nodes
   */
  add(address: string, id?: Uint8Array): boolean {
    const existing = this.nodes.get(address)
    if (existing) {
      if (id) existing.id = id
      return true
    }

    if (this.nodes.size >= this.maxNodes && !this.evictOne()) {
      return false
    }
    this.nodes.set(address, { address, id, bootstrap: false })
    return true
  }

  /**
   * Note a valid response from `address`, adding it if needed.
   */
  markSeen(address: string, id?: Uint8Array, now: number = Date.now()): void {
    if (!this.add(address, id)) return
    const node = this.nodes.get(address)
    if (node) node.lastSeen = now
  }

  /**
   * Drop a node. Bootstrap nodes are kept.
   *
   * @returns true if the node was removed
   */
  remove(address: string): boolean {
    const node = this.nodes.get(address)
    if (!node || node.bootstrap) return false
    return this.nodes.delete(address)
  }

  has(address: string): boolean {
    return this.nodes.has(address)
  }

  get(address: string): KnownNode | undefined {
    const node = this.nodes.get(address)
    return node ? { ...node } : undefined
  }

  size(): number {
    return this.nodes.size
  }

  /** Snapshot of all addresses in insertion order. */
  addresses(): string[] {
    return [...this.nodes.keys()]
  }

  /** Snapshot of all entries. */
  all(): KnownNode[] {
    return [...this.nodes.values()].map((node) => ({ ...node }))
  }

  /**
   * Up to `limit` addresses, least recently seen first (never seen before
   * anything seen), for liveness checks.
   */
  stalest(limit: number): string[] {
    return [...this.nodes.values()]
      .sort((a, b) => (a.lastSeen ?? 0) - (b.lastSeen ?? 0))
      .slice(0, limit)
      .map((node) => node.address)
  }

  private evictOne(): boolean {
    for (const node of this.nodes.values()) {
      if (!node.bootstrap) {
        this.nodes.delete(node.address)
        return true
      }
    }
    return false
  }
}
