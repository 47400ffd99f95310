/**
 * DHT Type Definitions
 */

import type { SignedPacket } from '../signed-packet'

/**
 * Address of a DHT node or peer.
 */
export interface NodeAddress {
  /** IPv4/IPv6 address or hostname */
  host: string
  /** UDP port */
  port: number
}

/**
 * Compact peer info: 6 bytes (4 IP + 2 port)
 */
export type CompactPeer = NodeAddress

/**
 * Compact node info: 26 bytes (20 ID + 6 peer)
 */
export interface CompactNodeInfo {
  id: Uint8Array
  host: string
  port: number
}

/**
 * Entry in the known-nodes store.
 */
export interface KnownNode {
  /** host:port */
  address: string
  /** 20-byte node ID, once learned */
  id?: Uint8Array
  /** Bootstrap nodes are never evicted */
  bootstrap: boolean
  /** Timestamp when we last received a valid response from this node */
  lastSeen?: number
}

/**
 * Result from a get_peers query.
 */
export interface GetPeersResult {
  /** Responding node's ID, when present and well-formed */
  id?: Uint8Array
  /** Peers for the info-hash (if the queried node knows any) */
  peers: CompactPeer[]
  /** Closer nodes to query */
  nodes: CompactNodeInfo[]
}

/** Why a lookup stopped. */
export type LookupTermination = 'cached' | 'found' | 'attempts' | 'timeout' | 'frontier'

/**
 * Diagnostic record of one lookup.
 */
export interface LookupStats {
  packet: SignedPacket | null
  /** Nodes queried */
  attempts: number
  /** host:port of every queried node, in query order */
  queried: string[]
  termination: LookupTermination
  elapsedMs: number
}

/**
 * Per-call overrides for a lookup.
 */
export interface LookupOptions {
  maxAttempts?: number
  timeoutMs?: number
}

/**
 * Outcome of one maintenance round.
 */
export interface MaintenanceReport {
  pinged: number
  responsive: number
  removed: number
  discovered: number
}
