/**
 * Packet Lookup
 *
 * Walks the DHT for one public key. Starting from the bootstrap nodes, each
 * step pops a candidate from the frontier and sends it get_peers for
 * SHA-1(public key). Closer nodes in the reply are pushed onto the frontier;
 * peers in the reply are asked for the signed packet, which must verify and
 * be signed by the target key. The walk stops at the first verified packet,
 * when the frontier runs dry, after maxAttempts queries, or at the deadline.
 *
 * Failures of a single node or peer are logged and never end the walk.
 */

import { sha1 } from '../crypto'
import { errorMessage } from '../errors'
import type { PublicKey } from '../identity'
import { type ILoggingHost, ResolverComponent } from '../logging/logger'
import { SignedPacket } from '../signed-packet'
import { formatNodeAddress, parseNodeAddress } from './node-address'
import { NodeFrontier } from './node-frontier'
import type { PeerPacketFetcher } from './peer-fetcher'
import type {
  CompactNodeInfo,
  CompactPeer,
  GetPeersResult,
  LookupTermination,
  NodeAddress,
} from './types'

/**
 * Options for a packet lookup.
 */
export interface PacketLookupOptions {
  /** Key whose signed packet is wanted */
  target: PublicKey

  /** Initial frontier, as host:port, queried in the given order */
  bootstrap: readonly string[]

  /** Send get_peers to a node; rejects on timeout, error reply or transport failure */
  sendGetPeers: (node: NodeAddress, infoHash: Uint8Array) => Promise<GetPeersResult>

  /** Retrieves candidate packet bytes from a peer */
  peerFetcher: PeerPacketFetcher

  /** Upper bound on nodes queried */
  maxAttempts: number

  /** Wall-clock budget in ms */
  timeoutMs: number

  /** Called for every node that answered */
  onResponse?: (address: string, id: Uint8Array | undefined) => void

  /** Called with the nodes each reply carried */
  onNodes?: (nodes: CompactNodeInfo[]) => void
}

/**
 * Result of a packet lookup.
 */
export interface PacketLookupResult {
  packet: SignedPacket | null
  attempts: number
  queried: string[]
  termination: Exclude<LookupTermination, 'cached'>
}

export class PacketLookup extends ResolverComponent {
  static logName = 'lookup'

  private readonly options: PacketLookupOptions
  private readonly frontier: NodeFrontier
  private readonly infoHash: Uint8Array

  constructor(host: ILoggingHost, options: PacketLookupOptions) {
    super(host)
    this.options = options
    this.targetKey = options.target.toZ32()
    this.frontier = new NodeFrontier(options.bootstrap)
    this.infoHash = sha1(options.target.toBytes())
  }

  async run(): Promise<PacketLookupResult> {
    const { maxAttempts, timeoutMs } = this.options
    const deadline = Date.now() + timeoutMs

    for (;;) {
      const termination = this.stopReason(maxAttempts, deadline)
      if (termination) {
        this.logger.warn(
          `Lookup ended without a packet (${termination}) after ${this.frontier.attempts} attempts`,
        )
        return this.result(null, termination)
      }

      const address = this.frontier.pop()
      if (address === undefined) continue

      const reply = await this.queryNode(address)
      if (!reply) continue

      const packet = await this.fetchFromPeers(reply.peers)
      if (packet) {
        this.logger.info(`Found packet via ${address} after ${this.frontier.attempts} attempts`)
        return this.result(packet, 'found')
      }

      if (reply.nodes.length > 0) {
        const added = this.frontier.push(reply.nodes.map(formatNodeAddress))
        this.options.onNodes?.(reply.nodes)
        this.logger.debug(`${address} returned ${reply.nodes.length} nodes, ${added} new`)
      }
    }
  }

  private stopReason(
    maxAttempts: number,
    deadline: number,
  ): Exclude<LookupTermination, 'cached' | 'found'> | null {
    if (this.frontier.isEmpty) return 'frontier'
    if (this.frontier.attempts >= maxAttempts) return 'attempts'
    if (Date.now() >= deadline) return 'timeout'
    return null
  }

  private async queryNode(address: string): Promise<GetPeersResult | null> {
    try {
      const reply = await this.options.sendGetPeers(parseNodeAddress(address), this.infoHash)
      this.options.onResponse?.(address, reply.id)
      return reply
    } catch (err) {
      this.logger.warn(`get_peers to ${address} failed: ${errorMessage(err)}`)
      return null
    }
  }

  private async fetchFromPeers(peers: CompactPeer[]): Promise<SignedPacket | null> {
    const { target, peerFetcher } = this.options
    for (const peer of peers) {
      const peerAddress = formatNodeAddress(peer)
      try {
        const bytes = await peerFetcher.fetchSignedPacket(peer, target)
        if (!bytes) {
          this.logger.debug(`Peer ${peerAddress} had no packet`)
          continue
        }
        const packet = SignedPacket.fromBytes(bytes)
        if (!packet.publicKey.equals(target)) {
          this.logger.warn(
            `Rejected packet from ${peerAddress}: signed by ${packet.publicKey.toZ32()}`,
          )
          continue
        }
        return packet
      } catch (err) {
        this.logger.warn(`Rejected candidate from ${peerAddress}: ${errorMessage(err)}`)
      }
    }
    return null
  }

  private result(
    packet: SignedPacket | null,
    termination: PacketLookupResult['termination'],
  ): PacketLookupResult {
    return {
      packet,
      attempts: this.frontier.attempts,
      queried: this.frontier.queried(),
      termination,
    }
  }
}
