/**
 * DHT Client - Main Coordinator
 *
 * Resolves public keys to signed packets over the Mainline DHT as a
 * read-only node. Owns the KRPC socket; shares the packet cache and the
 * known-nodes store with anyone who passes them in.
 *
 * Reference: BEP 5 - DHT Protocol, BEP 43 - Read-only DHT Nodes
 */

import { resolveConfig, validateNumber, type ConfigEnv, type PkarrConfig } from '../config'
import { randomBytes } from '../crypto'
import { DHTError, DHTIsShutdown, errorMessage } from '../errors'
import { PublicKey } from '../identity'
import type { ISocketFactory } from '../interfaces/socket'
import { type ILoggingHost, ResolverComponent, createLoggingHost } from '../logging/logger'
import type { SignedPacket } from '../signed-packet'
import { NODE_ID_BYTES } from './constants'
import { KRPCSocket } from './krpc-socket'
import {
  type KRPCMethod,
  type KRPCResponse,
  encodeFindNodeQuery,
  encodeGetPeersQuery,
  encodePingQuery,
  getResponseNodeId,
  getResponseNodes,
  parseGetPeersResponse,
} from './krpc-messages'
import { KnownNodes } from './known-nodes'
import { formatNodeAddress, normalizeNodeAddress, parseNodeAddress } from './node-address'
import { PacketCache } from './packet-cache'
import { PacketLookup } from './packet-lookup'
import { type PeerPacketFetcher, UnsupportedPeerFetcher } from './peer-fetcher'
import type {
  CompactNodeInfo,
  GetPeersResult,
  LookupOptions,
  LookupStats,
  MaintenanceReport,
  NodeAddress,
} from './types'

/**
 * Options for DHTClient.
 */
export interface DHTClientOptions {
  /** Socket factory for creating UDP sockets */
  socketFactory: ISocketFactory
  /** Explicit config values; win over the environment */
  config?: Partial<PkarrConfig>
  /** Environment to read PKARR_* variables from (default: process.env) */
  env?: ConfigEnv
  /** Shorthand for config.bootstrapNodes */
  bootstrapNodes?: string[]
  /** Our node ID (20 bytes). If not provided, one will be generated. */
  nodeId?: Uint8Array
  /** Retrieves signed packets from peers (default: UnsupportedPeerFetcher) */
  peerFetcher?: PeerPacketFetcher
  /** Shared packet cache */
  cache?: PacketCache
  /** Shared known-nodes store */
  knownNodes?: KnownNodes
  /** Logging host (default: console host at config.logLevel) */
  logging?: ILoggingHost
  /** Do not schedule background maintenance on start() */
  skipMaintenance?: boolean
  /** Bind address (default: '0.0.0.0') */
  bindAddr?: string
  /** Bind port (default: 0 for random) */
  bindPort?: number
}

/**
 * Events emitted by DHTClient.
 */
export interface DHTClientEvents {
  /** Emitted when a lookup caches a packet from the network */
  resolved: (key: string, packet: SignedPacket) => void
  /** Emitted after each maintenance round */
  maintenance: (report: MaintenanceReport) => void
}

/**
 * Read-only DHT client for signed packet lookups.
 */
export class DHTClient extends ResolverComponent<DHTClientEvents> {
  static logName = 'dht-client'

  /** Our 20-byte node ID */
  public readonly nodeId: Uint8Array

  /** Effective configuration */
  public readonly config: Readonly<PkarrConfig>

  public readonly cache: PacketCache
  public readonly knownNodes: KnownNodes

  /** KRPC socket for UDP communication */
  private readonly krpcSocket: KRPCSocket

  private readonly peerFetcher: PeerPacketFetcher
  private readonly bootstrap: readonly string[]
  private readonly skipMaintenance: boolean

  private maintenanceTimer: ReturnType<typeof setInterval> | null = null
  private maintenanceRound: Promise<MaintenanceReport> | null = null

  constructor(options: DHTClientOptions) {
    const config = resolveConfig(
      options.bootstrapNodes
        ? { ...options.config, bootstrapNodes: options.bootstrapNodes }
        : options.config,
      options.env,
    )
    super(options.logging ?? createLoggingHost({ level: config.logLevel }))
    this.config = config

    // Generate or use provided node ID
    this.nodeId = options.nodeId ?? randomBytes(NODE_ID_BYTES)
    if (this.nodeId.length !== NODE_ID_BYTES) {
      throw new DHTError(`Node ID must be ${NODE_ID_BYTES} bytes`)
    }

    this.bootstrap = config.bootstrapNodes.map(normalizeNodeAddress)
    this.cache = options.cache ?? new PacketCache()
    this.knownNodes = options.knownNodes ?? new KnownNodes({ maxNodes: config.maxKnownNodes })
    for (const address of this.bootstrap) {
      this.knownNodes.addBootstrap(address)
    }

    this.peerFetcher = options.peerFetcher ?? new UnsupportedPeerFetcher()
    this.skipMaintenance = options.skipMaintenance ?? false
    this.krpcSocket = new KRPCSocket(this.host, options.socketFactory, {
      timeout: config.queryTimeoutMs,
      bindAddr: options.bindAddr,
      bindPort: options.bindPort,
    })
  }

  /**
   * Check if the client is started.
   */
  get ready(): boolean {
    return this.krpcSocket.bound
  }

  /**
   * Start the client (bind socket, schedule maintenance).
   */
  async start(): Promise<void> {
    if (this.ready) {
      throw new DHTError('DHTClient already started')
    }

    await this.krpcSocket.bind()

    if (!this.skipMaintenance) {
      this.maintenanceTimer = setInterval(() => {
        this.runMaintenance().catch((err) => {
          this.logger.error(`Maintenance round failed: ${errorMessage(err)}`)
        })
      }, this.config.maintenanceIntervalMs)
      // Background upkeep must not keep the process alive
      this.maintenanceTimer.unref?.()
    }
    this.logger.info(`Started with ${this.bootstrap.length} bootstrap nodes`)
  }

  /**
   * Stop the client. Pending queries fail with DHTIsShutdown.
   */
  stop(): void {
    if (this.maintenanceTimer) {
      clearInterval(this.maintenanceTimer)
      this.maintenanceTimer = null
    }
    this.krpcSocket.close()
  }

  // ==========================================================================
  // Lookups
  // ==========================================================================

  /**
   * Resolve a public key to its latest signed packet.
   *
   * @param target - public key or its z-base-32 text
   * @returns the packet, or null when none was found
   * @throws IdentityError for invalid key text, before any network traffic
   * @throws ConfigError for an invalid maxAttempts or timeoutMs override
   * @throws DHTIsShutdown on a cache miss while the client is not started
   */
  async lookup(target: PublicKey | string, options: LookupOptions = {}): Promise<SignedPacket | null> {
    const stats = await this.lookupWithStats(target, options)
    return stats.packet
  }

  /**
   * Like lookup, with diagnostics about how the lookup went.
   */
  async lookupWithStats(target: PublicKey | string, options: LookupOptions = {}): Promise<LookupStats> {
    const publicKey = typeof target === 'string' ? PublicKey.fromZ32(target) : target
    const key = publicKey.toZ32()
    const maxAttempts =
      options.maxAttempts === undefined
        ? this.config.maxAttempts
        : validateNumber('maxAttempts', options.maxAttempts)
    const timeoutMs =
      options.timeoutMs === undefined
        ? this.config.lookupTimeoutMs
        : validateNumber('lookupTimeoutMs', options.timeoutMs)
    const startedAt = Date.now()

    const cached = this.cache.get(key, startedAt)
    if (cached) {
      this.logger.debug(`Cache hit for ${key}`)
      return { packet: cached, attempts: 0, queried: [], termination: 'cached', elapsedMs: 0 }
    }

    if (!this.ready) {
      throw new DHTIsShutdown()
    }

    const run = new PacketLookup(this.host, {
      target: publicKey,
      bootstrap: this.bootstrap,
      sendGetPeers: (node, infoHash) => this.getPeers(node, infoHash),
      peerFetcher: this.peerFetcher,
      maxAttempts,
      timeoutMs,
      onResponse: (address, id) => this.knownNodes.markSeen(address, id),
      onNodes: (nodes) => this.mergeNodes(nodes),
    })
    const result = await run.run()

    let packet = result.packet
    if (packet) {
      const expiresAt = Date.now() + packet.ttl(this.config.minTtl, this.config.maxTtl) * 1000
      packet = this.cache.put(packet, expiresAt)
      this.emit('resolved', key, packet)
    }

    return { ...result, packet, elapsedMs: Date.now() - startedAt }
  }

  // ==========================================================================
  // Outgoing Queries
  // ==========================================================================

  /**
   * Send a ping query to a node.
   *
   * @returns true if node responded, false on timeout/error
   */
  async ping(node: NodeAddress | string): Promise<boolean> {
    try {
      const address = typeof node === 'string' ? parseNodeAddress(node) : node
      const response = await this.query(address, 'ping', (tid) => encodePingQuery(tid, this.nodeId))
      this.knownNodes.markSeen(formatNodeAddress(address), getResponseNodeId(response) ?? undefined)
      return true
    } catch (err) {
      this.logger.debug(`ping ${typeof node === 'string' ? node : formatNodeAddress(node)} failed: ${errorMessage(err)}`)
      return false
    }
  }

  /**
   * Send a find_node query to discover nodes close to a target.
   *
   * @returns nodes from the reply; empty on timeout/error
   */
  async findNode(node: NodeAddress | string, target: Uint8Array): Promise<CompactNodeInfo[]> {
    if (target.length !== NODE_ID_BYTES) {
      throw new DHTError(`Target must be ${NODE_ID_BYTES} bytes`)
    }

    try {
      const address = typeof node === 'string' ? parseNodeAddress(node) : node
      const response = await this.query(address, 'find_node', (tid) =>
        encodeFindNodeQuery(tid, this.nodeId, target),
      )
      this.knownNodes.markSeen(formatNodeAddress(address), getResponseNodeId(response) ?? undefined)
      return getResponseNodes(response)
    } catch (err) {
      this.logger.debug(`find_node failed: ${errorMessage(err)}`)
      return []
    }
  }

  /**
   * Send a get_peers query.
   *
   * @throws DHTQueryTimeout, DHTErrorReply or DHTIsShutdown
   */
  async getPeers(node: NodeAddress, infoHash: Uint8Array): Promise<GetPeersResult> {
    if (infoHash.length !== NODE_ID_BYTES) {
      throw new DHTError(`Info hash must be ${NODE_ID_BYTES} bytes`)
    }

    const response = await this.query(node, 'get_peers', (tid) =>
      encodeGetPeersQuery(tid, this.nodeId, infoHash),
    )
    return parseGetPeersResponse(response)
  }

  private query(
    node: NodeAddress,
    method: KRPCMethod,
    encode: (transactionId: Uint8Array) => Uint8Array,
  ): Promise<KRPCResponse> {
    const transactionId = this.krpcSocket.generateTransactionId()
    return this.krpcSocket.query(node.host, node.port, encode(transactionId), transactionId, method)
  }

  // ==========================================================================
  // Maintenance
  // ==========================================================================

  /**
   * Check known nodes and learn new ones.
   *
   * Pings up to maintenanceMaxPings of the least recently seen nodes one at
   * a time, drops non-bootstrap nodes that do not answer, then asks one live
   * node for the nodes closest to a random ID. Concurrent calls share the
   * round already in progress.
   */
  runMaintenance(): Promise<MaintenanceReport> {
    if (!this.maintenanceRound) {
      this.maintenanceRound = this.maintain().finally(() => {
        this.maintenanceRound = null
      })
    }
    return this.maintenanceRound
  }

  private async maintain(): Promise<MaintenanceReport> {
    const report: MaintenanceReport = { pinged: 0, responsive: 0, removed: 0, discovered: 0 }
    const live: string[] = []

    for (const address of this.knownNodes.stalest(this.config.maintenanceMaxPings)) {
      if (!this.ready) break
      report.pinged++
      if (await this.ping(address)) {
        live.push(address)
      } else if (this.ready && this.knownNodes.remove(address)) {
        report.removed++
      }
    }
    report.responsive = live.length

    if (live.length > 0 && this.ready) {
      const before = this.knownNodes.size()
      this.mergeNodes(await this.findNode(live[0], randomBytes(NODE_ID_BYTES)))
      report.discovered = Math.max(0, this.knownNodes.size() - before)
    }

    this.logger.info(
      `Maintenance: pinged ${report.pinged}, ${report.responsive} alive, ${report.removed} removed, ${report.discovered} discovered`,
    )
    this.emit('maintenance', report)
    return report
  }

  private mergeNodes(nodes: CompactNodeInfo[]): void {
    for (const node of nodes) {
      this.knownNodes.add(formatNodeAddress(node), node.id)
    }
  }
}
