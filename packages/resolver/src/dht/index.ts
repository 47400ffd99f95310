export { DHTClient } from './dht-client'
export type { DHTClientOptions, DHTClientEvents } from './dht-client'
export { PacketLookup } from './packet-lookup'
export type { PacketLookupOptions, PacketLookupResult } from './packet-lookup'
export { PacketCache } from './packet-cache'
export type { CacheEntry } from './packet-cache'
export { KnownNodes } from './known-nodes'
export type { KnownNodesOptions } from './known-nodes'
export { NodeFrontier } from './node-frontier'
export { UnsupportedPeerFetcher } from './peer-fetcher'
export type { PeerPacketFetcher } from './peer-fetcher'
export { KRPCSocket } from './krpc-socket'
export type { KRPCSocketOptions } from './krpc-socket'
export { TransactionManager } from './transaction-manager'
export { parseNodeAddress, formatNodeAddress, normalizeNodeAddress } from './node-address'
export * from './constants'
export type {
  CompactNodeInfo,
  CompactPeer,
  GetPeersResult,
  KnownNode,
  LookupOptions,
  LookupStats,
  LookupTermination,
  MaintenanceReport,
  NodeAddress,
} from './types'
