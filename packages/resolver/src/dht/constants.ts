/**
 * DHT Protocol Constants
 *
 * Based on BEP 5 (DHT Protocol) and BEP 43 (read-only DHT nodes).
 */

/**
 * Node ID size in bytes (160 bits = 20 bytes).
 * Same as infohash size.
 */
export const NODE_ID_BYTES = 20

/**
 * Query timeout in milliseconds.
 * Time to wait for a response before considering the query failed.
 */
export const QUERY_TIMEOUT_MS = 5000

/**
 * Wall-clock budget for one lookup.
 */
export const LOOKUP_TIMEOUT_MS = 30_000

/**
 * Nodes queried per lookup before giving up.
 */
export const MAX_LOOKUP_ATTEMPTS = 100

/**
 * Interval between maintenance rounds (1 minute).
 */
export const MAINTENANCE_INTERVAL_MS = 60_000

/**
 * Known nodes pinged per maintenance round.
 */
export const MAINTENANCE_MAX_PINGS = 16

/**
 * Cap on the known-nodes store.
 */
export const MAX_KNOWN_NODES = 1000

/**
 * Compact peer info size in bytes (4 IP + 2 port).
 */
export const COMPACT_PEER_BYTES = 6

/**
 * Compact node info size in bytes (20 ID + 6 peer).
 */
export const COMPACT_NODE_BYTES = 26

/**
 * Client version string for KRPC messages: "PK" + version 0.1.
 */
export const CLIENT_VERSION = new Uint8Array([0x50, 0x4b, 0x30, 0x31]) // "PK01"

/**
 * Well-known DHT bootstrap nodes.
 * These are operated by major BitTorrent clients.
 */
export const BOOTSTRAP_NODES: readonly string[] = [
  'router.bittorrent.com:6881',
  'router.utorrent.com:6881',
  'dht.transmissionbt.com:6881',
  'dht.libtorrent.org:25401',
]
