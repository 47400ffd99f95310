/**
 * KRPC Message Encoding/Decoding
 *
 * KRPC is a simple RPC mechanism using bencoded dictionaries over UDP.
 * Reference: BEP 5 - KRPC Protocol section
 *
 * Every outgoing query carries `ro: 1` (BEP 43): this client never answers
 * queries, so remote nodes should not add it to their routing tables.
 */

import {
  Bencode,
  type BencodeDict,
  type BencodeInput,
  type BencodeValue,
  isBencodeDict,
} from '../utils/bencode'
import { toString } from '../utils/buffer'
import type { CompactPeer, CompactNodeInfo, GetPeersResult } from './types'
import { NODE_ID_BYTES, COMPACT_PEER_BYTES, COMPACT_NODE_BYTES, CLIENT_VERSION } from './constants'

// ============================================================================
// Message Types
// ============================================================================

/**
 * KRPC Query message (y = 'q')
 */
export interface KRPCQuery {
  /** Transaction ID (2 bytes typically) */
  t: Uint8Array
  /** Message type: 'q' for query */
  y: 'q'
  /** Query method name */
  q: string
  /** Query arguments */
  a: BencodeDict
  /** Client version (optional) */
  v?: Uint8Array
}

/**
 * KRPC Response message (y = 'r')
 */
export interface KRPCResponse {
  /** Transaction ID */
  t: Uint8Array
  /** Message type: 'r' for response */
  y: 'r'
  /** Response values */
  r: BencodeDict
  /** Client version (optional) */
  v?: Uint8Array
}

/**
 * KRPC Error message (y = 'e')
 */
export interface KRPCError {
  /** Transaction ID */
  t: Uint8Array
  /** Message type: 'e' for error */
  y: 'e'
  /** Error: [code, message] */
  e: [number, string]
  /** Client version (optional) */
  v?: Uint8Array
}

/** Union of all KRPC message types */
export type KRPCMessage = KRPCQuery | KRPCResponse | KRPCError

/** Query methods this client sends. */
export type KRPCMethod = 'ping' | 'find_node' | 'get_peers'

/**
 * KRPC Error codes (from BEP 5)
 */
export const KRPCErrorCode = {
  GENERIC: 201,
  SERVER: 202,
  PROTOCOL: 203, // Malformed packet, invalid arguments, or bad token
  METHOD_UNKNOWN: 204,
} as const

// ============================================================================
// Encoding Functions
// ============================================================================

function encodeQuery(
  transactionId: Uint8Array,
  method: KRPCMethod,
  args: { [key: string]: BencodeInput },
): Uint8Array {
  return Bencode.encode({
    t: transactionId,
    y: 'q',
    q: method,
    a: args,
    ro: 1,
    v: CLIENT_VERSION,
  })
}

/**
 * Encode a ping query.
 *
 * @param transactionId - 2-byte transaction ID
 * @param nodeId - Our 20-byte node ID
 * @returns Bencoded message bytes
 */
export function encodePingQuery(transactionId: Uint8Array, nodeId: Uint8Array): Uint8Array {
  return encodeQuery(transactionId, 'ping', { id: nodeId })
}

/**
 * Encode a find_node query.
 *
 * @param transactionId - 2-byte transaction ID
 * @param nodeId - Our 20-byte node ID
 * @param target - 20-byte target node ID to find
 * @returns Bencoded message bytes
 */
export function encodeFindNodeQuery(
  transactionId: Uint8Array,
  nodeId: Uint8Array,
  target: Uint8Array,
): Uint8Array {
  return encodeQuery(transactionId, 'find_node', { id: nodeId, target })
}

/**
 * Encode a get_peers query.
 *
 * @param transactionId - 2-byte transaction ID
 * @param nodeId - Our 20-byte node ID
 * @param infoHash - 20-byte info-hash (SHA-1 of the target public key)
 * @returns Bencoded message bytes
 */
export function encodeGetPeersQuery(
  transactionId: Uint8Array,
  nodeId: Uint8Array,
  infoHash: Uint8Array,
): Uint8Array {
  return encodeQuery(transactionId, 'get_peers', { id: nodeId, info_hash: infoHash })
}

/**
 * Encode a ping response.
 */
export function encodePingResponse(transactionId: Uint8Array, nodeId: Uint8Array): Uint8Array {
  return Bencode.encode({
    t: transactionId,
    y: 'r',
    r: {
      id: nodeId,
    },
  })
}

/**
 * Encode a find_node response.
 */
export function encodeFindNodeResponse(
  transactionId: Uint8Array,
  nodeId: Uint8Array,
  nodes: CompactNodeInfo[],
): Uint8Array {
  return Bencode.encode({
    t: transactionId,
    y: 'r',
    r: {
      id: nodeId,
      nodes: encodeCompactNodes(nodes),
    },
  })
}

/**
 * Encode a get_peers response carrying peers, closer nodes, or both.
 */
export function encodeGetPeersResponse(
  transactionId: Uint8Array,
  nodeId: Uint8Array,
  token: Uint8Array,
  result: { peers?: CompactPeer[]; nodes?: CompactNodeInfo[] },
): Uint8Array {
  return Bencode.encode({
    t: transactionId,
    y: 'r',
    r: {
      id: nodeId,
      token,
      values: result.peers?.map((p) => encodeCompactPeer(p)),
      nodes: result.nodes ? encodeCompactNodes(result.nodes) : undefined,
    },
  })
}

/**
 * Encode an error response.
 *
 * @param transactionId - Transaction ID from the query
 * @param code - Error code (201-204)
 * @param message - Error message
 * @returns Bencoded message bytes
 */
export function encodeErrorResponse(
  transactionId: Uint8Array,
  code: number,
  message: string,
): Uint8Array {
  return Bencode.encode({
    t: transactionId,
    y: 'e',
    e: [code, message],
  })
}

// ============================================================================
// Decoding Functions
// ============================================================================

/**
 * Decode a KRPC message from bytes.
 *
 * @param data - Raw UDP packet data
 * @returns Decoded message or null if invalid
 */
export function decodeMessage(data: Uint8Array): KRPCMessage | null {
  let decoded: BencodeValue
  try {
    decoded = Bencode.decode(data)
  } catch {
    // Not bencode - not a KRPC message
    return null
  }
  if (!isBencodeDict(decoded)) return null

  // Extract common fields
  const t = decoded.t
  if (!(t instanceof Uint8Array)) return null

  const y = decoded.y
  if (!(y instanceof Uint8Array) || y.length !== 1) return null
  const messageType = String.fromCharCode(y[0])

  // Optional version
  const v = decoded.v instanceof Uint8Array ? decoded.v : undefined

  if (messageType === 'q') {
    const q = decoded.q
    if (!(q instanceof Uint8Array)) return null

    const a = decoded.a
    if (!isBencodeDict(a)) return null

    return { t, y: 'q', q: toString(q), a, v }
  } else if (messageType === 'r') {
    const r = decoded.r
    if (!isBencodeDict(r)) return null

    return { t, y: 'r', r, v }
  } else if (messageType === 'e') {
    const e = decoded.e
    if (!Array.isArray(e) || e.length < 2) return null

    const code = typeof e[0] === 'number' ? e[0] : 0
    const message = e[1] instanceof Uint8Array ? toString(e[1]) : String(e[1])

    return { t, y: 'e', e: [code, message], v }
  }

  return null
}

/**
 * Check if a message is a query.
 */
export function isQuery(msg: KRPCMessage): msg is KRPCQuery {
  return msg.y === 'q'
}

/**
 * Check if a message is a response.
 */
export function isResponse(msg: KRPCMessage): msg is KRPCResponse {
  return msg.y === 'r'
}

/**
 * Check if a message is an error.
 */
export function isError(msg: KRPCMessage): msg is KRPCError {
  return msg.y === 'e'
}

// ============================================================================
// Compact Encoding/Decoding
// ============================================================================

/**
 * Encode a peer to compact format (6 bytes: 4 IP + 2 port).
 *
 * @param peer - Peer with host (IPv4) and port
 * @returns 6-byte compact representation
 */
export function encodeCompactPeer(peer: CompactPeer): Uint8Array {
  const result = new Uint8Array(COMPACT_PEER_BYTES)
  const parts = peer.host.split('.')
  if (parts.length !== 4 || !parts.every((p) => /^\d{1,3}$/.test(p) && Number(p) <= 255)) {
    throw new Error(`Invalid IPv4 address: ${peer.host}`)
  }

  for (let i = 0; i < 4; i++) {
    result[i] = parseInt(parts[i], 10)
  }
  // Port in network byte order (big-endian)
  result[4] = (peer.port >> 8) & 0xff
  result[5] = peer.port & 0xff

  return result
}

/**
 * Decode compact peer info (6 bytes) to peer object.
 *
 * @param data - 6-byte compact peer info
 * @param offset - Offset into data (default 0)
 * @returns Decoded peer or null if invalid
 */
export function decodeCompactPeer(data: Uint8Array, offset: number = 0): CompactPeer | null {
  if (data.length < offset + COMPACT_PEER_BYTES) return null

  const host = `${data[offset]}.${data[offset + 1]}.${data[offset + 2]}.${data[offset + 3]}`
  const port = (data[offset + 4] << 8) | data[offset + 5]

  // Validate
  if (port === 0) return null

  return { host, port }
}

/**
 * Decode multiple compact peers from a values list.
 *
 * @param values - Array of 6-byte Uint8Arrays (compact peer info)
 * @returns Array of decoded peers
 */
export function decodeCompactPeers(values: readonly unknown[]): CompactPeer[] {
  const peers: CompactPeer[] = []

  for (const value of values) {
    if (value instanceof Uint8Array && value.length === COMPACT_PEER_BYTES) {
      const peer = decodeCompactPeer(value)
      if (peer) peers.push(peer)
    }
  }

  return peers
}

/**
 * Encode a node to compact format (26 bytes: 20 ID + 6 peer).
 */
export function encodeCompactNode(node: CompactNodeInfo): Uint8Array {
  const result = new Uint8Array(COMPACT_NODE_BYTES)

  // Copy 20-byte node ID
  result.set(node.id.slice(0, NODE_ID_BYTES), 0)

  // Encode peer info
  const peerInfo = encodeCompactPeer({ host: node.host, port: node.port })
  result.set(peerInfo, NODE_ID_BYTES)

  return result
}

/**
 * Encode multiple nodes to compact format.
 */
export function encodeCompactNodes(nodes: CompactNodeInfo[]): Uint8Array {
  const result = new Uint8Array(nodes.length * COMPACT_NODE_BYTES)

  for (let i = 0; i < nodes.length; i++) {
    const compact = encodeCompactNode(nodes[i])
    result.set(compact, i * COMPACT_NODE_BYTES)
  }

  return result
}

/**
 * Decode compact node info (26 bytes) to node object.
 *
 * @param data - Uint8Array containing compact node info
 * @param offset - Offset into data (default 0)
 * @returns Decoded node or null if invalid
 */
export function decodeCompactNode(data: Uint8Array, offset: number = 0): CompactNodeInfo | null {
  if (data.length < offset + COMPACT_NODE_BYTES) return null

  const id = data.slice(offset, offset + NODE_ID_BYTES)
  const peer = decodeCompactPeer(data, offset + NODE_ID_BYTES)

  if (!peer) return null

  return {
    id,
    host: peer.host,
    port: peer.port,
  }
}

/**
 * Decode multiple compact nodes from a nodes string.
 * A trailing partial record is ignored.
 *
 * @param data - Concatenated compact node info (multiple of 26 bytes)
 * @returns Array of decoded nodes
 */
export function decodeCompactNodes(data: Uint8Array): CompactNodeInfo[] {
  const nodes: CompactNodeInfo[] = []

  for (let offset = 0; offset + COMPACT_NODE_BYTES <= data.length; offset += COMPACT_NODE_BYTES) {
    const node = decodeCompactNode(data, offset)
    if (node) nodes.push(node)
  }

  return nodes
}

// ============================================================================
// Response Parsing Helpers
// ============================================================================

/**
 * Extract node ID from a response.
 */
export function getResponseNodeId(response: KRPCResponse): Uint8Array | null {
  const id = response.r.id
  if (id instanceof Uint8Array && id.length === NODE_ID_BYTES) {
    return id
  }
  return null
}

/**
 * Extract nodes from a find_node or get_peers response.
 */
export function getResponseNodes(response: KRPCResponse): CompactNodeInfo[] {
  const nodes = response.r.nodes
  if (nodes instanceof Uint8Array) {
    return decodeCompactNodes(nodes)
  }
  return []
}

/**
 * Extract peers from a get_peers response.
 */
export function getResponsePeers(response: KRPCResponse): CompactPeer[] {
  const values = response.r.values
  if (Array.isArray(values)) {
    return decodeCompactPeers(values)
  }
  return []
}

/**
 * Interpret a get_peers response.
 */
export function parseGetPeersResponse(response: KRPCResponse): GetPeersResult {
  return {
    id: getResponseNodeId(response) ?? undefined,
    peers: getResponsePeers(response),
    nodes: getResponseNodes(response),
  }
}
