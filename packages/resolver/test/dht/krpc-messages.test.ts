import { describe, it, expect } from 'vitest'
import { Bencode, isBencodeDict } from '../../src/utils/bencode'
import { fromString } from '../../src/utils/buffer'
import {
  KRPCErrorCode,
  decodeCompactNode,
  decodeCompactNodes,
  decodeCompactPeer,
  decodeCompactPeers,
  decodeMessage,
  encodeCompactNode,
  encodeCompactNodes,
  encodeCompactPeer,
  encodeErrorResponse,
  encodeFindNodeQuery,
  encodeFindNodeResponse,
  encodeGetPeersQuery,
  encodeGetPeersResponse,
  encodePingQuery,
  encodePingResponse,
  getResponseNodeId,
  getResponseNodes,
  isError,
  isQuery,
  isResponse,
  parseGetPeersResponse,
} from '../../src/dht/krpc-messages'
import { COMPACT_NODE_BYTES, NODE_ID_BYTES } from '../../src/dht/constants'

describe('KRPC Messages', () => {
  const transactionId = new Uint8Array([0xaa, 0xbb])
  const nodeId = new Uint8Array(NODE_ID_BYTES).fill(0x11)
  const targetId = new Uint8Array(NODE_ID_BYTES).fill(0x22)
  const infoHash = new Uint8Array(NODE_ID_BYTES).fill(0x33)
  const token = new Uint8Array([0xde, 0xad, 0xbe, 0xef])

  describe('Encoding Queries', () => {
    it('marks queries read-only and carries the client version', () => {
      const decoded = Bencode.decode(encodePingQuery(transactionId, nodeId))
      if (!isBencodeDict(decoded)) throw new Error('expected a dictionary')

      expect(decoded.ro).toBe(1)
      expect(decoded.v).toEqual(fromString('PK01'))
      expect(decoded.t).toEqual(transactionId)
    })

    it('encodes ping', () => {
      const msg = decodeMessage(encodePingQuery(transactionId, nodeId))
      if (!msg || !isQuery(msg)) throw new Error('expected a query')
      expect(msg.q).toBe('ping')
      expect(msg.a.id).toEqual(nodeId)
    })

    it('encodes find_node with the target', () => {
      const msg = decodeMessage(encodeFindNodeQuery(transactionId, nodeId, targetId))
      if (!msg || !isQuery(msg)) throw new Error('expected a query')
      expect(msg.q).toBe('find_node')
      expect(msg.a.target).toEqual(targetId)
    })

    it('encodes get_peers with the info hash', () => {
      const msg = decodeMessage(encodeGetPeersQuery(transactionId, nodeId, infoHash))
      if (!msg || !isQuery(msg)) throw new Error('expected a query')
      expect(msg.q).toBe('get_peers')
      expect(msg.a.info_hash).toEqual(infoHash)
    })
  })

  describe('Decoding', () => {
    it('decodes responses', () => {
      const msg = decodeMessage(encodePingResponse(transactionId, nodeId))
      if (!msg || !isResponse(msg)) throw new Error('expected a response')
      expect(msg.t).toEqual(transactionId)
      expect(getResponseNodeId(msg)).toEqual(nodeId)
    })

    it('decodes error replies', () => {
      const msg = decodeMessage(
        encodeErrorResponse(transactionId, KRPCErrorCode.PROTOCOL, 'Protocol Error'),
      )
      if (!msg || !isError(msg)) throw new Error('expected an error')
      expect(msg.e).toEqual([203, 'Protocol Error'])
    })

    it.each([
      ['non-bencode bytes', fromString('not bencode')],
      ['a non-dictionary', fromString('i1e')],
      ['a missing transaction id', Bencode.encode({ y: 'r', r: {} })],
      ['an unknown message type', Bencode.encode({ t: 'aa', y: 'x' })],
      ['a query without arguments', Bencode.encode({ t: 'aa', y: 'q', q: 'ping' })],
      ['a response without values', Bencode.encode({ t: 'aa', y: 'r' })],
      ['a short error list', Bencode.encode({ t: 'aa', y: 'e', e: [201] })],
    ])('returns null for %s', (_label, data) => {
      expect(decodeMessage(data)).toBeNull()
    })

    it('ignores a malformed node id', () => {
      const msg = decodeMessage(encodePingResponse(transactionId, new Uint8Array(4)))
      if (!msg || !isResponse(msg)) throw new Error('expected a response')
      expect(getResponseNodeId(msg)).toBeNull()
    })
  })

  describe('Compact encoding', () => {
    it('encodes peers as 4 address bytes and a big-endian port', () => {
      expect(encodeCompactPeer({ host: '10.1.2.3', port: 6881 })).toEqual(
        new Uint8Array([10, 1, 2, 3, 0x1a, 0xe1]),
      )
      expect(decodeCompactPeer(new Uint8Array([10, 1, 2, 3, 0x1a, 0xe1]))).toEqual({
        host: '10.1.2.3',
        port: 6881,
      })
    })

    it('rejects non-IPv4 hosts', () => {
      expect(() => encodeCompactPeer({ host: 'example.com', port: 1 })).toThrow(
        'Invalid IPv4 address',
      )
      expect(() => encodeCompactPeer({ host: '1.2.3.256', port: 1 })).toThrow(
        'Invalid IPv4 address',
      )
    })

    it('drops peers with port 0 or the wrong size', () => {
      expect(decodeCompactPeer(new Uint8Array([1, 2, 3, 4, 0, 0]))).toBeNull()
      expect(
        decodeCompactPeers([
          new Uint8Array([1, 2, 3, 4, 0, 80]),
          new Uint8Array([1, 2, 3, 4, 0]),
          'junk',
        ]),
      ).toEqual([{ host: '1.2.3.4', port: 80 }])
    })

    it('encodes nodes as 26-byte records', () => {
      const node = { id: nodeId, host: '192.168.1.1', port: 6881 }
      const encoded = encodeCompactNode(node)
      expect(encoded).toHaveLength(COMPACT_NODE_BYTES)
      expect(decodeCompactNode(encoded)).toEqual(node)
    })

    it('ignores a trailing partial node record', () => {
      const nodes = [
        { id: nodeId, host: '10.0.0.1', port: 1 },
        { id: targetId, host: '10.0.0.2', port: 2 },
      ]
      const data = new Uint8Array(COMPACT_NODE_BYTES * 2 + 10)
      data.set(encodeCompactNodes(nodes))
      expect(decodeCompactNodes(data)).toEqual(nodes)
    })
  })

  describe('Response helpers', () => {
    it('parses a get_peers reply with peers and nodes', () => {
      const peer = { host: '10.0.0.9', port: 7000 }
      const node = { id: targetId, host: '10.0.0.3', port: 6881 }
      const msg = decodeMessage(
        encodeGetPeersResponse(transactionId, nodeId, token, { peers: [peer], nodes: [node] }),
      )
      if (!msg || !isResponse(msg)) throw new Error('expected a response')

      const result = parseGetPeersResponse(msg)
      expect(result).toEqual({
        id: nodeId,
        peers: [peer],
        nodes: [node],
      })
      // The announce token is not kept by a read-only client
      expect(result).not.toHaveProperty('token')
    })

    it('omits absent peers and nodes', () => {
      const msg = decodeMessage(encodeGetPeersResponse(transactionId, nodeId, token, {}))
      if (!msg || !isResponse(msg)) throw new Error('expected a response')
      expect(msg.r.values).toBeUndefined()
      expect(msg.r.nodes).toBeUndefined()
      expect(parseGetPeersResponse(msg).peers).toEqual([])
    })

    it('reads nodes from find_node replies', () => {
      const node = { id: targetId, host: '10.0.0.4', port: 6881 }
      const msg = decodeMessage(encodeFindNodeResponse(transactionId, nodeId, [node]))
      if (!msg || !isResponse(msg)) throw new Error('expected a response')
      expect(getResponseNodes(msg)).toEqual([node])
    })
  })
})
