import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { KRPCSocket } from '../../src/dht/krpc-socket'
import {
  KRPCErrorCode,
  encodeErrorResponse,
  encodePingQuery,
  encodePingResponse,
} from '../../src/dht/krpc-messages'
import { NODE_ID_BYTES } from '../../src/dht/constants'
import { DHTErrorReply, DHTIsShutdown } from '../../src/errors'
import { captureLogging } from '../helpers/capture-logging'
import { MockSocketFactory, type MockUdpSocket } from './helpers/mock-dht-network'

describe('KRPCSocket', () => {
  let factory: MockSocketFactory
  let krpcSocket: KRPCSocket
  let socket: MockUdpSocket
  let logs: ReturnType<typeof captureLogging>
  const nodeId = new Uint8Array(NODE_ID_BYTES).fill(0x11)

  beforeEach(async () => {
    vi.useFakeTimers()
    logs = captureLogging()
    factory = new MockSocketFactory()
    krpcSocket = new KRPCSocket(logs.host, factory, { timeout: 1000 })
    await krpcSocket.bind()
    if (!factory.lastSocket) throw new Error('socket not created')
    socket = factory.lastSocket
  })

  afterEach(() => {
    krpcSocket.close()
    vi.useRealTimers()
  })

  describe('bind', () => {
    it('creates one UDP socket via the factory', () => {
      expect(factory.created).toBe(1)
      expect(krpcSocket.bound).toBe(true)
    })

    it('throws if already bound', async () => {
      await expect(krpcSocket.bind()).rejects.toThrow('already bound')
    })
  })

  describe('query', () => {
    it('sends the encoded query and resolves with the response', async () => {
      const transactionId = krpcSocket.generateTransactionId()
      const queryData = encodePingQuery(transactionId, nodeId)

      const queryPromise = krpcSocket.query('192.168.1.1', 6881, queryData, transactionId, 'ping')

      expect(socket.sentData).toHaveLength(1)
      expect(socket.sentData[0].addr).toBe('192.168.1.1')
      expect(socket.sentData[0].port).toBe(6881)
      expect(socket.sentData[0].data).toEqual(queryData)

      const responseId = new Uint8Array(20).fill(0x22)
      socket.emitMessage(encodePingResponse(transactionId, responseId), '192.168.1.1', 6881)

      const response = await queryPromise
      expect(response.y).toBe('r')
      expect(response.r.id).toEqual(responseId)
      expect(krpcSocket.pendingCount()).toBe(0)
    })

    it('rejects on timeout', async () => {
      const transactionId = krpcSocket.generateTransactionId()
      const queryPromise = krpcSocket.query(
        '192.168.1.1',
        6881,
        encodePingQuery(transactionId, nodeId),
        transactionId,
        'ping',
      )

      vi.advanceTimersByTime(1000)

      await expect(queryPromise).rejects.toThrow('Query ping to 192.168.1.1:6881 timed out')
    })

    it('rejects with the remote KRPC error', async () => {
      const transactionId = krpcSocket.generateTransactionId()
      const queryPromise = krpcSocket.query(
        '192.168.1.1',
        6881,
        encodePingQuery(transactionId, nodeId),
        transactionId,
        'ping',
      )

      socket.emitMessage(encodeErrorResponse(transactionId, KRPCErrorCode.PROTOCOL, 'Bad request'))

      await expect(queryPromise).rejects.toBeInstanceOf(DHTErrorReply)
    })

    it('rejects with DHTIsShutdown when unbound', async () => {
      const unbound = new KRPCSocket(logs.host, factory)
      const tid = unbound.generateTransactionId()
      await expect(
        unbound.query('127.0.0.1', 6881, encodePingQuery(tid, nodeId), tid, 'ping'),
      ).rejects.toBeInstanceOf(DHTIsShutdown)
    })
  })

  describe('incoming traffic', () => {
    it('drops incoming queries and logs them at debug', () => {
      socket.emitMessage(encodePingQuery(new Uint8Array([0xaa, 0xbb]), nodeId), '10.0.0.1', 12345)

      expect(socket.sentData).toHaveLength(0)
      expect(logs.entries.map((e) => e.message.split('] ')[1])).toEqual([
        'Ignored ping query from 10.0.0.1:12345',
      ])
    })

    it('drops malformed datagrams', () => {
      socket.emitMessage(new Uint8Array([0x00, 0x01, 0x02, 0x03]), '10.0.0.2', 1)
      expect(logs.entries[0].level).toBe('debug')
      expect(logs.entries[0].message).toContain('Dropped malformed datagram from 10.0.0.2:1')
    })

    it('ignores responses with unknown transaction IDs', () => {
      socket.emitMessage(encodePingResponse(new Uint8Array([0xff, 0xfe]), nodeId))
      expect(krpcSocket.pendingCount()).toBe(0)
    })
  })

  describe('close', () => {
    it('fails pending queries and closes the socket', async () => {
      const transactionId = krpcSocket.generateTransactionId()
      const queryPromise = krpcSocket.query(
        '192.168.1.1',
        6881,
        encodePingQuery(transactionId, nodeId),
        transactionId,
        'ping',
      )

      krpcSocket.close()

      await expect(queryPromise).rejects.toBeInstanceOf(DHTIsShutdown)
      expect(krpcSocket.pendingCount()).toBe(0)
      expect(krpcSocket.bound).toBe(false)
      expect(socket.closed).toBe(true)
    })
  })

  it('reports its timeout', () => {
    expect(krpcSocket.getTimeout()).toBe(1000)
  })
})
