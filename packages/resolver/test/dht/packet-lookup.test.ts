import { describe, it, expect } from 'vitest'
import { PacketLookup, type PacketLookupOptions } from '../../src/dht/packet-lookup'
import { formatNodeAddress } from '../../src/dht/node-address'
import { UnsupportedPeerFetcher } from '../../src/dht/peer-fetcher'
import type { GetPeersResult, NodeAddress } from '../../src/dht/types'
import { sha1 } from '../../src/crypto'
import { Packet } from '../../src/dns'
import { DHTQueryTimeout } from '../../src/errors'
import { Keypair } from '../../src/identity'
import { SignedPacket } from '../../src/signed-packet'
import { captureLogging } from '../helpers/capture-logging'
import { MapPeerFetcher, compactNode } from './helpers/mock-dht-network'

const A = '10.0.0.1:6881'
const B = '10.0.0.2:6881'
const C = '10.0.0.3:6881'
const D = '10.0.0.4:6881'
const PEER = { host: '10.0.1.1', port: 7000 }

const keypair = Keypair.fromSecretKey(new Uint8Array(32).fill(5))
const signed = SignedPacket.sign(
  keypair,
  Packet.fromRecords([{ name: keypair.publicKey.toZ32(), type: 'A', ttl: 600, data: '10.9.9.9' }]),
  { timestamp: 1000 },
)

type Reply = Partial<GetPeersResult> | Error

function scripted(replies: Record<string, Reply>) {
  const calls: string[] = []
  const infoHashes: Uint8Array[] = []
  const sendGetPeers = async (node: NodeAddress, infoHash: Uint8Array): Promise<GetPeersResult> => {
    const address = formatNodeAddress(node)
    calls.push(address)
    infoHashes.push(infoHash)
    const reply = replies[address] ?? new DHTQueryTimeout('get_peers', address)
    if (reply instanceof Error) throw reply
    return { peers: [], nodes: [], ...reply }
  }
  return { calls, infoHashes, sendGetPeers }
}

function lookup(overrides: Partial<PacketLookupOptions> & Pick<PacketLookupOptions, 'sendGetPeers'>) {
  const logs = captureLogging()
  const run = new PacketLookup(logs.host, {
    target: keypair.publicKey,
    bootstrap: [A, B],
    peerFetcher: new MapPeerFetcher(new Map([[formatNodeAddress(PEER), signed.toBytes()]])),
    maxAttempts: 100,
    timeoutMs: 30_000,
    ...overrides,
  })
  return { run, logs }
}

describe('PacketLookup', () => {
  it('follows closer nodes depth-first and stops at the first verified packet', async () => {
    const network = scripted({
      [A]: { nodes: [compactNode(C), compactNode(D)] },
      [C]: { peers: [PEER] },
    })
    const responded: string[] = []
    const batches: number[] = []
    const { run } = lookup({
      sendGetPeers: network.sendGetPeers,
      onResponse: (address) => responded.push(address),
      onNodes: (nodes) => batches.push(nodes.length),
    })

    const result = await run.run()

    expect(result.termination).toBe('found')
    expect(result.attempts).toBe(2)
    expect(result.queried).toEqual([A, C])
    expect(result.packet?.equals(signed)).toBe(true)
    expect(network.calls).toEqual([A, C])
    expect(responded).toEqual([A, C])
    expect(batches).toEqual([2])
  })

  it('queries the SHA-1 of the public key', async () => {
    const network = scripted({ [A]: { peers: [PEER] } })
    await lookup({ sendGetPeers: network.sendGetPeers }).run.run()
    expect(network.infoHashes[0]).toEqual(sha1(keypair.publicKey.toBytes()))
  })

  it('exhausts the frontier when every node fails', async () => {
    const network = scripted({})
    const { run, logs } = lookup({ sendGetPeers: network.sendGetPeers, maxAttempts: 10 })

    const result = await run.run()

    expect(result).toEqual({ packet: null, attempts: 2, queried: [A, B], termination: 'frontier' })
    const warnings = logs.entries.filter((e) => e.level === 'warn').map((e) => e.message)
    expect(warnings).toHaveLength(3)
    expect(warnings[0]).toContain(`get_peers to ${A} failed: Query get_peers to ${A} timed out`)
    expect(warnings[2]).toContain('Lookup ended without a packet (frontier) after 2 attempts')
  })

  it('stops after maxAttempts', async () => {
    const network = scripted({ [A]: { nodes: [compactNode(C)] } })
    const result = await lookup({ sendGetPeers: network.sendGetPeers, maxAttempts: 1 }).run.run()
    expect(result.termination).toBe('attempts')
    expect(result.attempts).toBe(1)
    expect(network.calls).toEqual([A])
  })

  it('stops at the deadline', async () => {
    const network = scripted({})
    const result = await lookup({ sendGetPeers: network.sendGetPeers, timeoutMs: 0 }).run.run()
    expect(result.termination).toBe('timeout')
    expect(result.attempts).toBe(0)
    expect(network.calls).toEqual([])
  })

  it('rejects packets signed by another key and keeps walking', async () => {
    const other = SignedPacket.sign(
      Keypair.fromSecretKey(new Uint8Array(32).fill(6)),
      Packet.reply(),
      { timestamp: 1000 },
    )
    const network = scripted({ [A]: { peers: [PEER] }, [B]: { peers: [{ host: '10.0.1.2', port: 7000 }] } })
    const fetcher = new MapPeerFetcher(
      new Map([
        [formatNodeAddress(PEER), other.toBytes()],
        ['10.0.1.2:7000', signed.toBytes()],
      ]),
    )
    const { run, logs } = lookup({ sendGetPeers: network.sendGetPeers, peerFetcher: fetcher })

    const result = await run.run()

    expect(result.termination).toBe('found')
    expect(result.queried).toEqual([A, B])
    expect(fetcher.calls).toEqual(['10.0.1.1:7000', '10.0.1.2:7000'])
    expect(logs.entries.some((e) => e.message.includes('Rejected packet from 10.0.1.1:7000'))).toBe(
      true,
    )
  })

  it('rejects tampered packets', async () => {
    const tampered = signed.toBytes()
    tampered[tampered.length - 1] ^= 0xff
    const network = scripted({ [A]: { peers: [PEER] } })
    const fetcher = new MapPeerFetcher(new Map([[formatNodeAddress(PEER), tampered]]))

    const result = await lookup({ sendGetPeers: network.sendGetPeers, peerFetcher: fetcher }).run.run()

    expect(result.packet).toBeNull()
    expect(result.termination).toBe('frontier')
  })

  it('treats an unavailable peer protocol as a peer failure', async () => {
    const network = scripted({ [A]: { peers: [PEER] } })
    const { run, logs } = lookup({
      sendGetPeers: network.sendGetPeers,
      peerFetcher: new UnsupportedPeerFetcher(),
    })

    const result = await run.run()

    expect(result.packet).toBeNull()
    expect(result.attempts).toBe(2)
    expect(
      logs.entries.some((e) => e.message.includes('No peer fetch protocol available')),
    ).toBe(true)
  })

  it('does not revisit nodes', async () => {
    const network = scripted({
      [A]: { nodes: [compactNode(B), compactNode(C)] },
      [C]: { nodes: [compactNode(A), compactNode(B)] },
    })
    const result = await lookup({ sendGetPeers: network.sendGetPeers }).run.run()
    expect(result.queried).toEqual([A, C, B])
    expect(result.termination).toBe('frontier')
  })
})
