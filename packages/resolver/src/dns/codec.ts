/**
 * DNS wire codec
 *
 * Converts between Packet and DNS wire format using dns-packet. Only the
 * header and the answer section travel; answers of a type the model does
 * not carry are skipped on decode.
 */

import dnsPacket from 'dns-packet'
import { PacketError, errorMessage } from '../errors'
import { Packet, headerFromFlags } from './packet'
import {
  RECORD_CLASSES,
  RECORD_TYPES,
  type ResourceRecord,
  createResourceRecord,
} from './resource-record'

function toAnswer(rr: ResourceRecord): dnsPacket.Answer {
  const base = { name: rr.name, class: rr.class, ttl: rr.ttl }
  switch (rr.type) {
    case 'TXT':
      return { ...base, type: 'TXT', data: [...rr.data] }
    case 'MX':
      return { ...base, type: 'MX', data: { ...rr.data } }
    case 'SRV':
      return { ...base, type: 'SRV', data: { ...rr.data } }
    default:
      return { ...base, type: rr.type, data: rr.data }
  }
}

/**
 * Encode a packet to DNS wire format.
 */
export function encodePacket(packet: Packet): Uint8Array {
  const encoded = dnsPacket.encode({
    type: packet.header.qr ? 'response' : 'query',
    id: packet.header.id,
    flags: packet.flags(),
    answers: packet.answers.map(toAnswer),
  })
  return new Uint8Array(encoded)
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

function isListed(list: readonly string[], value: unknown): value is string {
  return typeof value === 'string' && list.includes(value)
}

function fromAnswer(answer: unknown): ResourceRecord | null {
  if (!isObject(answer)) return null
  const { name, type, ttl, data } = answer
  const rclass = answer.class ?? 'IN'
  if (!isListed(RECORD_TYPES, type) || !isListed(RECORD_CLASSES, rclass)) return null
  if (typeof name !== 'string' || typeof ttl !== 'number') {
    throw new PacketError(`Malformed ${type} answer`)
  }
  return createResourceRecord({ name, type, ttl, class: rclass, data })
}

/**
 * Decode DNS wire bytes. Zero bytes decode to an empty packet.
 *
 * @throws PacketError when the bytes are not a valid DNS message or an
 *   answer's rdata is invalid for its type
 */
export function decodePacket(bytes: Uint8Array): Packet {
  if (bytes.length === 0) {
    return new Packet()
  }

  let decoded: dnsPacket.DecodedPacket
  try {
    decoded = dnsPacket.decode(Buffer.from(bytes))
  } catch (err) {
    throw new PacketError(`Malformed DNS packet: ${errorMessage(err)}`)
  }

  const answers: ResourceRecord[] = []
  for (const answer of decoded.answers ?? []) {
    const rr = fromAnswer(answer)
    if (rr) answers.push(rr)
  }

  const header = headerFromFlags(decoded.id ?? 0, decoded.type === 'response', decoded.flags ?? 0)
  return new Packet(header, answers)
}
