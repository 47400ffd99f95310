/**
 * Resource Records
 *
 * Immutable DNS answer records. Type-specific rdata is validated when the
 * record is created, so every ResourceRecord in a Packet is encodable.
 */

import { isIPv4, isIPv6 } from 'net'
import { PacketError } from '../errors'
import { canonicalName } from './name'

export const RECORD_CLASSES = ['IN', 'CS', 'CH', 'HS', 'ANY'] as const
export type RecordClass = (typeof RECORD_CLASSES)[number]

/** Record types whose rdata is a single domain name or address. */
export const STRING_RECORD_TYPES = ['A', 'AAAA', 'CNAME', 'DNAME', 'NS', 'PTR'] as const
export type StringRecordType = (typeof STRING_RECORD_TYPES)[number]

export const RECORD_TYPES = [...STRING_RECORD_TYPES, 'TXT', 'MX', 'SRV'] as const
export type RecordType = (typeof RECORD_TYPES)[number]

export interface MxData {
  preference: number
  exchange: string
}

export interface SrvData {
  priority: number
  weight: number
  port: number
  target: string
}

interface RecordBase {
  /** Lower-cased, no trailing dot */
  readonly name: string
  readonly class: RecordClass
  /** Seconds */
  readonly ttl: number
}

export type ResourceRecord = RecordBase &
  (
    | { readonly type: StringRecordType; readonly data: string }
    | { readonly type: 'TXT'; readonly data: readonly string[] }
    | { readonly type: 'MX'; readonly data: Readonly<MxData> }
    | { readonly type: 'SRV'; readonly data: Readonly<SrvData> }
  )

/**
 * Input for createResourceRecord. Type and class are case-insensitive.
 */
export interface ResourceRecordInit {
  name: string
  type: string
  ttl: number
  class?: string
  data: unknown
}

const MAX_TTL = 0xffffffff
const MAX_CHARACTER_STRING_BYTES = 255

const CLASS_NAMES: ReadonlySet<string> = new Set(RECORD_CLASSES)
const STRING_TYPE_NAMES: ReadonlySet<string> = new Set(STRING_RECORD_TYPES)

function isRecordClass(value: string): value is RecordClass {
  return CLASS_NAMES.has(value)
}

function isStringRecordType(value: string): value is StringRecordType {
  return STRING_TYPE_NAMES.has(value)
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

function readUint16(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > 0xffff) {
    throw new PacketError(`Invalid ${field}: ${String(value)}`)
  }
  return value
}

function readDomain(value: unknown, type: string): string {
  if (typeof value !== 'string') {
    throw new PacketError(`${type} record data must be a domain name`)
  }
  return canonicalName(value)
}

function readAddress(value: unknown, type: 'A' | 'AAAA'): string {
  const valid = typeof value === 'string' && (type === 'A' ? isIPv4(value) : isIPv6(value))
  if (!valid) {
    throw new PacketError(`Invalid ${type === 'A' ? 'IPv4' : 'IPv6'} address: ${String(value)}`)
  }
  return value
}

function readTxt(value: unknown): readonly string[] {
  const items = Array.isArray(value) ? value : [value]
  const strings = items.map((item: unknown) => {
    if (item instanceof Uint8Array) return new TextDecoder().decode(item)
    if (typeof item === 'string') return item
    throw new PacketError('TXT record data must be strings')
  })
  for (const str of strings) {
    if (new TextEncoder().encode(str).length > MAX_CHARACTER_STRING_BYTES) {
      throw new PacketError(`TXT character string exceeds ${MAX_CHARACTER_STRING_BYTES} bytes`)
    }
  }
  return Object.freeze(strings)
}

function readMx(value: unknown): Readonly<MxData> {
  if (!isObject(value)) throw new PacketError('MX record data must be an object')
  return Object.freeze({
    preference: readUint16(value.preference ?? 0, 'MX preference'),
    exchange: readDomain(value.exchange, 'MX'),
  })
}

function readSrv(value: unknown): Readonly<SrvData> {
  if (!isObject(value)) throw new PacketError('SRV record data must be an object')
  return Object.freeze({
    priority: readUint16(value.priority ?? 0, 'SRV priority'),
    weight: readUint16(value.weight ?? 0, 'SRV weight'),
    port: readUint16(value.port, 'SRV port'),
    target: readDomain(value.target, 'SRV'),
  })
}

/**
 * Create a validated, frozen resource record.
 *
 * @throws PacketError on an unsupported type or class, a bad TTL, or rdata
 *   that does not parse for the type
 */
export function createResourceRecord(init: ResourceRecordInit): ResourceRecord {
  const type = init.type.toUpperCase()
  const rclass = (init.class ?? 'IN').toUpperCase()

  if (!isRecordClass(rclass)) {
    throw new PacketError(`Unsupported record class: ${init.class}`)
  }
  if (!Number.isInteger(init.ttl) || init.ttl < 0 || init.ttl > MAX_TTL) {
    throw new PacketError(`Invalid TTL: ${init.ttl}`)
  }

  const base: RecordBase = { name: canonicalName(init.name), class: rclass, ttl: init.ttl }

  if (isStringRecordType(type)) {
    const data =
      type === 'A' || type === 'AAAA' ? readAddress(init.data, type) : readDomain(init.data, type)
    return Object.freeze({ ...base, type, data })
  }
  switch (type) {
    case 'TXT':
      return Object.freeze({ ...base, type, data: readTxt(init.data) })
    case 'MX':
      return Object.freeze({ ...base, type, data: readMx(init.data) })
    case 'SRV':
      return Object.freeze({ ...base, type, data: readSrv(init.data) })
    default:
      throw new PacketError(`Unsupported record type: ${init.type}`)
  }
}

/**
 * Presentation form of the rdata.
 */
export function formatRecordData(rr: ResourceRecord): string {
  switch (rr.type) {
    case 'TXT':
      return rr.data.map((s) => JSON.stringify(s)).join(' ')
    case 'MX':
      return `${rr.data.preference} ${rr.data.exchange}`
    case 'SRV':
      return `${rr.data.priority} ${rr.data.weight} ${rr.data.port} ${rr.data.target}`
    default:
      return rr.data
  }
}

/**
 * One-line zone-file style rendering: `name ttl class type rdata`.
 */
export function formatResourceRecord(rr: ResourceRecord): string {
  return `${rr.name} ${rr.ttl} ${rr.class} ${rr.type} ${formatRecordData(rr)}`
}
