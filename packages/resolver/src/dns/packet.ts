/**
 * DNS Packet
 *
 * Header plus the ordered answer section. Other sections are not carried.
 */

import { PacketError } from '../errors'
import { type ResourceRecord, type ResourceRecordInit, createResourceRecord } from './resource-record'

export interface PacketHeader {
  /** 16-bit message id */
  id: number
  /** Response flag */
  qr: boolean
  opcode: number
  /** Authoritative answer */
  aa: boolean
  /** Truncated */
  tc: boolean
  /** Recursion desired */
  rd: boolean
  /** Recursion available */
  ra: boolean
  /** Reserved 3 bits */
  z: number
  rcode: number
}

const EMPTY_HEADER: Readonly<PacketHeader> = Object.freeze({
  id: 0,
  qr: false,
  opcode: 0,
  aa: false,
  tc: false,
  rd: false,
  ra: false,
  z: 0,
  rcode: 0,
})

function checkField(name: string, value: number, max: number): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new PacketError(`Invalid DNS header ${name}: ${value}`)
  }
}

export class Packet {
  readonly header: Readonly<PacketHeader>
  readonly answers: readonly ResourceRecord[]

  constructor(header: Partial<PacketHeader> = {}, answers: readonly ResourceRecord[] = []) {
    const merged = { ...EMPTY_HEADER, ...header }
    checkField('id', merged.id, 0xffff)
    checkField('opcode', merged.opcode, 0xf)
    checkField('z', merged.z, 0x7)
    checkField('rcode', merged.rcode, 0xf)
    this.header = Object.freeze(merged)
    this.answers = Object.freeze([...answers])
  }

  /**
   * Empty authoritative response, the shape signers publish.
   */
  static reply(id = 0): Packet {
    return new Packet({ id, qr: true, aa: true })
  }

  /**
   * Build a packet from record inits, validating each record.
   */
  static fromRecords(records: readonly ResourceRecordInit[], header?: Partial<PacketHeader>): Packet {
    return new Packet(header ?? { qr: true, aa: true }, records.map(createResourceRecord))
  }

  /**
   * New packet with `record` appended.
   */
  withAnswer(record: ResourceRecordInit): Packet {
    return new Packet(this.header, [...this.answers, createResourceRecord(record)])
  }

  /**
   * The 15 low flag bits of the wire header (the QR bit is not included).
   */
  flags(): number {
    const h = this.header
    return (
      (h.opcode << 11) |
      ((h.aa ? 1 : 0) << 10) |
      ((h.tc ? 1 : 0) << 9) |
      ((h.rd ? 1 : 0) << 8) |
      ((h.ra ? 1 : 0) << 7) |
      (h.z << 4) |
      h.rcode
    )
  }

  get isEmpty(): boolean {
    return this.answers.length === 0
  }
}

/**
 * Header fields from the wire flags word.
 */
export function headerFromFlags(id: number, qr: boolean, flags: number): PacketHeader {
  return {
    id,
    qr,
    opcode: (flags >> 11) & 0xf,
    aa: ((flags >> 10) & 1) === 1,
    tc: ((flags >> 9) & 1) === 1,
    rd: ((flags >> 8) & 1) === 1,
    ra: ((flags >> 7) & 1) === 1,
    z: (flags >> 4) & 0x7,
    rcode: flags & 0xf,
  }
}
