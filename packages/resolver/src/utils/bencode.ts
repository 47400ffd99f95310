/**
 * Bencode
 *
 * Encoder/decoder for the BitTorrent bencoding used by KRPC messages.
 * Byte strings decode to Uint8Array; dictionary keys decode to latin1 strings.
 */

import { compare, concat } from './buffer'

export type BencodeValue = number | Uint8Array | BencodeValue[] | BencodeDict

export interface BencodeDict {
  [key: string]: BencodeValue
}

/** Values accepted by the encoder. Strings are written as UTF-8. */
export type BencodeInput =
  | number
  | string
  | Uint8Array
  | readonly BencodeInput[]
  | { readonly [key: string]: BencodeInput | undefined }

const CHAR_I = 0x69 // i
const CHAR_L = 0x6c // l
const CHAR_D = 0x64 // d
const CHAR_E = 0x65 // e
const CHAR_COLON = 0x3a // :
const CHAR_MINUS = 0x2d // -
const CHAR_0 = 0x30
const CHAR_9 = 0x39

const textEncoder = new TextEncoder()

function encodeInto(value: BencodeInput, out: Uint8Array[]): void {
  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) {
      throw new Error(`Bencode: cannot encode non-integer number ${value}`)
    }
    out.push(textEncoder.encode(`i${value}e`))
    return
  }

  if (typeof value === 'string') {
    encodeInto(textEncoder.encode(value), out)
    return
  }

  if (value instanceof Uint8Array) {
    out.push(textEncoder.encode(`${value.length}:`))
    out.push(value)
    return
  }

  if (isInputList(value)) {
    out.push(Uint8Array.of(CHAR_L))
    for (const item of value) {
      encodeInto(item, out)
    }
    out.push(Uint8Array.of(CHAR_E))
    return
  }

  // Keys must appear in raw byte order
  const entries = Object.entries(value)
    .filter((entry): entry is [string, BencodeInput] => entry[1] !== undefined)
    .map(([key, v]) => ({ key: latin1Encode(key), value: v }))
    .sort((a, b) => compare(a.key, b.key))

  out.push(Uint8Array.of(CHAR_D))
  for (const entry of entries) {
    encodeInto(entry.key, out)
    encodeInto(entry.value, out)
  }
  out.push(Uint8Array.of(CHAR_E))
}

function isInputList(value: BencodeInput): value is readonly BencodeInput[] {
  return Array.isArray(value)
}

function latin1Encode(str: string): Uint8Array {
  const out = new Uint8Array(str.length)
  for (let i = 0; i < str.length; i++) {
    const code = str.charCodeAt(i)
    if (code > 0xff) {
      throw new Error(`Bencode: dictionary key ${JSON.stringify(str)} is not latin1`)
    }
    out[i] = code
  }
  return out
}

function latin1Decode(bytes: Uint8Array): string {
  let str = ''
  for (let i = 0; i < bytes.length; i++) {
    str += String.fromCharCode(bytes[i])
  }
  return str
}

class Decoder {
  private pos = 0

  constructor(private readonly data: Uint8Array) {}

  decodeAll(): BencodeValue {
    const value = this.next()
    if (this.pos !== this.data.length) {
      throw new Error(`Bencode: trailing data at offset ${this.pos}`)
    }
    return value
  }

  private next(): BencodeValue {
    const c = this.peek()
    if (c === CHAR_I) return this.integer()
    if (c === CHAR_L) return this.list()
    if (c === CHAR_D) return this.dict()
    if (c >= CHAR_0 && c <= CHAR_9) return this.bytes()
    throw new Error(`Bencode: unexpected byte 0x${c.toString(16)} at offset ${this.pos}`)
  }

  private peek(): number {
    if (this.pos >= this.data.length) {
      throw new Error('Bencode: unexpected end of input')
    }
    return this.data[this.pos]
  }

  private integer(): number {
    this.pos++ // 'i'
    const end = this.data.indexOf(CHAR_E, this.pos)
    if (end === -1) throw new Error('Bencode: unterminated integer')
    const digits = this.data.subarray(this.pos, end)
    if (!isIntegerText(digits)) {
      throw new Error(`Bencode: invalid integer at offset ${this.pos}`)
    }
    const value = Number(latin1Decode(digits))
    if (!Number.isSafeInteger(value)) {
      throw new Error(`Bencode: integer out of range at offset ${this.pos}`)
    }
    this.pos = end + 1
    return value
  }

  private bytes(): Uint8Array {
    const colon = this.data.indexOf(CHAR_COLON, this.pos)
    if (colon === -1) throw new Error('Bencode: unterminated string length')
    const lengthText = latin1Decode(this.data.subarray(this.pos, colon))
    if (!/^(0|[1-9][0-9]*)$/.test(lengthText)) {
      throw new Error(`Bencode: invalid string length at offset ${this.pos}`)
    }
    const length = Number(lengthText)
    const start = colon + 1
    if (start + length > this.data.length) {
      throw new Error('Bencode: string exceeds input')
    }
    this.pos = start + length
    return this.data.slice(start, start + length)
  }

  private list(): BencodeValue[] {
    this.pos++ // 'l'
    const items: BencodeValue[] = []
    while (this.peek() !== CHAR_E) {
      items.push(this.next())
    }
    this.pos++
    return items
  }

  private dict(): BencodeDict {
    this.pos++ // 'd'
    const result: BencodeDict = {}
    while (this.peek() !== CHAR_E) {
      const key = latin1Decode(this.bytes())
      const value = this.next()
      if (key === '__proto__') continue
      result[key] = value
    }
    this.pos++
    return result
  }
}

function isIntegerText(digits: Uint8Array): boolean {
  if (digits.length === 0) return false
  let i = 0
  if (digits[0] === CHAR_MINUS) {
    if (digits.length === 1) return false
    i = 1
  }
  // No leading zeros, no "-0"
  if (digits[i] === CHAR_0 && (digits.length > i + 1 || i === 1)) return false
  for (; i < digits.length; i++) {
    if (digits[i] < CHAR_0 || digits[i] > CHAR_9) return false
  }
  return true
}

/**
 * Check whether a decoded value is a dictionary.
 */
export function isBencodeDict(value: BencodeValue | undefined): value is BencodeDict {
  return (
    value !== undefined &&
    typeof value === 'object' &&
    !(value instanceof Uint8Array) &&
    !Array.isArray(value)
  )
}

export const Bencode = {
  encode(value: BencodeInput): Uint8Array {
    const parts: Uint8Array[] = []
    encodeInto(value, parts)
    return concat(parts)
  },

  decode(data: Uint8Array): BencodeValue {
    return new Decoder(data).decodeAll()
  },
}
