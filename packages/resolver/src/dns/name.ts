/**
 * Domain name helpers.
 *
 * Names are stored lower-cased without a trailing dot. Inside a signed
 * packet the signer's z-base-32 key acts as the zone origin.
 */

import { PacketError } from '../errors'

const MAX_LABEL_LENGTH = 63
const MAX_NAME_LENGTH = 253

/**
 * Lower-case a domain name, strip one trailing dot and validate label sizes.
 *
 * @throws PacketError on empty inner labels or oversize labels/names
 */
export function canonicalName(name: string): string {
  let result = name.trim().toLowerCase()
  if (result.endsWith('.')) {
    result = result.slice(0, -1)
  }
  if (result === '') return result

  if (result.length > MAX_NAME_LENGTH) {
    throw new PacketError(`Domain name too long: ${result.length} characters`)
  }
  for (const label of result.split('.')) {
    if (label.length === 0) {
      throw new PacketError(`Empty label in domain name: ${name}`)
    }
    if (label.length > MAX_LABEL_LENGTH) {
      throw new PacketError(`Label too long in domain name: ${label}`)
    }
  }
  return result
}

/**
 * Resolve `name` against `origin`.
 *
 * - "@" or "" is the origin itself
 * - a name whose last label is the origin is already absolute
 * - a trailing "@" label stands for the origin ("_foo.@" -> "_foo.<origin>")
 * - anything else is relative and gets ".<origin>" appended
 */
export function normalizeName(origin: string, name: string): string {
  let result = name.trim().toLowerCase()
  if (result.endsWith('.')) {
    result = result.slice(0, -1)
  }

  const labels = result.split('.')
  const last = labels[labels.length - 1]

  if (last === origin) {
    return result
  }
  if (last === '@' || last === '') {
    return labels.length === 1 ? origin : [...labels.slice(0, -1), origin].join('.')
  }
  return `${result}.${origin}`
}
