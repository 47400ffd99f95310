/**
 * Node addresses
 *
 * Accepted text forms:
 *   host:port
 *   [ipv6]:port
 *   <node id>@host:port   (the id is ignored)
 */

import { DHTError } from '../errors'
import type { NodeAddress } from './types'

const HOST_PORT = /^(?:\[([0-9a-fA-F:.]+)\]|([^:[\]@\s]+)):(\d{1,5})$/

/**
 * @throws DHTError when the text is not a valid node address
 */
export function parseNodeAddress(text: string): NodeAddress {
  let rest = text.trim()
  const at = rest.lastIndexOf('@')
  if (at !== -1) {
    rest = rest.slice(at + 1)
  }

  const match = HOST_PORT.exec(rest)
  if (!match) {
    throw new DHTError(`Invalid node address: ${JSON.stringify(text)}`)
  }

  const host = match[1] ?? match[2]
  const port = Number(match[3])
  if (port < 1 || port > 0xffff) {
    throw new DHTError(`Invalid port in node address: ${JSON.stringify(text)}`)
  }
  return { host, port }
}

export function formatNodeAddress(address: NodeAddress): string {
  return address.host.includes(':')
    ? `[${address.host}]:${address.port}`
    : `${address.host}:${address.port}`
}

/**
 * Round-trip through the parser to get the canonical host:port text.
 */
export function normalizeNodeAddress(text: string): string {
  return formatNodeAddress(parseNodeAddress(text))
}
