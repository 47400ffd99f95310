/**
 * Transaction Manager for KRPC
 *
 * Tracks pending queries and routes responses to callbacks.
 * Handles timeouts for unresponsive nodes.
 */

import { DHTErrorReply, DHTIsShutdown, DHTQueryTimeout } from '../errors'
import { toHex } from '../utils/buffer'
import { QUERY_TIMEOUT_MS } from './constants'
import type { KRPCMethod, KRPCResponse } from './krpc-messages'
import type { NodeAddress } from './types'

export type QueryCallback = (err: Error | null, response: KRPCResponse | null) => void

/**
 * Pending query state.
 */
export interface PendingQuery {
  /** 2-byte transaction ID */
  transactionId: Uint8Array
  /** Query method (ping, find_node, get_peers) */
  method: KRPCMethod
  /** Target node address */
  target: NodeAddress
  /** Time query was sent */
  sentAt: number
  /** Callback for response or error */
  callback: QueryCallback
  /** Timeout handle */
  timeoutHandle: ReturnType<typeof setTimeout>
}

/**
 * Transaction Manager for tracking KRPC queries.
 */
export class TransactionManager {
  /** Map of transaction ID (hex) to pending query */
  private pending: Map<string, PendingQuery> = new Map()

  /** Counter for generating unique transaction IDs */
  private counter: number = Math.floor(Math.random() * 0xffff)

  /** Timeout duration in ms */
  private readonly timeoutMs: number

  constructor(timeoutMs: number = QUERY_TIMEOUT_MS) {
    this.timeoutMs = timeoutMs
  }

  /**
   * Generate a 2-byte transaction ID not currently in flight.
   */
  generateTransactionId(): Uint8Array {
    let id: Uint8Array
    do {
      this.counter = (this.counter + 1) & 0xffff
      id = new Uint8Array([(this.counter >> 8) & 0xff, this.counter & 0xff])
    } while (this.pending.size < 0x10000 && this.pending.has(toHex(id)))
    return id
  }

  /**
   * Track a new pending query.
   *
   * @param transactionId - The transaction ID
   * @param method - Query method name
   * @param target - Target node address
   * @param callback - Callback to invoke on response, error reply or timeout
   * @param timeoutMs - Per-query override of the manager's timeout
   */
  track(
    transactionId: Uint8Array,
    method: KRPCMethod,
    target: NodeAddress,
    callback: QueryCallback,
    timeoutMs: number = this.timeoutMs,
  ): void {
    const key = toHex(transactionId)

    // Set up timeout
    const timeoutHandle = setTimeout(() => {
      this.handleTimeout(key)
    }, timeoutMs)

    const pending: PendingQuery = {
      transactionId,
      method,
      target,
      sentAt: Date.now(),
      callback,
      timeoutHandle,
    }

    this.pending.set(key, pending)
  }

  /**
   * Handle a response by resolving the corresponding query.
   *
   * @returns true if a pending query was found, false otherwise
   */
  resolve(transactionId: Uint8Array, response: KRPCResponse): boolean {
    const pending = this.take(transactionId)
    if (!pending) {
      // Unknown transaction ID - ignore
      return false
    }

    pending.callback(null, response)
    return true
  }

  /**
   * Handle an error response.
   *
   * @returns true if a pending query was found, false otherwise
   */
  reject(transactionId: Uint8Array, code: number, message: string): boolean {
    const pending = this.take(transactionId)
    if (!pending) {
      return false
    }

    pending.callback(new DHTErrorReply(code, message), null)
    return true
  }

  /**
   * Get a pending query by transaction ID.
   */
  get(transactionId: Uint8Array): PendingQuery | undefined {
    return this.pending.get(toHex(transactionId))
  }

  /**
   * Get the number of pending queries.
   */
  size(): number {
    return this.pending.size
  }

  /**
   * Fail all pending queries with DHTIsShutdown (call on shutdown).
   */
  destroy(): void {
    const all = [...this.pending.values()]
    this.pending.clear()
    for (const pending of all) {
      clearTimeout(pending.timeoutHandle)
      pending.callback(new DHTIsShutdown(), null)
    }
  }

  private take(transactionId: Uint8Array): PendingQuery | undefined {
    const key = toHex(transactionId)
    const pending = this.pending.get(key)
    if (!pending) return undefined

    clearTimeout(pending.timeoutHandle)
    this.pending.delete(key)
    return pending
  }

  /**
   * Handle timeout for a query.
   */
  private handleTimeout(key: string): void {
    const pending = this.pending.get(key)
    if (!pending) return

    this.pending.delete(key)
    const target = `${pending.target.host}:${pending.target.port}`
    pending.callback(new DHTQueryTimeout(pending.method, target), null)
  }
}
