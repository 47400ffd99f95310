/**
 * KRPC Socket
 *
 * Wraps IUdpSocket with KRPC message decoding and transaction management.
 * Responses and error replies are routed to the pending query; incoming
 * queries are dropped since the client runs in read-only mode.
 */

import { DHTError, DHTIsShutdown } from '../errors'
import type { IUdpSocket, ISocketFactory } from '../interfaces/socket'
import { type ILoggingHost, ResolverComponent } from '../logging/logger'
import { TransactionManager } from './transaction-manager'
import { type KRPCMethod, type KRPCResponse, decodeMessage, isQuery, isResponse, isError } from './krpc-messages'
import { QUERY_TIMEOUT_MS } from './constants'

/**
 * Options for KRPCSocket.
 */
export interface KRPCSocketOptions {
  /** Query timeout in ms (default: 5000) */
  timeout?: number
  /** Bind address (default: '0.0.0.0') */
  bindAddr?: string
  /** Bind port (default: 0 for random) */
  bindPort?: number
}

/**
 * KRPC Socket for DHT communication.
 */
export class KRPCSocket extends ResolverComponent {
  static logName = 'krpc'

  private socket: IUdpSocket | null = null
  private transactions: TransactionManager
  private socketFactory: ISocketFactory
  private options: Required<KRPCSocketOptions>

  constructor(host: ILoggingHost, socketFactory: ISocketFactory, options: KRPCSocketOptions = {}) {
    super(host)
    this.socketFactory = socketFactory
    this.options = {
      timeout: options.timeout ?? QUERY_TIMEOUT_MS,
      bindAddr: options.bindAddr ?? '0.0.0.0',
      bindPort: options.bindPort ?? 0,
    }
    this.transactions = new TransactionManager(this.options.timeout)
  }

  /**
   * Initialize the socket and start listening.
   */
  async bind(): Promise<void> {
    if (this.socket) {
      throw new DHTError('Socket already bound')
    }

    this.socket = await this.socketFactory.createUdpSocket(
      this.options.bindAddr,
      this.options.bindPort,
    )

    this.socket.onMessage((rinfo, data) => {
      this.handleMessage(data, rinfo)
    })
  }

  get bound(): boolean {
    return this.socket !== null
  }

  /**
   * Send a query and wait for response.
   *
   * @param host - Target host
   * @param port - Target port
   * @param data - Encoded KRPC query (must include transaction ID)
   * @param transactionId - Transaction ID used in the query
   * @param method - Query method name (for tracking)
   * @returns Promise resolving to the response, rejecting with DHTErrorReply,
   *   DHTQueryTimeout or DHTIsShutdown
   */
  query(
    host: string,
    port: number,
    data: Uint8Array,
    transactionId: Uint8Array,
    method: KRPCMethod,
  ): Promise<KRPCResponse> {
    return new Promise((resolve, reject) => {
      const socket = this.socket
      if (!socket) {
        reject(new DHTIsShutdown())
        return
      }

      this.transactions.track(transactionId, method, { host, port }, (err, response) => {
        if (err) {
          reject(err)
        } else if (response) {
          resolve(response)
        } else {
          reject(new DHTError(`Empty ${method} response from ${host}:${port}`))
        }
      })

      socket.send(host, port, data)
    })
  }

  /**
   * Generate a new transaction ID.
   */
  generateTransactionId(): Uint8Array {
    return this.transactions.generateTransactionId()
  }

  /**
   * Get the number of pending queries.
   */
  pendingCount(): number {
    return this.transactions.size()
  }

  /**
   * Get timeout configuration.
   */
  getTimeout(): number {
    return this.options.timeout
  }

  /**
   * Close the socket and fail pending queries with DHTIsShutdown.
   */
  close(): void {
    const socket = this.socket
    this.socket = null
    this.transactions.destroy()
    socket?.close()
  }

  /**
   * Handle incoming UDP message.
   */
  private handleMessage(data: Uint8Array, rinfo: { addr: string; port: number }): void {
    const msg = decodeMessage(data)
    if (!msg) {
      this.logger.debug(`Dropped malformed datagram from ${rinfo.addr}:${rinfo.port}`)
      return
    }

    if (isResponse(msg)) {
      // Route to pending query
      this.transactions.resolve(msg.t, msg)
    } else if (isError(msg)) {
      // Route error to pending query
      this.transactions.reject(msg.t, msg.e[0], msg.e[1])
    } else if (isQuery(msg)) {
      this.logger.debug(`Ignored ${msg.q} query from ${rinfo.addr}:${rinfo.port}`)
    }
  }
}
