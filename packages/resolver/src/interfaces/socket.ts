/**
 * Abstract Socket Interfaces
 *
 * The resolver only speaks UDP. Tests substitute an in-process socket.
 */

export interface IUdpSocket {
  /**
   * Send data to a specific address and port.
   */
  send(addr: string, port: number, data: Uint8Array): void

  /**
   * Register a callback for incoming messages.
   */
  onMessage(cb: (src: { addr: string; port: number }, data: Uint8Array) => void): void

  /**
   * Close the socket.
   */
  close(): void
}

export interface ISocketFactory {
  /**
   * Create a new UDP socket bound to the specified address and port.
   */
  createUdpSocket(bindAddr?: string, bindPort?: number): Promise<IUdpSocket>
}
