import * as dgram from 'dgram'
import type { ISocketFactory, IUdpSocket } from '../../interfaces/socket'

export class NodeUdpSocket implements IUdpSocket {
  private socket: dgram.Socket

  constructor(socket?: dgram.Socket) {
    this.socket = socket || dgram.createSocket('udp4')
  }

  /**
   * Bind to a local address; port 0 picks a free port.
   */
  bind(bindAddr: string, bindPort: number): Promise<void> {
    return new Promise((resolve, reject) => {
      const onError = (err: Error) => reject(err)
      this.socket.once('error', onError)
      this.socket.bind(bindPort, bindAddr, () => {
        this.socket.off('error', onError)
        resolve()
      })
    })
  }

  send(addr: string, port: number, data: Uint8Array): void {
    this.socket.send(data, port, addr, (err) => {
      if (err) {
        console.error(`NodeUdpSocket: Error sending data: ${err.message}`)
      }
    })
  }

  onMessage(cb: (src: { addr: string; port: number }, data: Uint8Array) => void): void {
    this.socket.on('message', (msg, rinfo) => {
      cb({ addr: rinfo.address, port: rinfo.port }, new Uint8Array(msg))
    })
  }

  close(): void {
    this.socket.close()
  }

  /** Locally bound port. */
  port(): number {
    return this.socket.address().port
  }
}

export class NodeSocketFactory implements ISocketFactory {
  async createUdpSocket(bindAddr: string = '0.0.0.0', bindPort: number = 0): Promise<IUdpSocket> {
    const socket = new NodeUdpSocket()
    await socket.bind(bindAddr, bindPort)
    return socket
  }
}
