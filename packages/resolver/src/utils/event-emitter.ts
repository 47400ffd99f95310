/**
 * Typed event emitter.
 *
 * `Events` maps event names to listener signatures, e.g.
 * `{ resolved: (key: string, packet: SignedPacket) => void }`.
 */

// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Listener = (...args: any[]) => void

export type EventMap<Events> = { [E in keyof Events]: Listener }

export class EventEmitter<Events extends EventMap<Events> = Record<string, Listener>> {
  private events: Map<keyof Events, Listener[]> = new Map()

  public on<E extends keyof Events>(event: E, listener: Events[E]): this {
    const listeners = this.events.get(event)
    if (listeners) {
      listeners.push(listener)
    } else {
      this.events.set(event, [listener])
    }
    return this
  }

  public off<E extends keyof Events>(event: E, listener: Events[E]): this {
    const listeners = this.events.get(event)
    if (!listeners) return this
    const index = listeners.indexOf(listener)
    if (index !== -1) {
      listeners.splice(index, 1)
    }
    return this
  }

  public emit<E extends keyof Events>(event: E, ...args: Parameters<Events[E]>): boolean {
    const listeners = this.events.get(event)
    if (!listeners || listeners.length === 0) return false
    // Copy to avoid issues if listeners are removed during execution
    for (const listener of [...listeners]) {
      listener(...args)
    }
    return true
  }

  public removeAllListeners(event?: keyof Events): this {
    if (event !== undefined) {
      this.events.delete(event)
    } else {
      this.events.clear()
    }
    return this
  }

  public listenerCount(event: keyof Events): number {
    return this.events.get(event)?.length ?? 0
  }
}
