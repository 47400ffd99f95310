/**
 * Node Frontier
 *
 * Per-lookup candidate stack. Candidates are popped depth-first: the most
 * recently discovered batch is explored before older ones, and within a batch
 * nodes are taken in the order the remote listed them. An address is never
 * queued twice in one lookup.
 */

export class NodeFrontier {
  /** Unqueried candidates; the end of the array pops first */
  private stack: string[] = []
  private readonly seen = new Set<string>()
  private readonly queriedOrder: string[] = []

  constructor(initial: readonly string[] = []) {
    this.push(initial)
  }

  /**
   * Queue addresses not yet queued or queried in this lookup.
   *
   * @returns the number of addresses added
   */
  push(addresses: readonly string[]): number {
    const fresh: string[] = []
    for (const address of addresses) {
      if (this.seen.has(address)) continue
      this.seen.add(address)
      fresh.push(address)
    }
    for (let i = fresh.length - 1; i >= 0; i--) {
      this.stack.push(fresh[i])
    }
    return fresh.length
  }

  /**
   * Take the next candidate and mark it queried.
   */
  pop(): string | undefined {
    const next = this.stack.pop()
    if (next !== undefined) {
      this.queriedOrder.push(next)
    }
    return next
  }

  get isEmpty(): boolean {
    return this.stack.length === 0
  }

  /** Candidates still waiting. */
  get pending(): number {
    return this.stack.length
  }

  /** Number of candidates popped so far. */
  get attempts(): number {
    return this.queriedOrder.length
  }

  /** Popped candidates in query order. */
  queried(): string[] {
    return [...this.queriedOrder]
  }

  hasQueried(address: string): boolean {
    return this.queriedOrder.includes(address)
  }
}
