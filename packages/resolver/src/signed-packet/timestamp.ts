/**
 * Clocks for signed packets.
 *
 * Timestamps are wall-clock microseconds since the Unix epoch, strictly
 * increasing for a given source even when the clock stalls or steps back.
 * Local ages (lastSeen, elapsed) use the process's monotonic clock instead,
 * so that a wall-clock step does not age a packet.
 */

export class MonotonicTimestamp {
  private last = 0

  constructor(private readonly nowMs: () => number = () => Date.now()) {}

  next(): number {
    const now = Math.floor(this.nowMs() * 1000)
    this.last = now > this.last ? now : this.last + 1
    return this.last
  }
}

const processTimestamps = new MonotonicTimestamp()

/**
 * Next timestamp from the process-wide source.
 */
export function nextTimestamp(): number {
  return processTimestamps.next()
}

/**
 * Milliseconds on the process's monotonic clock. Only differences between
 * two readings are meaningful.
 */
export function monotonicNow(): number {
  return performance.now()
}
