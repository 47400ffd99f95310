import { describe, it, expect, vi, afterEach } from 'vitest'
import { MonotonicTimestamp, monotonicNow, nextTimestamp } from '../../src/signed-packet'

describe('MonotonicTimestamp', () => {
  it('returns microseconds from the clock', () => {
    const source = new MonotonicTimestamp(() => 1_000)
    expect(source.next()).toBe(1_000_000)
  })

  it('stays strictly increasing when the clock stalls or steps back', () => {
    let now = 2_000
    const source = new MonotonicTimestamp(() => now)
    expect(source.next()).toBe(2_000_000)
    expect(source.next()).toBe(2_000_001)
    now = 1_500
    expect(source.next()).toBe(2_000_002)
    now = 3_000
    expect(source.next()).toBe(3_000_000)
  })

  it('process-wide source increases', () => {
    const a = nextTimestamp()
    expect(nextTimestamp()).toBeGreaterThan(a)
    expect(Number.isSafeInteger(a)).toBe(true)
  })
})

describe('monotonicNow', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('does not follow the wall clock', () => {
    vi.useFakeTimers({ toFake: ['Date', 'performance'] })
    const start = monotonicNow()

    vi.setSystemTime(Date.now() - 60_000)
    expect(monotonicNow()).toBe(start)

    vi.advanceTimersByTime(1500)
    expect(monotonicNow()).toBe(start + 1500)
  })
})
