export { SignedPacket, signable } from './signed-packet'
export type { SignOptions } from './signed-packet'
export { MonotonicTimestamp, monotonicNow, nextTimestamp } from './timestamp'
export * from './constants'
