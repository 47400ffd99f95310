/**
 * Error hierarchy
 *
 * Every failure the resolver raises is a PkarrError. Callers of
 * DHTClient.lookup never see transport or trust-boundary errors: those are
 * recovered inside the lookup loop. "Not found" is a null result.
 */

import { SIGNED_PACKET_MIN_BYTES, MAX_ENCODED_PACKET_BYTES, RELAY_PAYLOAD_MIN_BYTES } from './signed-packet/constants'

export class PkarrError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/** Malformed or wrong-length key material. */
export class IdentityError extends PkarrError {}

/** Signature did not verify over the signable bytes. */
export class SignatureError extends PkarrError {}

/** Oversize or malformed encoded packet, or invalid record data. */
export class PacketError extends PkarrError {}

export class InvalidSignedPacketBytesLength extends PacketError {
  constructor(readonly length: number) {
    super(
      `Invalid SignedPacket bytes length, expected at least ${SIGNED_PACKET_MIN_BYTES} bytes but got: ${length}`,
    )
  }
}

export class InvalidRelayPayloadSize extends PacketError {
  constructor(readonly size: number) {
    super(
      `Invalid relay payload size, expected at least ${RELAY_PAYLOAD_MIN_BYTES} bytes but got: ${size}`,
    )
  }
}

export class PacketTooLarge extends PacketError {
  constructor(readonly size: number) {
    super(`DNS Packet is too large, expected max ${MAX_ENCODED_PACKET_BYTES} bytes but got: ${size}`)
  }
}

/** Transport or protocol fault while talking to a DHT node. */
export class DHTError extends PkarrError {}

export class DHTQueryTimeout extends DHTError {
  constructor(
    readonly method: string,
    readonly target: string,
  ) {
    super(`Query ${method} to ${target} timed out`)
  }
}

export class DHTErrorReply extends DHTError {
  constructor(
    readonly code: number,
    readonly remoteMessage: string,
  ) {
    super(`KRPC error ${code}: ${remoteMessage}`)
  }
}

export class DHTIsShutdown extends DHTError {
  constructor() {
    super('DHT is shutdown')
  }
}

export class PeerFetchUnavailable extends DHTError {
  constructor(peer: string) {
    super(`No peer fetch protocol available to retrieve a signed packet from ${peer}`)
  }
}

export class ConfigError extends PkarrError {}

/**
 * Render an unknown thrown value for a log line.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
