/**
 * Peer Fetcher
 *
 * Once a get_peers reply names peers for a key's info-hash, something must
 * retrieve the signed packet bytes from one of them. How that happens is left
 * to the implementation of this interface.
 */

import { PeerFetchUnavailable } from '../errors'
import type { PublicKey } from '../identity'
import { formatNodeAddress } from './node-address'
import type { CompactPeer } from './types'

export interface PeerPacketFetcher {
  /**
   * Fetch candidate signed packet bytes (full byte form, public key first)
   * for `target` from `peer`.
   *
   * @returns the bytes, or null when the peer has nothing for the key
   */
  fetchSignedPacket(peer: CompactPeer, target: PublicKey): Promise<Uint8Array | null>
}

/**
 * Default fetcher: no peer protocol is available, every fetch fails with
 * PeerFetchUnavailable.
 */
export class UnsupportedPeerFetcher implements PeerPacketFetcher {
  async fetchSignedPacket(peer: CompactPeer, _target: PublicKey): Promise<Uint8Array | null> {
    throw new PeerFetchUnavailable(formatNodeAddress(peer))
  }
}
