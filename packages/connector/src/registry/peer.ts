/**
 * Peer records held by the registry
 *
 * @packageDocumentation
 */

import type { LineChannel } from '../transport/line-channel';

/**
 * Read-only snapshot of an admitted peer handed to callers and handlers
 */
export interface PeerInfo {
  /** Remote peer ID announced during the handshake */
  readonly id: string;

  /** Remote network address */
  readonly address: string;

  /** Admission time (ms since epoch) */
  readonly connectedAt: number;
}

/**
 * Registry-owned peer entry
 *
 * Only the registry holds the channel; everything else refers to a peer by ID.
 */
export interface Peer {
  readonly info: PeerInfo;
  readonly channel: LineChannel;

  /** Set once peer_connected has been emitted for this peer */
  announced: boolean;
}
