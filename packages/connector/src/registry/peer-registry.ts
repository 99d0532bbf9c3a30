/**
 * PeerRegistry - authoritative map of admitted peers
 *
 * Holds every admitted peer keyed by ID together with the set of connected
 * addresses and the acceptance policy `{ maxPeers, seekingPeers }`. All
 * sends go through the registry, and a failed send removes the peer.
 *
 * Mutations never span an await, so a check followed by admit() is atomic
 * with respect to concurrent handshakes.
 *
 * @packageDocumentation
 */

import { encodeFrame, type JsonValue } from '@lanlink/shared';
import type { EventBus } from '../events/event-bus';
import type { LineChannel } from '../transport/line-channel';
import type { Logger } from '../utils/logger';
import type { Peer, PeerInfo } from './peer';

/**
 * Acceptance policy set by seekPeers
 */
export interface AcceptancePolicy {
  /** Total number of peers wanted */
  maxPeers: number;

  /** Non-zero while a seek is active; drops to 0 once maxPeers is reached */
  seekingPeers: number;
}

export class PeerRegistry {
  private readonly _localId: string;
  private readonly _events: EventBus;
  private readonly _logger: Logger;
  private readonly _peers: Map<string, Peer> = new Map();
  private readonly _connectedAddresses: Set<string> = new Set();
  private readonly _policy: AcceptancePolicy = { maxPeers: 0, seekingPeers: 0 };
  private _allConnectedEmitted = false;

  /**
   * @param localId - Local peer ID; never admitted
   * @param events - Bus receiving lifecycle events
   * @param logger - Pino logger instance
   */
  constructor(localId: string, events: EventBus, logger: Logger) {
    this._localId = localId;
    this._events = events;
    this._logger = logger.child({ component: 'PeerRegistry' });
  }

  get peerCount(): number {
    return this._peers.size;
  }

  get connectedPeers(): PeerInfo[] {
    return Array.from(this._peers.values(), (peer) => peer.info);
  }

  get connectedAddresses(): ReadonlySet<string> {
    return this._connectedAddresses;
  }

  get policy(): Readonly<AcceptancePolicy> {
    return { ...this._policy };
  }

  /**
   * True iff below capacity and actively seeking
   */
  get isAcceptingConnections(): boolean {
    return this._peers.size < this._policy.maxPeers && this._policy.seekingPeers > 0;
  }

  has(peerId: string): boolean {
    return this._peers.has(peerId);
  }

  get(peerId: string): PeerInfo | undefined {
    return this._peers.get(peerId)?.info;
  }

  /**
   * Start a new seek window
   *
   * Resets the all_peers_connected latch.
   */
  setPolicy(maxPeers: number, seekingPeers: number): void {
    this._policy.maxPeers = maxPeers;
    this._policy.seekingPeers = this._peers.size >= maxPeers ? 0 : seekingPeers;
    this._allConnectedEmitted = false;
  }

  /**
   * Insert a peer if the acceptance predicate still holds
   *
   * Emits nothing; call announce() once the handshake has completed.
   *
   * @returns The peer snapshot, or null when the peer may not be admitted
   */
  admit(peerId: string, address: string, channel: LineChannel): PeerInfo | null {
    if (peerId === this._localId || this._peers.has(peerId) || !this.isAcceptingConnections) {
      return null;
    }

    const info: PeerInfo = Object.freeze({ id: peerId, address, connectedAt: Date.now() });
    this._peers.set(peerId, { info, channel, announced: false });
    this._connectedAddresses.add(address);

    if (this._peers.size >= this._policy.maxPeers) {
      this._policy.seekingPeers = 0;
    }

    this._logger.info(
      { event: 'peer_admitted', peerId, address, peerCount: this._peers.size },
      'Peer admitted'
    );
    return info;
  }

  /**
   * Emit peer_connected for an admitted peer, then all_peers_connected if
   * this admission met the seek target
   *
   * @returns false when the peer is no longer registered
   */
  announce(peerId: string): boolean {
    const peer = this._peers.get(peerId);
    if (!peer) {
      return false;
    }
    if (!peer.announced) {
      peer.announced = true;
      this._events.emitLocal('peer_connected', peer.info);
      this.notifyAllConnected();
    }
    return true;
  }

  /**
   * Emit all_peers_connected if the target is met and it has not fired
   * during the current seek window
   *
   * @returns true when the event was emitted by this call
   */
  notifyAllConnected(): boolean {
    if (
      this._allConnectedEmitted ||
      this._policy.maxPeers === 0 ||
      this._peers.size < this._policy.maxPeers
    ) {
      return false;
    }
    this._allConnectedEmitted = true;
    this._policy.seekingPeers = 0;
    this._logger.info(
      { event: 'all_peers_connected', peerCount: this._peers.size },
      'All peers connected'
    );
    this._events.emitLocal('all_peers_connected');
    return true;
  }

  /**
   * Remove a peer
   *
   * Idempotent. Deletes the entry and its address, closes the channel and
   * emits peer_disconnected exactly once for an announced peer.
   */
  async remove(peerId: string): Promise<void> {
    const peer = this._peers.get(peerId);
    if (!peer) {
      return;
    }

    this._peers.delete(peerId);
    this._connectedAddresses.delete(peer.info.address);

    try {
      await peer.channel.close();
    } catch (error) {
      this._logger.debug(
        {
          event: 'peer_close_error',
          peerId,
          error: error instanceof Error ? error.message : String(error),
        },
        'Error closing peer channel'
      );
    }

    this._logger.info(
      { event: 'peer_removed', peerId, peerCount: this._peers.size },
      'Peer removed'
    );

    if (peer.announced) {
      this._events.emitLocal('peer_disconnected', peer.info);
    }
  }

  /**
   * Remove every peer through the normal removal path
   */
  async removeAll(): Promise<void> {
    await Promise.all(Array.from(this._peers.keys(), (peerId) => this.remove(peerId)));
  }

  /**
   * Send one frame to one peer
   *
   * @returns false when the peer is unknown or the send failed (the peer is then removed)
   */
  async sendTo(peerId: string, event: string, data: JsonValue): Promise<boolean> {
    const peer = this._peers.get(peerId);
    if (!peer) {
      this._logger.debug({ event: 'send_unknown_peer', peerId, eventName: event });
      return false;
    }

    try {
      await peer.channel.writeLine(encodeFrame(event, data));
      return true;
    } catch (error) {
      this._logger.warn(
        {
          event: 'peer_send_failed',
          peerId,
          eventName: event,
          error: error instanceof Error ? error.message : String(error),
        },
        'Failed to send to peer'
      );
      await this.remove(peerId);
      return false;
    }
  }

  /**
   * Send one frame to every current peer
   *
   * @returns Number of peers the frame was written to
   */
  async broadcast(event: string, data: JsonValue): Promise<number> {
    const results = await Promise.all(
      Array.from(this._peers.keys(), (peerId) => this.sendTo(peerId, event, data))
    );
    const delivered = results.filter(Boolean).length;

    this._logger.debug(
      { event: 'peer_broadcast', eventName: event, delivered, peerCount: this._peers.size },
      'Broadcasted frame to peers'
    );
    return delivered;
  }

  /**
   * Fire-and-forget broadcast
   */
  emit(event: string, data: JsonValue): void {
    this.broadcast(event, data).catch((error: unknown) => {
      this._logger.error(
        {
          event: 'peer_broadcast_failed',
          eventName: event,
          error: error instanceof Error ? error.message : String(error),
        },
        'Broadcast failed'
      );
    });
  }
}
