/**
 * PeerNode - LAN peer orchestrator
 * Owns identity, listener, scanner, registry and event bus for one process
 */

import type { MessagePort } from 'worker_threads';
import type { Socket } from 'net';
import type { JsonValue } from '@lanlink/shared';
import { ConfigLoader } from '../config/config-loader';
import type { PeerNodeConfig, PeerNodeConfigInput } from '../config/types';
import { runDispatchLoop } from '../dispatch/dispatch-loop';
import { PeerScanner } from '../discovery/peer-scanner';
import type { SeekResult } from '../discovery/types';
import { EventBus } from '../events/event-bus';
import type { EventHandler, HandlerMode } from '../events/types';
import {
  acceptHandshake,
  initiateHandshake,
  type HandshakeContext,
  type HandshakeOutcome,
} from '../handshake/handshake';
import {
  createLocalIdentity,
  isWildcardHost,
  resolveLocalAddresses,
  type LocalIdentity,
} from '../identity/local-identity';
import type { PeerInfo } from '../registry/peer';
import { PeerRegistry } from '../registry/peer-registry';
import { openChannel } from '../transport/connect';
import { ConnectionListener } from '../transport/connection-listener';
import { LineChannel } from '../transport/line-channel';
import { createLogger, type Logger } from '../utils/logger';
import { CommandInbox, type PeerCommand } from './command-inbox';

/**
 * PeerNode - public surface for collaborators
 *
 * Typical use:
 * ```typescript
 * const node = new PeerNode({ appName: 'combat_game' });
 * node.on('message', (peer, data) => console.log(peer.id, data));
 * node.on('all_peers_connected', () => node.emit('message', { text: 'hi' }));
 * await node.startListening();
 * await node.seekPeers(3);
 * ```
 */
export class PeerNode {
  private readonly _config: PeerNodeConfig;
  private readonly _identity: LocalIdentity;
  private readonly _logger: Logger;
  private readonly _events: EventBus;
  private readonly _registry: PeerRegistry;
  private readonly _listener: ConnectionListener;
  private readonly _scanner: PeerScanner;
  private readonly _inbox: CommandInbox;
  private readonly _handshakeContext: HandshakeContext;
  private readonly _dispatchLoops: Set<Promise<void>> = new Set();

  /**
   * Create PeerNode instance
   * @param config - Configuration; missing fields take their defaults
   * @param logger - Pino logger; one is created from config.logLevel when omitted
   * @throws ConfigurationError if the configuration is invalid
   */
  constructor(config: PeerNodeConfigInput | PeerNodeConfig, logger?: Logger) {
    this._config = ConfigLoader.resolveConfig(config);
    this._identity = createLocalIdentity(this._config.appName);

    const baseLogger = logger
      ? logger.child({ peerId: this._identity.peerId })
      : createLogger(this._identity.peerId, this._config.logLevel);
    this._logger = baseLogger.child({ component: 'PeerNode' });

    this._events = new EventBus(baseLogger);
    this._registry = new PeerRegistry(this._identity.peerId, this._events, baseLogger);
    this._listener = new ConnectionListener(
      (socket) => this.acceptConnection(socket),
      baseLogger
    );
    this._scanner = new PeerScanner({
      config: this._config.discovery,
      registry: this._registry,
      events: this._events,
      dialer: (address) => this.dialCandidate(address),
      localAddresses: resolveLocalAddresses(this._config.host),
      logger: baseLogger,
    });
    this._inbox = new CommandInbox(this, this._config.inbox.capacity, baseLogger);
    this._handshakeContext = {
      identity: this._identity,
      registry: this._registry,
      config: this._config.handshake,
      logger: baseLogger.child({ component: 'Handshake' }),
      isSeeking: () => this._scanner.isSeeking,
    };

    this._logger.info(
      { event: 'node_created', appName: this._config.appName, port: this._config.port },
      'Peer node created'
    );
  }

  get localId(): string {
    return this._identity.peerId;
  }

  get appName(): string {
    return this._identity.appName;
  }

  get config(): Readonly<PeerNodeConfig> {
    return this._config;
  }

  get peerCount(): number {
    return this._registry.peerCount;
  }

  get connectedPeers(): PeerInfo[] {
    return this._registry.connectedPeers;
  }

  get isAcceptingConnections(): boolean {
    return this._registry.isAcceptingConnections;
  }

  get isListening(): boolean {
    return this._listener.isListening;
  }

  /**
   * Port actually bound (differs from config.port when it was 0)
   */
  get listeningPort(): number {
    return this._listener.getPort();
  }

  /**
   * Bind the listener
   * @throws ListenerError if the port cannot be bound
   */
  async startListening(): Promise<void> {
    await this._listener.start(this._config.port, this._config.host);
  }

  /**
   * Stop listening, abort any seek and remove every peer
   *
   * Peers go through the same removal path as a remote failure, so each
   * fires peer_disconnected once. Handshakes in flight are abandoned.
   */
  async stopListening(): Promise<void> {
    this._logger.info(
      { event: 'node_stopping', peerCount: this.peerCount },
      'Stopping peer node'
    );

    this._scanner.abort();
    this._registry.setPolicy(0, 0);
    this._inbox.detachPorts();

    await this._listener.stop();
    await this._registry.removeAll();
    await Promise.all(this._dispatchLoops);

    this._logger.info({ event: 'node_stopped' }, 'Peer node stopped');
  }

  /**
   * Scan the configured range until `targetCount` peers are connected
   */
  seekPeers(targetCount: number): Promise<SeekResult> {
    return this._scanner.seek(targetCount);
  }

  on<E extends string>(event: E, handler: EventHandler<E>, mode?: HandlerMode): void {
    this._events.on(event, handler, mode);
  }

  off<E extends string>(event: E, handler?: EventHandler<E>): void {
    this._events.off(event, handler);
  }

  /**
   * Broadcast a frame to every peer without waiting
   */
  emit(event: string, data: JsonValue): void {
    this._registry.emit(event, data);
  }

  /**
   * Broadcast a frame to every peer
   * @returns Number of peers reached
   */
  broadcast(event: string, data: JsonValue): Promise<number> {
    return this._registry.broadcast(event, data);
  }

  /**
   * Send a frame to one peer
   * @returns false when the peer is unknown or the send failed
   */
  sendTo(peerId: string, event: string, data: JsonValue): Promise<boolean> {
    return this._registry.sendTo(peerId, event, data);
  }

  /**
   * Queue a command from outside the event loop
   * @returns false when the inbox is full
   */
  submit(command: PeerCommand): boolean {
    return this._inbox.submit(command);
  }

  /**
   * Accept commands posted on a worker_threads MessagePort
   */
  attachPort(port: MessagePort): void {
    this._inbox.attachPort(port);
  }

  private async acceptConnection(socket: Socket): Promise<void> {
    const channel = LineChannel.fromSocket(socket);
    const outcome = await acceptHandshake(channel, this._handshakeContext);
    await this.completeHandshake(outcome, channel);
  }

  private async dialCandidate(address: string): Promise<boolean> {
    let channel: LineChannel;
    try {
      channel = await openChannel(
        address,
        this._config.port,
        this._config.handshake.initiatorTimeoutMs,
        isWildcardHost(this._config.host) ? undefined : this._config.host
      );
    } catch (error) {
      this._logger.debug(
        {
          event: 'candidate_unreachable',
          address,
          error: error instanceof Error ? error.message : String(error),
        },
        'Candidate unreachable'
      );
      return false;
    }

    const outcome = await initiateHandshake(channel, this._handshakeContext);
    return this.completeHandshake(outcome, channel);
  }

  /**
   * Announce an admitted peer and start its dispatch loop
   */
  private async completeHandshake(
    outcome: HandshakeOutcome,
    channel: LineChannel
  ): Promise<boolean> {
    if (outcome.status !== 'admitted') {
      return false;
    }

    const { peer } = outcome;
    // Removed by a stop while the handshake was finishing
    if (!this._registry.announce(peer.id)) {
      await channel.close();
      return false;
    }

    const loop = runDispatchLoop(peer, channel, this._events, this._registry, this._logger);
    this._dispatchLoops.add(loop);
    loop.finally(() => this._dispatchLoops.delete(loop)).catch((error: unknown) => {
      this._logger.error(
        {
          event: 'dispatch_loop_error',
          error: error instanceof Error ? error.message : String(error),
        },
        'Dispatch loop error'
      );
    });
    return true;
  }
}
