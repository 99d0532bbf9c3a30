/**
 * LAN Link connector
 *
 * Peer discovery and messaging between processes on one local network.
 *
 * @packageDocumentation
 */

export { PeerNode } from './core/peer-node';
export { CommandInbox, PeerCommandSchema } from './core/command-inbox';
export type { PeerCommand, CommandTarget } from './core/command-inbox';

export { ConfigLoader, ConfigurationError, DEFAULT_PORT } from './config/config-loader';
export type {
  PeerNodeConfig,
  PeerNodeConfigInput,
  DiscoveryConfig,
  HandshakeConfig,
  InboxConfig,
} from './config/types';

export { EventBus } from './events/event-bus';
export { LIFECYCLE_EVENTS, isLifecycleEvent } from './events/types';
export type {
  LifecycleEventMap,
  LifecycleEvent,
  EventHandler,
  HandlerArgs,
  HandlerMode,
  MessageHandlerArgs,
} from './events/types';

export { PeerScanner, buildCandidateRange, selectCandidates } from './discovery';
export type { SeekResult, SeekStatus, CandidateDialer } from './discovery';

export { HandshakeError, REJECT_REASON } from './handshake/handshake';
export type { HandshakeOutcome, HandshakeErrorCode } from './handshake/handshake';

export { PeerRegistry } from './registry/peer-registry';
export type { AcceptancePolicy } from './registry/peer-registry';
export type { PeerInfo } from './registry/peer';

export {
  createLocalIdentity,
  isWildcardHost,
  resolveLocalAddresses,
} from './identity/local-identity';
export type { LocalIdentity } from './identity/local-identity';

export { ConnectionListener, ListenerError } from './transport/connection-listener';
export type { ListenerErrorCode } from './transport/connection-listener';
export { LineChannel } from './transport/line-channel';

export { createLogger } from './utils/logger';
export type { Logger, LogLevel } from './utils/logger';
