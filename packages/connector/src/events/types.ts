/**
 * Event Bus Type Definitions
 *
 * Lifecycle events carry their own argument lists; every other event name is
 * a peer message and its handlers receive `(peer, data)`.
 *
 * @packageDocumentation
 */

import type { JsonValue } from '@lanlink/shared';
import type { PeerInfo } from '../registry/peer';

/**
 * Arguments of the lifecycle events raised by the node itself
 */
export interface LifecycleEventMap {
  peer_connected: [peer: PeerInfo];
  peer_disconnected: [peer: PeerInfo];
  all_peers_connected: [];
  seek_timeout: [peerCount: number, targetCount: number];
}

export type LifecycleEvent = keyof LifecycleEventMap;

export const LIFECYCLE_EVENTS: readonly LifecycleEvent[] = [
  'peer_connected',
  'peer_disconnected',
  'all_peers_connected',
  'seek_timeout',
];

export function isLifecycleEvent(event: string): event is LifecycleEvent {
  return LIFECYCLE_EVENTS.some((name) => name === event);
}

/**
 * Arguments of handlers for peer message events
 */
export type MessageHandlerArgs = [peer: PeerInfo, data: JsonValue];

export type HandlerArgs<E extends string> = E extends LifecycleEvent
  ? LifecycleEventMap[E]
  : MessageHandlerArgs;

/**
 * Handler for event `E`; may return a promise, whose rejection is logged
 */
export type EventHandler<E extends string> = (...args: HandlerArgs<E>) => void | Promise<void>;

/**
 * How a handler runs relative to the emitter
 *
 * - `inline`: synchronously, inside the emitting call
 * - `deferred`: on the next turn of the event loop (setImmediate)
 */
export type HandlerMode = 'inline' | 'deferred';
