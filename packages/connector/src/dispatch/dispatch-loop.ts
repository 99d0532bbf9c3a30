/**
 * Dispatch Loop
 *
 * One loop per admitted peer: reads frames line by line and hands each to
 * the event bus as `(peer, data)` under the frame's event name. End of
 * stream removes the peer.
 *
 * @packageDocumentation
 */

import { InvalidFrameError, decodeFrame, type Frame } from '@lanlink/shared';
import type { EventBus } from '../events/event-bus';
import { isLifecycleEvent } from '../events/types';
import type { PeerInfo } from '../registry/peer';
import type { PeerRegistry } from '../registry/peer-registry';
import type { LineChannel } from '../transport/line-channel';
import type { Logger } from '../utils/logger';

/**
 * Read and dispatch frames until the channel ends, then remove the peer
 *
 * Never rejects. Undecodable lines are dropped; frames that name a
 * lifecycle event are dropped as well, since only the local node raises
 * those.
 */
export async function runDispatchLoop(
  peer: PeerInfo,
  channel: LineChannel,
  events: EventBus,
  registry: PeerRegistry,
  logger: Logger
): Promise<void> {
  const log = logger.child({ component: 'DispatchLoop', peerId: peer.id });

  try {
    for (;;) {
      const line = await channel.readLine();
      if (line === null) {
        break;
      }

      let frame: Frame;
      try {
        frame = decodeFrame(line);
      } catch (error) {
        if (error instanceof InvalidFrameError) {
          log.debug({ event: 'frame_dropped', reason: error.message }, 'Dropped undecodable frame');
          continue;
        }
        throw error;
      }

      if (isLifecycleEvent(frame.event)) {
        log.debug({ event: 'frame_dropped', eventName: frame.event }, 'Dropped reserved event');
        continue;
      }

      events.emitLocal(frame.event, peer, frame.data);
    }

    const reason = channel.lastError ? channel.lastError.message : 'end of stream';
    log.info({ event: 'peer_stream_ended', reason }, 'Peer connection ended');
  } catch (error) {
    log.warn(
      { event: 'dispatch_loop_failed', error: error instanceof Error ? error.message : String(error) },
      'Dispatch loop failed'
    );
  } finally {
    await registry.remove(peer.id);
  }
}
