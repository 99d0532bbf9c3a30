/**
 * CommandInbox - hand-off point for requests from outside the event loop
 *
 * Worker threads, signal handlers and hardware callbacks never touch the
 * registry themselves. They queue a command here (directly or over a
 * worker_threads MessagePort) and the inbox replays it on the event loop.
 *
 * @packageDocumentation
 */

import type { MessagePort } from 'worker_threads';
import { z } from 'zod';
import { JsonValueSchema, type JsonValue } from '@lanlink/shared';
import type { SeekResult } from '../discovery/types';
import type { Logger } from '../utils/logger';

export const EmitCommandSchema = z.object({
  type: z.literal('emit'),
  event: z.string().min(1),
  data: JsonValueSchema.default({}),
});

export const SendToCommandSchema = z.object({
  type: z.literal('send_to'),
  peerId: z.string().min(1),
  event: z.string().min(1),
  data: JsonValueSchema.default({}),
});

export const SeekCommandSchema = z.object({
  type: z.literal('seek'),
  targetCount: z.number().int().min(1),
});

export const PeerCommandSchema = z.discriminatedUnion('type', [
  EmitCommandSchema,
  SendToCommandSchema,
  SeekCommandSchema,
]);

export type PeerCommand = z.infer<typeof PeerCommandSchema>;

/**
 * Operations a command can invoke
 */
export interface CommandTarget {
  emit(event: string, data: JsonValue): void;
  sendTo(peerId: string, event: string, data: JsonValue): Promise<boolean>;
  seekPeers(targetCount: number): Promise<SeekResult>;
}

/**
 * Bounded FIFO drained on setImmediate
 *
 * When the queue holds `capacity` commands, further submissions are dropped
 * with a warning.
 */
export class CommandInbox {
  private readonly _target: CommandTarget;
  private readonly _capacity: number;
  private readonly _logger: Logger;
  private readonly _queue: PeerCommand[] = [];
  private readonly _ports: Map<MessagePort, (message: unknown) => void> = new Map();
  private _drainScheduled = false;

  constructor(target: CommandTarget, capacity: number, logger: Logger) {
    this._target = target;
    this._capacity = capacity;
    this._logger = logger.child({ component: 'CommandInbox' });
  }

  get size(): number {
    return this._queue.length;
  }

  /**
   * Queue a command
   *
   * @returns false when the inbox is full and the command was dropped
   */
  submit(command: PeerCommand): boolean {
    if (this._queue.length >= this._capacity) {
      this._logger.warn(
        { event: 'command_dropped', commandType: command.type, capacity: this._capacity },
        'Command inbox full, dropping command'
      );
      return false;
    }

    this._queue.push(command);
    this.scheduleDrain();
    return true;
  }

  /**
   * Accept commands posted to a MessagePort
   *
   * Messages that fail validation are logged and ignored.
   */
  attachPort(port: MessagePort): void {
    if (this._ports.has(port)) {
      return;
    }

    const listener = (message: unknown): void => {
      const result = PeerCommandSchema.safeParse(message);
      if (!result.success) {
        this._logger.warn(
          { event: 'command_invalid', error: result.error.issues[0]?.message ?? 'invalid' },
          'Ignoring invalid command from port'
        );
        return;
      }
      this.submit(result.data);
    };

    port.on('message', listener);
    this._ports.set(port, listener);
  }

  /**
   * Stop listening on every attached port
   */
  detachPorts(): void {
    for (const [port, listener] of this._ports) {
      port.off('message', listener);
    }
    this._ports.clear();
  }

  private scheduleDrain(): void {
    if (this._drainScheduled) {
      return;
    }
    this._drainScheduled = true;
    setImmediate(() => {
      this._drainScheduled = false;
      this.drain();
    });
  }

  private drain(): void {
    let command = this._queue.shift();
    while (command) {
      const current = command;
      try {
        this.execute(current, (error) => this.logFailure(current, error));
      } catch (error) {
        this.logFailure(current, error);
      }
      command = this._queue.shift();
    }
  }

  private logFailure(command: PeerCommand, error: unknown): void {
    this._logger.error(
      {
        event: 'command_failed',
        commandType: command.type,
        error: error instanceof Error ? error.message : String(error),
      },
      'Command failed'
    );
  }

  private execute(command: PeerCommand, onError: (error: unknown) => void): void {
    switch (command.type) {
      case 'emit':
        this._target.emit(command.event, command.data);
        break;
      case 'send_to':
        this._target
          .sendTo(command.peerId, command.event, command.data)
          .then((delivered) => {
            if (!delivered) {
              this._logger.debug(
                { event: 'command_send_undelivered', peerId: command.peerId },
                'send_to command not delivered'
              );
            }
          })
          .catch(onError);
        break;
      case 'seek':
        this._target
          .seekPeers(command.targetCount)
          .then((result) => {
            this._logger.debug(
              { event: 'command_seek_finished', ...result },
              'Seek command finished'
            );
          })
          .catch(onError);
        break;
    }
  }
}
