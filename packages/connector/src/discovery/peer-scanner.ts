/**
 * PeerScanner - retrying address-range scan for peers
 *
 * Each round dials every candidate of the configured range concurrently,
 * skipping local and already connected addresses. Rounds repeat with a
 * fixed backoff until the target peer count is reached or the attempt
 * budget runs out.
 *
 * @packageDocumentation
 */

import { setTimeout as sleep } from 'timers/promises';
import type { DiscoveryConfig } from '../config/types';
import type { EventBus } from '../events/event-bus';
import type { PeerRegistry } from '../registry/peer-registry';
import type { Logger } from '../utils/logger';
import { buildCandidateRange, selectCandidates } from './candidate-addresses';
import type { CandidateDialer, SeekResult } from './types';

export interface PeerScannerOptions {
  config: DiscoveryConfig;
  registry: PeerRegistry;
  events: EventBus;
  dialer: CandidateDialer;
  /** Addresses of this host, never dialed */
  localAddresses: ReadonlySet<string>;
  logger: Logger;
}

export class PeerScanner {
  private readonly _config: DiscoveryConfig;
  private readonly _registry: PeerRegistry;
  private readonly _events: EventBus;
  private readonly _dialer: CandidateDialer;
  private readonly _localAddresses: ReadonlySet<string>;
  private readonly _logger: Logger;
  private readonly _range: string[];
  private _inFlight: Promise<SeekResult> | null = null;
  private _abortController: AbortController | null = null;
  private _targetCount = 0;

  constructor(options: PeerScannerOptions) {
    this._config = options.config;
    this._registry = options.registry;
    this._events = options.events;
    this._dialer = options.dialer;
    this._localAddresses = options.localAddresses;
    this._logger = options.logger.child({ component: 'PeerScanner' });
    this._range = buildCandidateRange(options.config);
  }

  get isSeeking(): boolean {
    return this._inFlight !== null;
  }

  /**
   * Seek peers until `targetCount` peers are connected in total
   *
   * Returns at once, dialing nothing and emitting nothing, when the target
   * is already met. A call made while a seek runs returns that seek's
   * promise, after raising its target to `targetCount` when that is larger.
   * The attempt budget is not reset by a raise.
   */
  seek(targetCount: number): Promise<SeekResult> {
    if (this._inFlight) {
      if (targetCount > this._targetCount) {
        this._targetCount = targetCount;
        this._registry.setPolicy(targetCount, targetCount);
        this._logger.info({ event: 'seek_target_raised', targetCount }, 'Seek target raised');
      } else {
        this._logger.debug({ event: 'seek_joined', targetCount }, 'Seek already in progress');
      }
      return this._inFlight;
    }

    const peerCount = this._registry.peerCount;
    if (peerCount >= targetCount) {
      return Promise.resolve<SeekResult>({
        status: 'satisfied',
        peerCount,
        targetCount,
        attempts: 0,
      });
    }

    this._targetCount = targetCount;
    this._registry.setPolicy(targetCount, targetCount);
    const controller = new AbortController();
    this._abortController = controller;

    const seek = this.run(controller.signal);
    this._inFlight = seek;
    return seek;
  }

  /**
   * Abort the running seek; it resolves with status `aborted` after the
   * current round settles
   */
  abort(): void {
    this._abortController?.abort();
  }

  private async run(signal: AbortSignal): Promise<SeekResult> {
    try {
      return await this.runRounds(signal);
    } finally {
      // Cleared before the promise settles, so a seek() from a settle callback starts afresh
      this._inFlight = null;
      this._abortController = null;
    }
  }

  private async runRounds(signal: AbortSignal): Promise<SeekResult> {
    const { maxAttempts, backoffMs } = this._config;
    let attempts = 0;

    this._logger.info(
      { event: 'seek_started', targetCount: this._targetCount, maxAttempts },
      'Seeking peers'
    );

    while (!this.isTargetMet() && attempts < maxAttempts && !signal.aborted) {
      attempts++;
      await this.runRound(attempts);

      if (this.isTargetMet() || attempts >= maxAttempts || signal.aborted) {
        break;
      }

      try {
        await sleep(backoffMs, undefined, { signal });
      } catch (error) {
        if (!signal.aborted) {
          throw error;
        }
      }
    }

    const peerCount = this._registry.peerCount;
    const targetCount = this._targetCount;

    if (signal.aborted) {
      this._logger.info(
        { event: 'seek_aborted', peerCount, targetCount, attempts },
        'Seek aborted'
      );
      return { status: 'aborted', peerCount, targetCount, attempts };
    }

    if (peerCount >= targetCount) {
      this._registry.notifyAllConnected();
      this._logger.info(
        { event: 'seek_satisfied', peerCount, targetCount, attempts },
        'Seek target reached'
      );
      return { status: 'satisfied', peerCount, targetCount, attempts };
    }

    this._logger.warn(
      { event: 'seek_timeout', peerCount, targetCount, attempts },
      'Seek attempts exhausted'
    );
    this._events.emitLocal('seek_timeout', peerCount, targetCount);
    return { status: 'timeout', peerCount, targetCount, attempts };
  }

  private isTargetMet(): boolean {
    return this._registry.peerCount >= this._targetCount;
  }

  private async runRound(attempt: number): Promise<void> {
    const candidates = selectCandidates(
      this._range,
      this._localAddresses,
      this._registry.connectedAddresses
    );

    this._logger.debug(
      { event: 'seek_round', attempt, candidates: candidates.length },
      'Scanning candidates'
    );

    await Promise.all(
      candidates.map((address) =>
        this._dialer(address).catch((error: unknown) => {
          this._logger.debug(
            {
              event: 'candidate_failed',
              address,
              error: error instanceof Error ? error.message : String(error),
            },
            'Candidate dial failed'
          );
          return false;
        })
      )
    );
  }
}
