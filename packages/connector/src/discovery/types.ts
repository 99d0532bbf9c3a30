/**
 * Discovery Scanner Type Definitions
 */

/**
 * How a seek ended
 *
 * - `satisfied`: the target peer count was reached (or already met)
 * - `timeout`: every round ran and the target was not reached
 * - `aborted`: the node stopped while the seek was running
 */
export type SeekStatus = 'satisfied' | 'timeout' | 'aborted';

/**
 * Result of one seekPeers call
 */
export interface SeekResult {
  status: SeekStatus;

  /** Peer count when the seek ended */
  peerCount: number;

  /** Total peer count the seek aimed for */
  targetCount: number;

  /** Scan rounds run; 0 when the target was already met */
  attempts: number;
}

/**
 * Attempts the initiator handshake with one candidate address
 *
 * Resolves true when the candidate was admitted. Expected to settle within
 * the handshake timeouts and never reject; a rejection counts as a failed
 * candidate.
 */
export type CandidateDialer = (address: string) => Promise<boolean>;
