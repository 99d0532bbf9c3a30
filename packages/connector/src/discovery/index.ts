/**
 * Discovery Module
 *
 * Exports the address-range scanner used by seekPeers.
 */

export { PeerScanner } from './peer-scanner';
export type { PeerScannerOptions } from './peer-scanner';
export { buildCandidateRange, selectCandidates } from './candidate-addresses';
export type { SeekStatus, SeekResult, CandidateDialer } from './types';
