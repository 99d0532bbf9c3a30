/**
 * Candidate address enumeration for the discovery scanner
 *
 * @packageDocumentation
 */

import type { DiscoveryConfig } from '../config/types';

/**
 * Every address of the configured contiguous range, in order
 *
 * @example
 * ```typescript
 * buildCandidateRange({ addressPrefix: '10.0.0.', addressStart: 5, addressCount: 3 });
 * // ['10.0.0.5', '10.0.0.6', '10.0.0.7']
 * ```
 */
export function buildCandidateRange(
  config: Pick<DiscoveryConfig, 'addressPrefix' | 'addressStart' | 'addressCount'>
): string[] {
  return Array.from(
    { length: config.addressCount },
    (_, offset) => `${config.addressPrefix}${config.addressStart + offset}`
  );
}

/**
 * Candidates worth dialing this round: the range minus local and already
 * connected addresses
 */
export function selectCandidates(
  range: readonly string[],
  localAddresses: ReadonlySet<string>,
  connectedAddresses: ReadonlySet<string>
): string[] {
  return range.filter(
    (address) => !localAddresses.has(address) && !connectedAddresses.has(address)
  );
}
