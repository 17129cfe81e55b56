import { Candidate } from '../types/ranking';
import { EmptyPoolError } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * Merges the two candidate sources into one pool: in-network first, then
 * discovery, each in its source order. No interleaving and no size limit.
 */
export const buildCandidatePool = (
  inNetwork: readonly Candidate[],
  discovery: readonly Candidate[]
): Candidate[] => {
  if (inNetwork.length === 0 && discovery.length === 0) {
    throw new EmptyPoolError();
  }

  const pool = [...inNetwork, ...discovery];

  logger.debug('Candidate pool built', {
    inNetwork: inNetwork.length,
    discovery: discovery.length,
  });

  return pool;
};

// Caller-imposed pool size cap, applied after the pool is built
export const capPool = (pool: readonly Candidate[], cap: number): Candidate[] => {
  if (pool.length <= cap) {
    return [...pool];
  }
  logger.warn('Candidate pool truncated to size cap', { size: pool.length, cap });
  return pool.slice(0, cap);
};
