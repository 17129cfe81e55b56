import { Candidate, DEFAULT_VIDEO_BONUS_CONFIG, VideoBonusConfig } from '../types/ranking';
import { PriorityQueue } from '../utils/priorityQueue';
import { logger } from '../utils/logger';

export interface DiversityOptions {
  // Per-repeat multiplier: the k-th repeat of an author is scaled by decay^k
  diversityDecay: number;
  videoBonus?: VideoBonusConfig;
}

export interface RankedCandidate extends Candidate {
  rank: number;
  // Effective score after video bonus and author demotion
  score: number;
  baseScore: number;
  videoBonus: number;
  adjustedScore: number;
  diversityFactor: number;
}

interface QueueEntry {
  candidate: Candidate;
  baseScore: number;
  videoBonus: number;
  adjustedScore: number;
  // Author's emitted count when effectiveScore was computed
  authorCount: number;
  effectiveScore: number;
}

/**
 * Video bonus curve: flat at the peak inside [minSeconds, maxSeconds],
 * a linear ramp up from 0s below it, and a half-life decay above it.
 */
export const calculateVideoBonus = (
  durationSec: number | undefined,
  config: VideoBonusConfig = DEFAULT_VIDEO_BONUS_CONFIG
): number => {
  if (durationSec === undefined || !Number.isFinite(durationSec) || durationSec <= 0) {
    return 0;
  }

  const { minSeconds, maxSeconds, peakBonus, falloffSeconds } = config;

  if (durationSec < minSeconds) {
    return peakBonus * (durationSec / minSeconds);
  }
  if (durationSec <= maxSeconds) {
    return peakBonus;
  }
  return peakBonus * Math.pow(0.5, (durationSec - maxSeconds) / falloffSeconds);
};

export const diversityFactor = (repeatCount: number, decay: number): number =>
  Math.pow(decay, repeatCount);

// Demotion must push a score down even when it is negative. The factor
// underflows to 0 after enough repeats, so the result is floored to stay finite.
export const demote = (score: number, factor: number): number =>
  score >= 0 ? score * factor : Math.max(score / factor, -Number.MAX_VALUE);

// Higher score first, then newest, then id
const compareRanked = (
  scoreA: number,
  a: Candidate,
  scoreB: number,
  b: Candidate
): number => {
  if (scoreA !== scoreB) {
    return scoreB - scoreA;
  }
  const timeDiff = b.createdAt.getTime() - a.createdAt.getTime();
  if (timeDiff !== 0) {
    return timeDiff;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
};

/**
 * Adds the video bonus, sorts by adjusted score, then walks the sorted
 * candidates through a priority queue keyed by effective score. When an
 * author's emitted count moves, their queued entries are re-keyed lazily
 * on the next pop, so repeats sink below other authors without being
 * removed.
 */
export const adjustForDiversity = (
  candidates: readonly Candidate[],
  options: DiversityOptions
): RankedCandidate[] => {
  const videoConfig = options.videoBonus ?? DEFAULT_VIDEO_BONUS_CONFIG;

  const entries: QueueEntry[] = candidates.map(candidate => {
    const baseScore = candidate.score ?? 0;
    const videoBonus = calculateVideoBonus(candidate.videoDurationSec, videoConfig);
    const adjustedScore = baseScore + videoBonus;
    return { candidate, baseScore, videoBonus, adjustedScore, authorCount: 0, effectiveScore: adjustedScore };
  });

  entries.sort((a, b) => compareRanked(a.adjustedScore, a.candidate, b.adjustedScore, b.candidate));

  const queue = new PriorityQueue<QueueEntry>((a, b) =>
    compareRanked(a.effectiveScore, a.candidate, b.effectiveScore, b.candidate)
  );
  entries.forEach(entry => queue.push(entry));

  const authorState = new Map<string, number>();
  const ranked: RankedCandidate[] = [];
  let requeued = 0;

  for (let entry = queue.pop(); entry !== undefined; entry = queue.pop()) {
    const emitted = authorState.get(entry.candidate.authorId) ?? 0;

    if (entry.authorCount !== emitted) {
      const factor = diversityFactor(emitted, options.diversityDecay);
      queue.push({
        ...entry,
        authorCount: emitted,
        effectiveScore: demote(entry.adjustedScore, factor),
      });
      requeued++;
      continue;
    }

    authorState.set(entry.candidate.authorId, emitted + 1);
    ranked.push({
      ...entry.candidate,
      rank: ranked.length + 1,
      score: entry.effectiveScore,
      baseScore: entry.baseScore,
      videoBonus: entry.videoBonus,
      adjustedScore: entry.adjustedScore,
      diversityFactor: diversityFactor(emitted, options.diversityDecay),
    });
  }

  logger.debug('Diversity adjustment complete', {
    ranked: ranked.length,
    authors: authorState.size,
    requeued,
  });

  return ranked;
};
