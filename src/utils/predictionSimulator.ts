import { ActionKind, ActionPredictions, Candidate } from '../types/ranking';

export type RandomSource = () => number;

const MAX_PROBABILITY = 0.95;

const hashSeed = (seed: string): number => {
  let h = 0;
  for (let i = 0; i < seed.length; i += 1) {
    h = (h << 5) - h + seed.charCodeAt(i);
    h |= 0;
  }
  return h >>> 0;
};

/**
 * Deterministic PRNG (mulberry32) so demo feeds are reproducible.
 */
export const createSeededRandom = (seed: string | number): RandomSource => {
  let state = typeof seed === 'number' ? seed >>> 0 : hashSeed(seed);
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

const uniform = (random: RandomSource, min: number, max: number): number =>
  min + (max - min) * random();

const clamp = (value: number): number => Math.min(MAX_PROBABILITY, Math.max(0, value));

/**
 * Stand-in for the external engagement predictor. Produces plausible
 * per-action probabilities: followed authors get a boost on social
 * actions, videos on watch predictions, and negative signals stay small.
 */
export const simulatePredictions = (
  candidate: Candidate,
  viewerFollowsAuthor: boolean,
  random: RandomSource = Math.random
): ActionPredictions => {
  const base = uniform(random, 0.01, 0.05);
  const networkBoost = viewerFollowsAuthor ? 1.5 : 1.0;
  const hasVideo = candidate.videoDurationSec !== undefined;
  const videoBoost = hasVideo ? 1.3 : 1.0;

  return {
    [ActionKind.LIKE]: clamp(base * 3 * networkBoost + uniform(random, 0, 0.1)),
    [ActionKind.REPLY]: clamp(base * 0.5 * networkBoost + uniform(random, 0, 0.03)),
    [ActionKind.REPOST]: clamp(base * 0.8 * networkBoost + uniform(random, 0, 0.05)),
    [ActionKind.QUOTE]: clamp(base * 0.3 * networkBoost + uniform(random, 0, 0.02)),
    [ActionKind.CLICK]: clamp(base * 2 + uniform(random, 0, 0.15)),
    [ActionKind.PROFILE_CLICK]: clamp(base * 0.4 + uniform(random, 0, 0.05)),
    [ActionKind.VIDEO_WATCH]: clamp(hasVideo ? base * 4 * videoBoost : 0.01),
    [ActionKind.PHOTO_EXPAND]: clamp(base * 0.6 + uniform(random, 0, 0.05)),
    [ActionKind.SHARE]: clamp(base * 0.4 * networkBoost + uniform(random, 0, 0.03)),
    [ActionKind.DWELL]: clamp(base * 5 + uniform(random, 0, 0.2)),
    // Already-followed authors cannot be followed again
    [ActionKind.FOLLOW]: clamp(viewerFollowsAuthor ? 0.001 : base * 0.1),
    [ActionKind.NOT_INTERESTED]: Math.max(0.001, uniform(random, 0, 0.02)),
    [ActionKind.BLOCK]: Math.max(0.001, uniform(random, 0, 0.005)),
    [ActionKind.MUTE]: Math.max(0.001, uniform(random, 0, 0.008)),
    [ActionKind.REPORT]: Math.max(0.001, uniform(random, 0, 0.002)),
  };
};

export const simulateCandidatePredictions = (
  candidates: readonly Candidate[],
  following: ReadonlySet<string>,
  random: RandomSource = Math.random
): Candidate[] =>
  candidates.map(candidate => ({
    ...candidate,
    predictions: simulatePredictions(candidate, following.has(candidate.authorId), random),
  }));
