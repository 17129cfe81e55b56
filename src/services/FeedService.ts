import {
  Candidate,
  RankedFeed,
  RankedPost,
  RankingConfig,
  ViewerContext,
} from '../types/ranking';
import { loadRankingConfig, mergeRankingConfig, RankingConfigOverrides } from '../config/ranking';
import { buildCandidatePool, capPool } from '../pipeline/candidatePool';
import { filterCandidates } from '../pipeline/filterStage';
import { adjustForDiversity, RankedCandidate } from '../pipeline/diversityAdjuster';
import { ScoreCalculator } from '../utils/scoreCalculator';
import { simulateCandidatePredictions, createSeededRandom } from '../utils/predictionSimulator';
import { logger } from '../utils/logger';

export interface FeedRequest {
  inNetwork: Candidate[];
  discovery: Candidate[];
  viewer: ViewerContext;
  config?: RankingConfigOverrides;
  now?: Date;
}

export interface SimulatedFeedRequest extends FeedRequest {
  following: ReadonlySet<string>;
  seed?: string | number;
}

export const toRankedPost = (candidate: RankedCandidate): RankedPost => ({
  id: candidate.id,
  authorId: candidate.authorId,
  origin: candidate.origin,
  createdAt: candidate.createdAt,
  rank: candidate.rank,
  baseScore: candidate.baseScore,
  videoBonus: candidate.videoBonus,
  adjustedScore: candidate.adjustedScore,
  diversityFactor: candidate.diversityFactor,
  score: candidate.score,
});

/**
 * FeedService runs one feed-generation call:
 * pool → filter → score → diversity adjustment.
 * Everything happens in memory; nothing outlives the call.
 */
export class FeedService {
  private readonly baseConfig: RankingConfig;

  constructor(config: RankingConfig = loadRankingConfig()) {
    this.baseConfig = config;
  }

  getConfig(): RankingConfig {
    return this.baseConfig;
  }

  resolveConfig(overrides?: RankingConfigOverrides): RankingConfig {
    return mergeRankingConfig(this.baseConfig, overrides);
  }

  generateFeed(request: FeedRequest): RankedFeed {
    const start = Date.now();
    // Configuration errors surface before any candidate is touched
    const config = this.resolveConfig(request.config);
    const now = request.now ?? new Date();

    const pool = capPool(buildCandidatePool(request.inNetwork, request.discovery), config.poolSizeCap);

    const survivors = filterCandidates(pool, request.viewer, {
      now,
      stalenessWindowHours: config.stalenessWindowHours,
      mutedKeywords: config.mutedKeywords,
    });

    const scored = ScoreCalculator.scoreCandidates(survivors, config.weights);

    const ranked = adjustForDiversity(scored, {
      diversityDecay: config.diversityDecay,
      videoBonus: config.videoBonus,
    });

    const stats = {
      poolSize: pool.length,
      filtered: pool.length - survivors.length,
      ranked: ranked.length,
      durationMs: Date.now() - start,
    };

    logger.info('Feed generated', { viewerId: request.viewer.viewerId, ...stats });

    return { posts: ranked.map(toRankedPost), stats };
  }

  /**
   * Fills predictions from the simulator before ranking, for demos
   * where no real predictor is wired in.
   */
  generateSimulatedFeed(request: SimulatedFeedRequest): RankedFeed {
    const random = request.seed !== undefined ? createSeededRandom(request.seed) : Math.random;
    return this.generateFeed({
      ...request,
      inNetwork: simulateCandidatePredictions(request.inNetwork, request.following, random),
      discovery: simulateCandidatePredictions(request.discovery, request.following, random),
    });
  }
}
