import { Request, Response } from 'express';
import { FeedService } from '../services/FeedService';
import { ScoreCalculator } from '../utils/scoreCalculator';
import { handleFeedError } from '../utils/errorHandlers';
import {
  isObject,
  parseCandidateSources,
  parseConfigOverrides,
  parsePredictions,
  parseViewerContext,
  parseWeightOverrides,
} from '../utils/candidateParser';
import { CandidateValidationError } from '../utils/errors';
import { rankingErrorMessages } from '../utils/errorMessages';

let feedService: FeedService | null = null;

// Lazy so the configuration is read from the environment on first use
function getFeedService(): FeedService {
  if (!feedService) {
    feedService = new FeedService();
  }
  return feedService;
}

// Test helper to swap or reset the service instance
export function setFeedService(service: FeedService | null): void {
  feedService = service;
}

const readBody = (req: Request): Record<string, unknown> => {
  const body: unknown = req.body;
  return isObject(body) ? body : {};
};

const parseNow = (value: unknown): Date | undefined => {
  if (value === undefined) {
    return undefined;
  }
  const now = typeof value === 'string' || typeof value === 'number' ? new Date(value) : null;
  if (!now || Number.isNaN(now.getTime())) {
    throw new CandidateValidationError('now must be an ISO date string or epoch milliseconds');
  }
  return now;
};

const parseSeed = (value: unknown): string | number | undefined => {
  if (value === undefined || typeof value === 'string' || typeof value === 'number') {
    return value;
  }
  throw new CandidateValidationError('seed must be a string or number');
};

const parseFollowing = (value: unknown): Set<string> => {
  if (value === undefined) {
    return new Set();
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new CandidateValidationError('following must be an array of strings');
  }
  return new Set(value);
};

// Auth middleware guarantees this is set
const viewerIdOf = (req: Request): string => req.viewerId ?? '';

export const rankFeed = (req: Request, res: Response) => {
  try {
    const body = readBody(req);
    const sources = parseCandidateSources(body.inNetwork, body.discovery);

    const feed = getFeedService().generateFeed({
      ...sources,
      viewer: parseViewerContext(viewerIdOf(req), body.viewer),
      config: parseConfigOverrides(body.config),
      now: parseNow(body.now),
    });

    res.json({
      success: true,
      data: feed.posts,
      stats: feed.stats,
    });
  } catch (error) {
    handleFeedError(error, res, 'Rank feed');
  }
};

export const simulateFeed = (req: Request, res: Response) => {
  try {
    const body = readBody(req);
    const sources = parseCandidateSources(body.inNetwork, body.discovery);
    const seed = parseSeed(body.seed);

    const feed = getFeedService().generateSimulatedFeed({
      ...sources,
      viewer: parseViewerContext(viewerIdOf(req), body.viewer),
      config: parseConfigOverrides(body.config),
      now: parseNow(body.now),
      following: parseFollowing(body.following),
      seed,
    });

    res.json({
      success: true,
      data: feed.posts,
      stats: feed.stats,
      seed: seed ?? null,
    });
  } catch (error) {
    handleFeedError(error, res, 'Simulate feed');
  }
};

export const scorePredictions = (req: Request, res: Response) => {
  try {
    const body = readBody(req);

    if (!isObject(body.predictions)) {
      return res.status(400).json({
        success: false,
        error: rankingErrorMessages.PREDICTIONS_REQUIRED,
      });
    }

    const config = getFeedService().resolveConfig({ weights: parseWeightOverrides(body.weights) });
    const breakdown = ScoreCalculator.calculateScore(parsePredictions(body.predictions), config.weights);

    res.json({
      success: true,
      data: {
        ...breakdown,
        topContributions: ScoreCalculator.topContributions(breakdown),
      },
    });
  } catch (error) {
    handleFeedError(error, res, 'Score predictions');
  }
};

export const getRankingConfig = (req: Request, res: Response) => {
  try {
    res.json({
      success: true,
      data: getFeedService().getConfig(),
    });
  } catch (error) {
    handleFeedError(error, res, 'Get ranking config');
  }
};
