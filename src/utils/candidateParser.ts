import {
  ActionKind,
  ActionPredictions,
  Candidate,
  CandidateOrigin,
  VideoBonusConfig,
  ViewerContext,
  isActionKind,
} from '../types/ranking';
import { RankingConfigOverrides } from '../config/ranking';
import { createViewerContext } from '../pipeline/filterStage';
import { CandidateValidationError, ConfigurationError, InvalidProbabilityError } from './errors';
import { rankingErrorMessages } from './errorMessages';

type JsonObject = Record<string, unknown>;

export const isObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isNonEmptyString = (value: unknown): value is string =>
  typeof value === 'string' && value.trim().length > 0;

const optionalStringList = (value: unknown, field: string): string[] => {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new CandidateValidationError(`${field} must be an array of strings`);
  }
  return value;
};

const parseDate = (value: unknown, field: string): Date => {
  if (typeof value !== 'string' && typeof value !== 'number') {
    throw new CandidateValidationError(`${field} must be an ISO date string or epoch milliseconds`);
  }
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new CandidateValidationError(`${field} is not a valid date: ${String(value)}`);
  }
  return date;
};

export const parsePredictions = (value: unknown, candidateId?: string): ActionPredictions => {
  if (value === undefined) {
    return {};
  }
  if (!isObject(value)) {
    throw new CandidateValidationError(rankingErrorMessages.PREDICTIONS_REQUIRED);
  }

  const predictions: ActionPredictions = {};
  for (const [key, probability] of Object.entries(value)) {
    if (!isActionKind(key)) {
      throw new CandidateValidationError(`${rankingErrorMessages.UNKNOWN_ACTION}: ${key}`);
    }
    // Checked here so candidates the filter later drops are rejected too
    if (typeof probability !== 'number' || !(probability >= 0 && probability <= 1)) {
      throw new InvalidProbabilityError(key, probability, candidateId);
    }
    predictions[key] = probability;
  }
  return predictions;
};

export const parseCandidate = (value: unknown, origin: CandidateOrigin, index: number): Candidate => {
  const where = `${origin}[${index}]`;
  if (!isObject(value)) {
    throw new CandidateValidationError(`${where} must be an object`);
  }

  const { id, authorId, text, videoDurationSec, repostOf, flagged } = value;
  if (!isNonEmptyString(id)) {
    throw new CandidateValidationError(`${where}.id is required`);
  }
  if (!isNonEmptyString(authorId)) {
    throw new CandidateValidationError(`${where}.authorId is required`);
  }
  if (text !== undefined && typeof text !== 'string') {
    throw new CandidateValidationError(`${where}.text must be a string`);
  }

  const candidate: Candidate = {
    id,
    authorId,
    origin,
    createdAt: parseDate(value.createdAt, `${where}.createdAt`),
    text: typeof text === 'string' ? text : '',
    predictions: parsePredictions(value.predictions, id),
  };

  if (videoDurationSec !== undefined && videoDurationSec !== null) {
    if (typeof videoDurationSec !== 'number' || !Number.isFinite(videoDurationSec) || videoDurationSec < 0) {
      throw new CandidateValidationError(`${where}.videoDurationSec must be a non-negative number`);
    }
    candidate.videoDurationSec = videoDurationSec;
  }
  if (repostOf !== undefined) {
    if (!isNonEmptyString(repostOf)) {
      throw new CandidateValidationError(`${where}.repostOf must be a non-empty string`);
    }
    candidate.repostOf = repostOf;
  }
  if (flagged !== undefined) {
    if (typeof flagged !== 'boolean') {
      throw new CandidateValidationError(`${where}.flagged must be a boolean`);
    }
    candidate.flagged = flagged;
  }

  return candidate;
};

/**
 * Parses both candidate sources, rejecting duplicate ids across the pool
 */
export const parseCandidateSources = (
  inNetwork: unknown,
  discovery: unknown
): { inNetwork: Candidate[]; discovery: Candidate[] } => {
  if (!Array.isArray(inNetwork) || !Array.isArray(discovery)) {
    throw new CandidateValidationError(rankingErrorMessages.CANDIDATES_REQUIRED);
  }

  const parsedInNetwork = inNetwork.map((c, i) => parseCandidate(c, CandidateOrigin.IN_NETWORK, i));
  const parsedDiscovery = discovery.map((c, i) => parseCandidate(c, CandidateOrigin.DISCOVERY, i));

  const ids = new Set<string>();
  for (const candidate of [...parsedInNetwork, ...parsedDiscovery]) {
    if (ids.has(candidate.id)) {
      throw new CandidateValidationError(`${rankingErrorMessages.DUPLICATE_CANDIDATE_ID}: ${candidate.id}`);
    }
    ids.add(candidate.id);
  }

  return { inNetwork: parsedInNetwork, discovery: parsedDiscovery };
};

export const parseViewerContext = (viewerId: string, value: unknown): ViewerContext => {
  if (value === undefined) {
    return createViewerContext(viewerId);
  }
  if (!isObject(value)) {
    throw new CandidateValidationError('viewer must be an object');
  }
  return createViewerContext(viewerId, {
    seenPostIds: new Set(optionalStringList(value.seenPostIds, 'viewer.seenPostIds')),
    blockedAuthorIds: new Set(optionalStringList(value.blockedAuthorIds, 'viewer.blockedAuthorIds')),
    mutedAuthorIds: new Set(optionalStringList(value.mutedAuthorIds, 'viewer.mutedAuthorIds')),
    mutedKeywords: optionalStringList(value.mutedKeywords, 'viewer.mutedKeywords'),
  });
};

const optionalNumber = (source: JsonObject, key: string, option: string): number | undefined => {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number') {
    throw new ConfigurationError(option, 'must be a number');
  }
  return value;
};

export const parseWeightOverrides = (value: unknown): Partial<Record<ActionKind, number>> | undefined => {
  if (value === undefined) {
    return undefined;
  }
  if (!isObject(value)) {
    throw new ConfigurationError('weights', 'must be an object');
  }
  const weights: Partial<Record<ActionKind, number>> = {};
  for (const [key, weight] of Object.entries(value)) {
    if (!isActionKind(key)) {
      throw new ConfigurationError(`weights.${key}`, 'is not a known action kind');
    }
    if (typeof weight !== 'number') {
      throw new ConfigurationError(`weights.${key}`, 'must be a number');
    }
    weights[key] = weight;
  }
  return weights;
};

export const parseConfigOverrides = (value: unknown): RankingConfigOverrides => {
  if (value === undefined) {
    return {};
  }
  if (!isObject(value)) {
    throw new ConfigurationError('config', 'must be an object');
  }

  const overrides: RankingConfigOverrides = {
    weights: parseWeightOverrides(value.weights),
    stalenessWindowHours: optionalNumber(value, 'stalenessWindowHours', 'stalenessWindowHours'),
    diversityDecay: optionalNumber(value, 'diversityDecay', 'diversityDecay'),
    poolSizeCap: optionalNumber(value, 'poolSizeCap', 'poolSizeCap'),
  };

  const { mutedKeywords, videoBonus } = value;
  if (mutedKeywords !== undefined) {
    if (!Array.isArray(mutedKeywords) ||
        !mutedKeywords.every((k): k is string => typeof k === 'string')) {
      throw new ConfigurationError('mutedKeywords', 'must be an array of strings');
    }
    overrides.mutedKeywords = mutedKeywords;
  }

  if (videoBonus !== undefined) {
    if (!isObject(videoBonus)) {
      throw new ConfigurationError('videoBonus', 'must be an object');
    }
    const video: Partial<VideoBonusConfig> = {};
    const keys: (keyof VideoBonusConfig)[] = ['minSeconds', 'maxSeconds', 'peakBonus', 'falloffSeconds'];
    for (const key of keys) {
      const parsed = optionalNumber(videoBonus, key, `videoBonus.${key}`);
      if (parsed !== undefined) {
        video[key] = parsed;
      }
    }
    overrides.videoBonus = video;
  }

  return overrides;
};
