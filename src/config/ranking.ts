import {
  ActionKind,
  ActionWeights,
  ALL_ACTIONS,
  DEFAULT_RANKING_CONFIG,
  RankingConfig,
  VideoBonusConfig,
} from '../types/ranking';
import { ConfigurationError } from '../utils/errors';
import { logger } from '../utils/logger';

type Env = Record<string, string | undefined>;

export interface RankingConfigOverrides {
  weights?: Partial<ActionWeights>;
  stalenessWindowHours?: number;
  videoBonus?: Partial<VideoBonusConfig>;
  diversityDecay?: number;
  mutedKeywords?: string[];
  poolSizeCap?: number;
}

// RANKING_WEIGHT_NOT_INTERESTED, RANKING_WEIGHT_VIDEO_WATCH, ...
export const weightEnvName = (action: ActionKind): string =>
  `RANKING_WEIGHT_${action.toUpperCase()}`;

const readNumber = (env: Env, name: string, fallback: number): number => {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number(raw.trim());
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(name, `is not a number: "${raw}"`);
  }
  return parsed;
};

const requireFinite = (option: string, value: number): void => {
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(option, 'must be a finite number');
  }
};

/**
 * Fails fast on any out-of-range option. Called before a single candidate
 * is processed, both at startup and for per-request overrides.
 */
export const validateRankingConfig = (config: RankingConfig): RankingConfig => {
  for (const action of ALL_ACTIONS) {
    const weight = config.weights[action];
    requireFinite(`weights.${action}`, weight);
    if (weight < 0) {
      throw new ConfigurationError(`weights.${action}`, 'must be a non-negative magnitude');
    }
  }

  requireFinite('stalenessWindowHours', config.stalenessWindowHours);
  if (config.stalenessWindowHours <= 0) {
    throw new ConfigurationError('stalenessWindowHours', 'must be greater than 0');
  }

  const { minSeconds, maxSeconds, peakBonus, falloffSeconds } = config.videoBonus;
  requireFinite('videoBonus.minSeconds', minSeconds);
  requireFinite('videoBonus.maxSeconds', maxSeconds);
  requireFinite('videoBonus.peakBonus', peakBonus);
  requireFinite('videoBonus.falloffSeconds', falloffSeconds);
  if (minSeconds < 0) {
    throw new ConfigurationError('videoBonus.minSeconds', 'must be non-negative');
  }
  if (maxSeconds < minSeconds) {
    throw new ConfigurationError('videoBonus.maxSeconds', 'must be at least videoBonus.minSeconds');
  }
  if (peakBonus < 0) {
    throw new ConfigurationError('videoBonus.peakBonus', 'must be non-negative');
  }
  if (falloffSeconds <= 0) {
    throw new ConfigurationError('videoBonus.falloffSeconds', 'must be greater than 0');
  }

  requireFinite('diversityDecay', config.diversityDecay);
  if (config.diversityDecay <= 0 || config.diversityDecay > 1) {
    throw new ConfigurationError('diversityDecay', 'must be in the range (0, 1]');
  }

  if (!Number.isInteger(config.poolSizeCap) || config.poolSizeCap < 1) {
    throw new ConfigurationError('poolSizeCap', 'must be a positive integer');
  }

  if (config.mutedKeywords.some(keyword => typeof keyword !== 'string')) {
    throw new ConfigurationError('mutedKeywords', 'must contain only strings');
  }

  return config;
};

export const mergeRankingConfig = (
  base: RankingConfig,
  overrides: RankingConfigOverrides = {}
): RankingConfig => {
  return validateRankingConfig({
    weights: { ...base.weights, ...overrides.weights },
    stalenessWindowHours: overrides.stalenessWindowHours ?? base.stalenessWindowHours,
    videoBonus: { ...base.videoBonus, ...overrides.videoBonus },
    diversityDecay: overrides.diversityDecay ?? base.diversityDecay,
    mutedKeywords: overrides.mutedKeywords ?? base.mutedKeywords,
    poolSizeCap: overrides.poolSizeCap ?? base.poolSizeCap,
  });
};

/**
 * Builds the ranking configuration from environment variables, falling
 * back to DEFAULT_RANKING_CONFIG for anything unset.
 */
export const loadRankingConfig = (env: Env = process.env): RankingConfig => {
  const defaults = DEFAULT_RANKING_CONFIG;

  const weights = { ...defaults.weights };
  for (const action of ALL_ACTIONS) {
    weights[action] = readNumber(env, weightEnvName(action), defaults.weights[action]);
  }

  const mutedKeywords = env.RANKING_MUTED_KEYWORDS
    ? env.RANKING_MUTED_KEYWORDS.split(',').map(k => k.trim()).filter(k => k.length > 0)
    : defaults.mutedKeywords;

  const config = validateRankingConfig({
    weights,
    stalenessWindowHours: readNumber(env, 'RANKING_STALENESS_HOURS', defaults.stalenessWindowHours),
    videoBonus: {
      minSeconds: readNumber(env, 'RANKING_VIDEO_MIN_SECONDS', defaults.videoBonus.minSeconds),
      maxSeconds: readNumber(env, 'RANKING_VIDEO_MAX_SECONDS', defaults.videoBonus.maxSeconds),
      peakBonus: readNumber(env, 'RANKING_VIDEO_PEAK_BONUS', defaults.videoBonus.peakBonus),
      falloffSeconds: readNumber(env, 'RANKING_VIDEO_FALLOFF_SECONDS', defaults.videoBonus.falloffSeconds),
    },
    diversityDecay: readNumber(env, 'RANKING_DIVERSITY_DECAY', defaults.diversityDecay),
    mutedKeywords,
    poolSizeCap: readNumber(env, 'RANKING_POOL_SIZE_CAP', defaults.poolSizeCap),
  });

  logger.debug('Ranking configuration loaded', {
    stalenessWindowHours: config.stalenessWindowHours,
    diversityDecay: config.diversityDecay,
    poolSizeCap: config.poolSizeCap,
  });

  return config;
};
