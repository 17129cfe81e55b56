/**
 * Ranking types for the feed simulator
 */
export enum ActionKind {
  LIKE = 'like',
  REPLY = 'reply',
  REPOST = 'repost',
  QUOTE = 'quote',
  SHARE = 'share',
  VIDEO_WATCH = 'video_watch',
  CLICK = 'click',
  PROFILE_CLICK = 'profile_click',
  PHOTO_EXPAND = 'photo_expand',
  DWELL = 'dwell',
  FOLLOW = 'follow',
  // Negative signals, subtracted from the score
  NOT_INTERESTED = 'not_interested',
  BLOCK = 'block',
  MUTE = 'mute',
  REPORT = 'report',
}

export const NEGATIVE_ACTIONS: ReadonlySet<ActionKind> = new Set([
  ActionKind.NOT_INTERESTED,
  ActionKind.BLOCK,
  ActionKind.MUTE,
  ActionKind.REPORT,
]);

export const ALL_ACTIONS: readonly ActionKind[] = Object.values(ActionKind);

export const isActionKind = (value: string): value is ActionKind =>
  ALL_ACTIONS.some(action => action === value);

export enum CandidateOrigin {
  IN_NETWORK = 'in_network',
  DISCOVERY = 'discovery',
}

export type ActionPredictions = Partial<Record<ActionKind, number>>;

// All magnitudes are positive; negative actions are subtracted
export type ActionWeights = Record<ActionKind, number>;

export interface Candidate {
  id: string;
  authorId: string;
  origin: CandidateOrigin;
  createdAt: Date;
  text: string;
  videoDurationSec?: number;
  // Id of the original post when this candidate is a repost
  repostOf?: string;
  flagged?: boolean;
  predictions: ActionPredictions;
  score?: number;
  rank?: number;
}

export interface ViewerContext {
  viewerId: string;
  seenPostIds: ReadonlySet<string>;
  blockedAuthorIds: ReadonlySet<string>;
  mutedAuthorIds: ReadonlySet<string>;
  mutedKeywords: readonly string[];
}

export interface VideoBonusConfig {
  minSeconds: number;
  maxSeconds: number;
  peakBonus: number;
  // Half-life of the bonus past maxSeconds
  falloffSeconds: number;
}

export interface RankingConfig {
  weights: ActionWeights;
  stalenessWindowHours: number;
  videoBonus: VideoBonusConfig;
  diversityDecay: number;
  mutedKeywords: string[];
  poolSizeCap: number;
}

export const DEFAULT_ACTION_WEIGHTS: ActionWeights = {
  [ActionKind.LIKE]: 1.0,
  [ActionKind.REPLY]: 2.0, // deeper engagement
  [ActionKind.REPOST]: 1.5,
  [ActionKind.QUOTE]: 2.5, // creates new content
  [ActionKind.SHARE]: 1.5,
  [ActionKind.VIDEO_WATCH]: 0.8,
  [ActionKind.CLICK]: 0.5,
  [ActionKind.PROFILE_CLICK]: 0.3,
  [ActionKind.PHOTO_EXPAND]: 0.3,
  [ActionKind.DWELL]: 0.2,
  [ActionKind.FOLLOW]: 3.0,
  [ActionKind.NOT_INTERESTED]: 5.0,
  [ActionKind.BLOCK]: 10.0,
  [ActionKind.MUTE]: 8.0,
  [ActionKind.REPORT]: 15.0,
};

export const DEFAULT_VIDEO_BONUS_CONFIG: VideoBonusConfig = {
  minSeconds: 15,
  maxSeconds: 60,
  peakBonus: 0.5,
  falloffSeconds: 60,
};

export const DEFAULT_RANKING_CONFIG: RankingConfig = {
  weights: DEFAULT_ACTION_WEIGHTS,
  stalenessWindowHours: 48,
  videoBonus: DEFAULT_VIDEO_BONUS_CONFIG,
  diversityDecay: 0.7,
  mutedKeywords: [],
  poolSizeCap: 1000,
};

export interface ActionContribution {
  action: ActionKind;
  probability: number;
  weight: number;
  // Signed: negative for penalty actions
  contribution: number;
}

export interface ScoreBreakdown {
  contributions: ActionContribution[];
  positiveTotal: number;
  negativeTotal: number;
  finalScore: number;
}

export interface RankedPost {
  id: string;
  authorId: string;
  origin: CandidateOrigin;
  createdAt: Date;
  rank: number;
  baseScore: number;
  videoBonus: number;
  adjustedScore: number;
  diversityFactor: number;
  score: number;
}

export interface FeedStats {
  poolSize: number;
  filtered: number;
  ranked: number;
  durationMs: number;
}

export interface RankedFeed {
  posts: RankedPost[];
  stats: FeedStats;
}
