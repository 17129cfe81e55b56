import { Candidate, ViewerContext } from '../types/ranking';
import { logger } from '../utils/logger';

export type FilterReason =
  | 'seen'
  | 'own_post'
  | 'blocked_author'
  | 'muted_author'
  | 'muted_keyword'
  | 'duplicate_repost'
  | 'stale'
  | 'flagged';

export interface FilterOptions {
  now: Date;
  stalenessWindowHours: number;
  // Global muted keywords, applied on top of the viewer's own list
  mutedKeywords?: readonly string[];
}

const MS_PER_HOUR = 60 * 60 * 1000;

export const normalizeKeywords = (keywords: readonly string[]): string[] =>
  keywords.map(k => k.trim().toLowerCase()).filter(k => k.length > 0);

// Reposts collapse onto the post they repost; originals key on themselves
export const dedupKey = (candidate: Candidate): string => candidate.repostOf ?? candidate.id;

/**
 * Returns the first rule the candidate breaks, or null when it survives.
 * `keptKeys` holds the dedup keys of candidates already kept.
 */
export const getFilterReason = (
  candidate: Candidate,
  viewer: ViewerContext,
  keywords: readonly string[],
  keptKeys: ReadonlySet<string>,
  options: FilterOptions
): FilterReason | null => {
  if (viewer.seenPostIds.has(candidate.id)) return 'seen';
  if (candidate.authorId === viewer.viewerId) return 'own_post';
  if (viewer.blockedAuthorIds.has(candidate.authorId)) return 'blocked_author';
  if (viewer.mutedAuthorIds.has(candidate.authorId)) return 'muted_author';

  const text = candidate.text.toLowerCase();
  if (keywords.some(keyword => text.includes(keyword))) return 'muted_keyword';

  if (keptKeys.has(dedupKey(candidate))) return 'duplicate_repost';

  // Future timestamps have a negative age and are kept
  const ageMs = options.now.getTime() - candidate.createdAt.getTime();
  if (ageMs > options.stalenessWindowHours * MS_PER_HOUR) return 'stale';

  if (candidate.flagged) return 'flagged';

  return null;
};

/**
 * Keeps the candidates that pass every exclusion rule, in their original
 * order. Candidates are not mutated; an empty result is a valid feed.
 */
export const filterCandidates = (
  candidates: readonly Candidate[],
  viewer: ViewerContext,
  options: FilterOptions
): Candidate[] => {
  const keywords = normalizeKeywords([...viewer.mutedKeywords, ...(options.mutedKeywords ?? [])]);
  const keptKeys = new Set<string>();
  const dropped: Partial<Record<FilterReason, number>> = {};
  const kept: Candidate[] = [];

  for (const candidate of candidates) {
    const reason = getFilterReason(candidate, viewer, keywords, keptKeys, options);
    if (reason) {
      dropped[reason] = (dropped[reason] ?? 0) + 1;
      continue;
    }
    keptKeys.add(dedupKey(candidate));
    kept.push(candidate);
  }

  logger.debug('Filter stage complete', { input: candidates.length, kept: kept.length, dropped });

  return kept;
};

export const createViewerContext = (
  viewerId: string,
  overrides: Partial<Omit<ViewerContext, 'viewerId'>> = {}
): ViewerContext => ({
  viewerId,
  seenPostIds: overrides.seenPostIds ?? new Set<string>(),
  blockedAuthorIds: overrides.blockedAuthorIds ?? new Set<string>(),
  mutedAuthorIds: overrides.mutedAuthorIds ?? new Set<string>(),
  mutedKeywords: overrides.mutedKeywords ?? [],
});
