import {
  createViewerContext,
  filterCandidates,
  getFilterReason,
  normalizeKeywords,
} from '../../../pipeline/filterStage';
import { ActionKind, Candidate } from '../../../types/ranking';
import { NOW, hoursAgo, makeCandidate } from '../../utils/testUtils';

jest.mock('../../../utils/logger');

const options = { now: NOW, stalenessWindowHours: 48 };
const ids = (candidates: Candidate[]) => candidates.map(c => c.id);

describe('Filter Stage', () => {
  const viewer = createViewerContext('viewer-1', {
    seenPostIds: new Set(['seen-post']),
    blockedAuthorIds: new Set(['blocked-author']),
    mutedAuthorIds: new Set(['muted-author']),
    mutedKeywords: ['spam'],
  });

  it('should drop posts the viewer has already seen', () => {
    const result = filterCandidates(
      [makeCandidate({ id: 'seen-post' }), makeCandidate({ id: 'fresh' })],
      viewer,
      options
    );

    expect(ids(result)).toEqual(['fresh']);
  });

  it("should drop the viewer's own posts", () => {
    const result = filterCandidates(
      [makeCandidate({ id: 'mine', authorId: 'viewer-1' }), makeCandidate({ id: 'theirs' })],
      viewer,
      options
    );

    expect(ids(result)).toEqual(['theirs']);
  });

  it('should drop blocked and muted authors', () => {
    const result = filterCandidates(
      [
        makeCandidate({ id: 'p1', authorId: 'blocked-author' }),
        makeCandidate({ id: 'p2', authorId: 'muted-author' }),
        makeCandidate({ id: 'p3', authorId: 'friend' }),
      ],
      viewer,
      options
    );

    expect(ids(result)).toEqual(['p3']);
  });

  it('should exclude a candidate containing a muted keyword regardless of its score', () => {
    const result = filterCandidates(
      [
        makeCandidate({
          id: 'loud',
          text: 'Totally not SPAM, click here',
          predictions: { [ActionKind.LIKE]: 0.95, [ActionKind.FOLLOW]: 0.95 },
        }),
        makeCandidate({ id: 'quiet', text: 'a calm update' }),
      ],
      viewer,
      options
    );

    expect(ids(result)).toEqual(['quiet']);
  });

  it('should apply global muted keywords on top of the viewer list', () => {
    const result = filterCandidates(
      [makeCandidate({ id: 'p1', text: 'Crypto giveaway' }), makeCandidate({ id: 'p2' })],
      viewer,
      { ...options, mutedKeywords: ['crypto'] }
    );

    expect(ids(result)).toEqual(['p2']);
  });

  it('should ignore blank muted keywords', () => {
    const plainViewer = createViewerContext('viewer-1', { mutedKeywords: ['', '   '] });
    const result = filterCandidates([makeCandidate({ id: 'p1' })], plainViewer, options);

    expect(ids(result)).toEqual(['p1']);
    expect(normalizeKeywords([' Spam ', '', 'Crypto'])).toEqual(['spam', 'crypto']);
  });

  it('should keep only the first occurrence of a reposted original', () => {
    const result = filterCandidates(
      [
        makeCandidate({ id: 'orig' }),
        makeCandidate({ id: 'repost-1', repostOf: 'orig' }),
        makeCandidate({ id: 'repost-2', repostOf: 'other' }),
        makeCandidate({ id: 'repost-3', repostOf: 'other' }),
      ],
      viewer,
      options
    );

    expect(ids(result)).toEqual(['orig', 'repost-2']);
  });

  it('should drop candidates older than the staleness window', () => {
    const result = filterCandidates(
      [
        makeCandidate({ id: 'old', createdAt: hoursAgo(49) }),
        makeCandidate({ id: 'edge', createdAt: hoursAgo(48) }),
        makeCandidate({ id: 'future', createdAt: hoursAgo(-1) }),
      ],
      viewer,
      options
    );

    expect(ids(result)).toEqual(['edge', 'future']);
  });

  it('should drop flagged candidates', () => {
    const result = filterCandidates(
      [makeCandidate({ id: 'bad', flagged: true }), makeCandidate({ id: 'ok', flagged: false })],
      viewer,
      options
    );

    expect(ids(result)).toEqual(['ok']);
  });

  it('should return an empty list when nothing survives', () => {
    const result = filterCandidates([makeCandidate({ id: 'seen-post' })], viewer, options);

    expect(result).toEqual([]);
  });

  it('should return an order-preserving subset without mutating candidates', () => {
    const pool = [
      makeCandidate({ id: 'p1', authorId: 'x' }),
      makeCandidate({ id: 'p2', authorId: 'blocked-author' }),
      makeCandidate({ id: 'p3', authorId: 'y' }),
      makeCandidate({ id: 'p4', text: 'spam here' }),
      makeCandidate({ id: 'p5', authorId: 'x' }),
    ].map(c => Object.freeze(c));

    const result = filterCandidates(pool, viewer, options);

    expect(ids(result)).toEqual(['p1', 'p3', 'p5']);
    result.forEach(candidate => expect(pool).toContain(candidate));
  });

  it('should be idempotent for the same viewer context', () => {
    const pool = [
      makeCandidate({ id: 'orig' }),
      makeCandidate({ id: 'repost', repostOf: 'orig' }),
      makeCandidate({ id: 'stale', createdAt: hoursAgo(100) }),
      makeCandidate({ id: 'fine' }),
    ];

    const once = filterCandidates(pool, viewer, options);
    const twice = filterCandidates(once, viewer, options);

    expect(ids(twice)).toEqual(ids(once));
  });

  describe('getFilterReason', () => {
    it('should report the first rule a candidate breaks', () => {
      const keywords = normalizeKeywords(viewer.mutedKeywords);
      const candidate = makeCandidate({ id: 'seen-post', authorId: 'viewer-1' });

      expect(getFilterReason(candidate, viewer, keywords, new Set(), options)).toBe('seen');
      expect(
        getFilterReason(makeCandidate({ id: 'x', repostOf: 'y' }), viewer, keywords, new Set(['y']), options)
      ).toBe('duplicate_repost');
      expect(getFilterReason(makeCandidate({ id: 'ok' }), viewer, keywords, new Set(), options)).toBeNull();
    });
  });
});
