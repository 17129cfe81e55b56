jest.mock('../../../utils/logger');

import { FeedService } from '../../../services/FeedService';
import { createViewerContext } from '../../../pipeline/filterStage';
import { ActionKind, CandidateOrigin, DEFAULT_RANKING_CONFIG } from '../../../types/ranking';
import { ConfigurationError, EmptyPoolError, InvalidProbabilityError } from '../../../utils/errors';
import { logger } from '../../../utils/logger';
import { NOW, hoursAgo, makeCandidate } from '../../utils/testUtils';

const like = (p: number) => ({ [ActionKind.LIKE]: p });

describe('FeedService', () => {
  let service: FeedService;
  const viewer = createViewerContext('viewer-1');
  // Like weight 10 turns a like probability straight into the raw score
  const config = { weights: { [ActionKind.LIKE]: 10 }, diversityDecay: 0.5 };

  beforeEach(() => {
    jest.clearAllMocks();
    service = new FeedService(DEFAULT_RANKING_CONFIG);
  });

  describe('generateFeed', () => {
    it('should run the whole pipeline and demote the repeated author', () => {
      const feed = service.generateFeed({
        inNetwork: [
          makeCandidate({ id: 'A', authorId: '1', predictions: like(1.0) }),
          makeCandidate({ id: 'B', authorId: '1', predictions: like(0.8) }),
        ],
        discovery: [
          makeCandidate({ id: 'C', authorId: '2', origin: CandidateOrigin.DISCOVERY, predictions: like(0.9) }),
        ],
        viewer,
        config,
        now: NOW,
      });

      expect(feed.posts.map(p => p.id)).toEqual(['A', 'C', 'B']);
      expect(feed.posts.map(p => p.rank)).toEqual([1, 2, 3]);
      expect(feed.posts[0].score).toBeCloseTo(10, 10);
      expect(feed.posts[1].score).toBeCloseTo(9, 10);
      expect(feed.posts[2].score).toBeCloseTo(4, 10);
      expect(feed.posts[2].baseScore).toBeCloseTo(8, 10);
      expect(feed.posts[1].origin).toBe(CandidateOrigin.DISCOVERY);
      expect(feed.stats).toMatchObject({ poolSize: 3, filtered: 0, ranked: 3 });
      expect(logger.info).toHaveBeenCalledWith('Feed generated', expect.objectContaining({ viewerId: 'viewer-1' }));
    });

    it('should exclude muted keywords no matter how well they score', () => {
      const feed = service.generateFeed({
        inNetwork: [
          makeCandidate({ id: 'loud', text: 'buy spam now', predictions: like(1.0) }),
          makeCandidate({ id: 'quiet', predictions: like(0.1) }),
        ],
        discovery: [],
        viewer: createViewerContext('viewer-1', { mutedKeywords: ['spam'] }),
        now: NOW,
      });

      expect(feed.posts.map(p => p.id)).toEqual(['quiet']);
      expect(feed.stats.filtered).toBe(1);
    });

    it('should apply configured muted keywords and the staleness window', () => {
      const feed = service.generateFeed({
        inNetwork: [
          makeCandidate({ id: 'crypto', text: 'Crypto tips' }),
          makeCandidate({ id: 'old', createdAt: hoursAgo(5) }),
          makeCandidate({ id: 'new', createdAt: hoursAgo(1) }),
        ],
        discovery: [],
        viewer,
        config: { mutedKeywords: ['crypto'], stalenessWindowHours: 2 },
        now: NOW,
      });

      expect(feed.posts.map(p => p.id)).toEqual(['new']);
    });

    it('should return an empty feed when every candidate is filtered', () => {
      const feed = service.generateFeed({
        inNetwork: [makeCandidate({ id: 'mine', authorId: 'viewer-1' })],
        discovery: [],
        viewer,
        now: NOW,
      });

      expect(feed.posts).toEqual([]);
      expect(feed.stats).toMatchObject({ poolSize: 1, filtered: 1, ranked: 0 });
    });

    it('should cap the pool before filtering', () => {
      const feed = service.generateFeed({
        inNetwork: [makeCandidate({ id: 'a' }), makeCandidate({ id: 'b' })],
        discovery: [makeCandidate({ id: 'c', origin: CandidateOrigin.DISCOVERY })],
        viewer,
        config: { poolSizeCap: 2 },
        now: NOW,
      });

      expect(feed.posts.map(p => p.id).sort()).toEqual(['a', 'b']);
      expect(feed.stats.poolSize).toBe(2);
    });

    it('should throw EmptyPoolError when both sources are empty', () => {
      expect(() => service.generateFeed({ inNetwork: [], discovery: [], viewer, now: NOW })).toThrow(EmptyPoolError);
    });

    it('should reject bad configuration before looking at candidates', () => {
      expect(() =>
        service.generateFeed({ inNetwork: [], discovery: [], viewer, config: { stalenessWindowHours: -1 } })
      ).toThrow(ConfigurationError);
    });

    it('should surface invalid probabilities', () => {
      expect(() =>
        service.generateFeed({
          inNetwork: [makeCandidate({ id: 'bad', predictions: like(1.2) })],
          discovery: [],
          viewer,
          now: NOW,
        })
      ).toThrow(InvalidProbabilityError);
    });
  });

  describe('generateSimulatedFeed', () => {
    const request = () => ({
      inNetwork: [
        makeCandidate({ id: 'p1', authorId: 'alice' }),
        makeCandidate({ id: 'p2', authorId: 'alice' }),
        makeCandidate({ id: 'p3', authorId: 'bob' }),
      ],
      discovery: [makeCandidate({ id: 'p4', authorId: 'clips', origin: CandidateOrigin.DISCOVERY, videoDurationSec: 45 })],
      viewer,
      following: new Set(['alice', 'bob']),
      now: NOW,
      seed: 42,
    });

    it('should produce the same ranking for the same seed', () => {
      const first = service.generateSimulatedFeed(request());
      const second = service.generateSimulatedFeed(request());

      expect(first.posts.map(p => [p.id, p.score])).toEqual(second.posts.map(p => [p.id, p.score]));
      expect(first.posts).toHaveLength(4);
    });

    it('should still fail on an empty pool', () => {
      expect(() =>
        service.generateSimulatedFeed({ ...request(), inNetwork: [], discovery: [] })
      ).toThrow(EmptyPoolError);
    });
  });

  describe('getConfig', () => {
    it('should expose the base configuration', () => {
      expect(service.getConfig()).toBe(DEFAULT_RANKING_CONFIG);
    });
  });
});
