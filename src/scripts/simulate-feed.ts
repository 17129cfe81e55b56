import { Candidate, CandidateOrigin, DEFAULT_RANKING_CONFIG, RankedPost } from '../types/ranking';
import { FeedService } from '../services/FeedService';
import { createViewerContext } from '../pipeline/filterStage';
import { ScoreCalculator } from '../utils/scoreCalculator';
import { createSeededRandom, simulatePredictions } from '../utils/predictionSimulator';

/**
 * Feed ranking walkthrough
 *
 * Ranks a handful of sample posts with simulated predictions, then prints
 * the final feed, a per-action breakdown of the top post, and the effect
 * of author diversity decay.
 *
 * Usage: npm run simulate [-- <seed>]
 */

const HOUR_MS = 60 * 60 * 1000;

function createSamplePosts(now: Date): { inNetwork: Candidate[]; discovery: Candidate[] } {
  const at = (hoursAgo: number) => new Date(now.getTime() - hoursAgo * HOUR_MS);
  const post = (
    id: string,
    authorId: string,
    origin: CandidateOrigin,
    text: string,
    hoursAgo: number,
    videoDurationSec?: number
  ): Candidate => ({ id, authorId, origin, text, createdAt: at(hoursAgo), videoDurationSec, predictions: {} });

  return {
    inNetwork: [
      post('1', 'alice', CandidateOrigin.IN_NETWORK, 'Just shipped a new feature! Thread on what we learned', 1),
      post('2', 'alice', CandidateOrigin.IN_NETWORK, 'Follow-up: the technical deep dive', 2),
      post('3', 'bob', CandidateOrigin.IN_NETWORK, 'Hot take: tabs are better than spaces', 3),
    ],
    discovery: [
      post('4', 'clips_daily', CandidateOrigin.DISCOVERY, 'This clip will change how you plan your week', 4, 45),
      post('5', 'newsroom', CandidateOrigin.DISCOVERY, 'Breaking: major announcement in the industry', 5),
      post('6', 'clips_daily', CandidateOrigin.DISCOVERY, 'Another clip for you', 6, 120),
    ],
  };
}

function displayFeed(posts: RankedPost[]): void {
  console.log('\n' + '='.repeat(70));
  console.log('FINAL RANKED FEED');
  console.log('='.repeat(70));

  posts.forEach(post => {
    const network = post.origin === CandidateOrigin.IN_NETWORK ? 'IN' : 'OUT';
    const video = post.videoBonus > 0 ? ` [VIDEO +${post.videoBonus.toFixed(3)}]` : '';
    console.log(
      `#${post.rank} (score: ${post.score.toFixed(4)}) [${network}]${video} @${post.authorId} post ${post.id}`
    );
  });
}

function displayBreakdown(candidate: Candidate): void {
  const breakdown = ScoreCalculator.calculateScore(candidate.predictions, DEFAULT_RANKING_CONFIG.weights);

  console.log('\n' + '='.repeat(70));
  console.log(`BREAKDOWN: post ${candidate.id} by @${candidate.authorId}`);
  console.log('-'.repeat(70));

  ScoreCalculator.topContributions(breakdown).forEach(c => {
    const sign = ScoreCalculator.isPenalty(c.action) ? '-' : '+';
    console.log(
      `  ${c.action.padEnd(16)} P=${c.probability.toFixed(4)} x w=${sign}${c.weight.toFixed(1)} = ${c.contribution.toFixed(4)}`
    );
  });

  console.log('-'.repeat(70));
  console.log(`  Base score: ${breakdown.finalScore.toFixed(4)}`);
}

function displayDiversity(posts: RankedPost[]): void {
  console.log('\n' + '='.repeat(70));
  console.log('AUTHOR DIVERSITY EFFECT');
  console.log('='.repeat(70));

  const byAuthor = new Map<string, RankedPost[]>();
  posts.forEach(post => byAuthor.set(post.authorId, [...(byAuthor.get(post.authorId) ?? []), post]));

  byAuthor.forEach((authored, authorId) => {
    if (authored.length < 2) return;
    console.log(`\n@${authorId} has ${authored.length} posts in the feed:`);
    authored.forEach((post, i) => {
      console.log(
        `  Post ${i + 1}: rank ${post.rank}, adjusted=${post.adjustedScore.toFixed(4)}, ` +
        `factor=${post.diversityFactor.toFixed(2)}, score=${post.score.toFixed(4)}`
      );
    });
  });
}

function main(): void {
  const seed = process.argv[2] ?? 42;
  const now = new Date();
  const following = new Set(['alice', 'bob']);
  const { inNetwork, discovery } = createSamplePosts(now);

  console.log(`Viewer follows: ${[...following].join(', ')}`);
  console.log(`Ranking ${inNetwork.length + discovery.length} candidate posts (seed ${seed})...`);

  // Predictions are filled here so the breakdown below sees the same values
  const random = createSeededRandom(seed);
  const withPredictions = (candidates: Candidate[]) =>
    candidates.map(c => ({ ...c, predictions: simulatePredictions(c, following.has(c.authorId), random) }));
  const predictedInNetwork = withPredictions(inNetwork);
  const predictedDiscovery = withPredictions(discovery);

  const service = new FeedService(DEFAULT_RANKING_CONFIG);
  const feed = service.generateFeed({
    inNetwork: predictedInNetwork,
    discovery: predictedDiscovery,
    viewer: createViewerContext('viewer'),
    now,
  });

  displayFeed(feed.posts);

  const metrics = ScoreCalculator.getScoreMetrics(feed.posts.map(p => p.score));
  console.log(
    `\nScore spread: avg ${metrics.avgScore.toFixed(4)}, max ${metrics.maxScore.toFixed(4)}, ` +
    `min ${metrics.minScore.toFixed(4)}, std dev ${Math.sqrt(metrics.variance).toFixed(4)}`
  );

  const top = [...predictedInNetwork, ...predictedDiscovery].find(c => c.id === feed.posts[0]?.id);
  if (top) {
    displayBreakdown(top);
  }

  displayDiversity(feed.posts);
}

// Run the walkthrough only when called directly
if (require.main === module) {
  main();
}
