import { Router } from 'express';
import { rankFeed, simulateFeed, scorePredictions, getRankingConfig } from '../controllers/feedController';
import { authenticateViewer } from '../middleware/auth';

const router = Router();

/**
 * @swagger
 * tags:
 *   name: Feed
 *   description: Feed ranking endpoints
 */

/**
 * @swagger
 * /api/v1/feed/rank:
 *   post:
 *     summary: Rank a candidate pool for the viewer
 *     description: >
 *       Runs pool building, filtering, scoring and diversity adjustment over
 *       the supplied candidates. Predictions are taken as given.
 *     tags: [Feed]
 *     security:
 *       - ViewerAuth: []
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             $ref: '#/components/schemas/RankFeedRequest'
 *           examples:
 *             twoAuthors:
 *               summary: Two authors, one repeated
 *               value:
 *                 inNetwork:
 *                   - id: "a"
 *                     authorId: "author-1"
 *                     createdAt: "2026-10-19T10:00:00.000Z"
 *                     text: "Shipped a new feature today"
 *                     predictions: { like: 0.4, reply: 0.1 }
 *                 discovery:
 *                   - id: "b"
 *                     authorId: "author-2"
 *                     createdAt: "2026-10-19T09:00:00.000Z"
 *                     text: "A short clip"
 *                     videoDurationSec: 30
 *                     predictions: { like: 0.2, video_watch: 0.6 }
 *                 viewer:
 *                   mutedKeywords: ["spoiler"]
 *     responses:
 *       200:
 *         description: Ranked feed
 *         content:
 *           application/json:
 *             schema:
 *               allOf:
 *                 - $ref: '#/components/schemas/ApiResponse'
 *                 - type: object
 *                   properties:
 *                     data:
 *                       type: array
 *                       items:
 *                         $ref: '#/components/schemas/RankedPost'
 *                     stats:
 *                       $ref: '#/components/schemas/FeedStats'
 *       400:
 *         description: Empty pool, invalid probability, invalid candidate or invalid configuration
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ApiError'
 *       401:
 *         description: Missing X-Viewer-Id header
 */
// POST /feed/rank - Rank supplied candidates
router.post('/rank', authenticateViewer, rankFeed);

/**
 * @swagger
 * /api/v1/feed/simulate:
 *   post:
 *     summary: Rank candidates with simulated engagement predictions
 *     tags: [Feed]
 *     security:
 *       - ViewerAuth: []
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             allOf:
 *               - $ref: '#/components/schemas/RankFeedRequest'
 *               - type: object
 *                 properties:
 *                   following:
 *                     type: array
 *                     items:
 *                       type: string
 *                     description: Authors the viewer follows
 *                   seed:
 *                     oneOf:
 *                       - type: string
 *                       - type: number
 *                     description: Seed for reproducible predictions
 *     responses:
 *       200:
 *         description: Ranked feed
 *       400:
 *         description: Invalid request
 *       401:
 *         description: Missing X-Viewer-Id header
 */
// POST /feed/simulate - Rank with simulated predictions
router.post('/simulate', authenticateViewer, simulateFeed);

/**
 * @swagger
 * /api/v1/feed/score:
 *   post:
 *     summary: Score one set of predictions with a per-action breakdown
 *     tags: [Feed]
 *     security:
 *       - ViewerAuth: []
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [predictions]
 *             properties:
 *               predictions:
 *                 $ref: '#/components/schemas/Predictions'
 *               weights:
 *                 type: object
 *                 additionalProperties:
 *                   type: number
 *     responses:
 *       200:
 *         description: Score breakdown
 *       400:
 *         description: Missing predictions or probability outside [0, 1]
 */
// POST /feed/score - Score a single prediction set
router.post('/score', authenticateViewer, scorePredictions);

/**
 * @swagger
 * /api/v1/feed/config:
 *   get:
 *     summary: Active ranking configuration
 *     tags: [Feed]
 *     security:
 *       - ViewerAuth: []
 *     responses:
 *       200:
 *         description: Weights, staleness window, video bonus, diversity decay, muted keywords and pool cap
 */
// GET /feed/config - Active configuration
router.get('/config', authenticateViewer, getRankingConfig);

export default router;
