import swaggerJsdoc from 'swagger-jsdoc';
import swaggerUi from 'swagger-ui-express';
import { Express } from 'express';
import { ALL_ACTIONS } from '../types/ranking';

const predictionProperties = Object.fromEntries(
  ALL_ACTIONS.map(action => [action, { type: 'number', minimum: 0, maximum: 1 }])
);

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Feed Ranking Simulator API',
      version: '1.0.0',
      description: 'Illustrative feed ranking: filtering, weighted engagement scoring and author diversity',
    },
    servers: [
      {
        url: 'http://localhost:3000',
        description: 'Development server',
      },
    ],
    components: {
      securitySchemes: {
        ViewerAuth: {
          type: 'apiKey',
          in: 'header',
          name: 'x-viewer-id',
          description: 'Viewer id; also used as the viewer\'s own author id',
        },
      },
      schemas: {
        Predictions: {
          type: 'object',
          description: 'Predicted probability per action kind; missing actions count as 0',
          properties: predictionProperties,
          additionalProperties: false,
        },
        Candidate: {
          type: 'object',
          required: ['id', 'authorId', 'createdAt'],
          properties: {
            id: { type: 'string', example: 'post-1' },
            authorId: { type: 'string', example: 'author-1' },
            createdAt: { type: 'string', format: 'date-time' },
            text: { type: 'string', example: 'Hot take: tabs are better than spaces' },
            videoDurationSec: { type: 'number', example: 45 },
            repostOf: { type: 'string', description: 'Original post id when this is a repost' },
            flagged: { type: 'boolean', description: 'Rule-breaking or spam' },
            predictions: { $ref: '#/components/schemas/Predictions' },
          },
        },
        ViewerContext: {
          type: 'object',
          properties: {
            seenPostIds: { type: 'array', items: { type: 'string' } },
            blockedAuthorIds: { type: 'array', items: { type: 'string' } },
            mutedAuthorIds: { type: 'array', items: { type: 'string' } },
            mutedKeywords: { type: 'array', items: { type: 'string' } },
          },
        },
        RankFeedRequest: {
          type: 'object',
          required: ['inNetwork', 'discovery'],
          properties: {
            inNetwork: { type: 'array', items: { $ref: '#/components/schemas/Candidate' } },
            discovery: { type: 'array', items: { $ref: '#/components/schemas/Candidate' } },
            viewer: { $ref: '#/components/schemas/ViewerContext' },
            config: { type: 'object', description: 'Per-request configuration overrides' },
            now: { type: 'string', format: 'date-time', description: 'Reference time for staleness' },
          },
        },
        RankedPost: {
          type: 'object',
          properties: {
            id: { type: 'string' },
            authorId: { type: 'string' },
            origin: { type: 'string', enum: ['in_network', 'discovery'] },
            createdAt: { type: 'string', format: 'date-time' },
            rank: { type: 'number', example: 1 },
            baseScore: { type: 'number', example: 1.42 },
            videoBonus: { type: 'number', example: 0.5 },
            adjustedScore: { type: 'number', example: 1.92 },
            diversityFactor: { type: 'number', example: 1 },
            score: { type: 'number', example: 1.92 },
          },
        },
        FeedStats: {
          type: 'object',
          properties: {
            poolSize: { type: 'number' },
            filtered: { type: 'number' },
            ranked: { type: 'number' },
            durationMs: { type: 'number' },
          },
        },
        ApiResponse: {
          type: 'object',
          properties: {
            success: { type: 'boolean' },
            data: { type: 'object' },
            message: { type: 'string' },
          },
        },
        ApiError: {
          type: 'object',
          properties: {
            success: { type: 'boolean', example: false },
            error: { type: 'string' },
          },
        },
      },
    },
    security: [
      {
        ViewerAuth: [],
      },
    ],
  },
  apis: [
    './src/routes/*.ts',
    './src/index.ts',
    './dist/routes/*.js',
    './dist/index.js',
  ],
};

const specs = swaggerJsdoc(options);

export const setupSwagger = (app: Express): void => {
  app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(specs, {
    explorer: true,
    customCss: '.swagger-ui .topbar { display: none }',
    customSiteTitle: 'Feed Ranking Simulator API',
  }));
};

export default specs;
