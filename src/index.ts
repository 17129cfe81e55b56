import express, { Request, Response } from 'express';
import cors from 'cors';
import { setupSwagger } from './config/swagger';
import { loadRankingConfig } from './config/ranking';
import { logger } from './utils/logger';
import { setupRoutes, setupFallbackRoute } from './routes';
import { errorHandler } from './middleware/errorHandler';

const app = express();
const PORT = process.env.PORT || 3000;

// App setup - middlewares and routes (always happens when app is imported)
app.use(cors());
app.use(express.json({ limit: '5mb' }));
app.use(express.urlencoded({ extended: true }));

setupSwagger(app);

setupRoutes(app);

/**
 * @swagger
 * /health:
 *   get:
 *     summary: Health check endpoint
 *     tags: [Health]
 *     security: []
 *     responses:
 *       200:
 *         description: Service health status
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 status:
 *                   type: string
 *                   example: "OK"
 *                 timestamp:
 *                   type: string
 *                   format: date-time
 *                 uptimeSeconds:
 *                   type: number
 *                   example: 42
 */
app.get('/health', (req: Request, res: Response) => {
  res.json({
    status: 'OK',
    timestamp: new Date().toISOString(),
    uptimeSeconds: Math.round(process.uptime()),
  });
});

setupFallbackRoute(app);

// Global error handler
app.use(errorHandler);

function startServer(): void {
  try {
    // Fail fast on a bad environment before accepting traffic
    const config = loadRankingConfig();
    logger.info('Ranking configuration validated', {
      diversityDecay: config.diversityDecay,
      stalenessWindowHours: config.stalenessWindowHours,
    });

    const server = app.listen(PORT, () => {
      logger.info(`Server running on port ${PORT}`);
    });

    process.on('SIGTERM', () => {
      logger.info('Shutting server down...');
      server.close(() => {
        logger.info('Server closed, process terminated');
        process.exit(0);
      });
    });
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
}

// Only start server if not in test environment and this file is run directly
if (process.env.NODE_ENV !== 'test' && require.main === module) {
  startServer();
}

export default app;
