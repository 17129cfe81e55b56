import { Request, Response, NextFunction } from 'express';
import { authErrorMessages } from '../utils/errorMessages';
import { logger } from '../utils/logger';

// Lets controllers read "req.viewerId" without a cast
declare global {
  namespace Express {
    interface Request {
      viewerId?: string;
    }
  }
}

/**
 * Identifies the viewer from the X-Viewer-Id header. The id doubles as
 * the viewer's own author id, so their posts are filtered from the feed.
 */
export const authenticateViewer = (
  req: Request,
  res: Response,
  next: NextFunction
) => {
  try {
    const header = req.headers['x-viewer-id'];

    if (header === undefined) {
      logger.warn('Authentication failed: Missing X-Viewer-Id header', {
        method: req.method,
        url: req.originalUrl,
        ip: req.ip,
      });

      return res.status(401).json({
        success: false,
        error: authErrorMessages.VIEWER_REQUIRED,
      });
    }

    if (typeof header !== 'string' || header.trim().length === 0) {
      logger.warn('Authentication failed: Invalid X-Viewer-Id format', {
        method: req.method,
        url: req.originalUrl,
        ip: req.ip,
      });

      return res.status(401).json({
        success: false,
        error: authErrorMessages.VIEWER_INVALID,
      });
    }

    req.viewerId = header.trim();

    logger.debug('Viewer identified', {
      method: req.method,
      url: req.originalUrl,
      viewerId: req.viewerId,
    });

    next();
  } catch (error) {
    logger.error('Authentication middleware error:', error);

    return res.status(500).json({
      success: false,
      error: authErrorMessages.INTERNAL_AUTH_ERROR,
    });
  }
};
