import { Response } from 'express';
import { rankingErrorMessages } from './errorMessages';
import { RankingError } from './errors';
import { logger } from './logger';

export interface ErrorResponse {
  success: false;
  error: string;
}

export interface SuccessResponse<T = unknown> {
  success: true;
  data?: T;
  message?: string;
}

export type ApiResponse<T = unknown> = ErrorResponse | SuccessResponse<T>;

const genericMessageFor = (context: string): string => {
  switch (context) {
    case 'Rank feed':
      return rankingErrorMessages.FAILED_TO_RANK;
    case 'Score predictions':
      return rankingErrorMessages.FAILED_TO_SCORE;
    case 'Simulate feed':
      return rankingErrorMessages.FAILED_TO_SIMULATE;
    case 'Get ranking config':
      return rankingErrorMessages.FAILED_TO_LOAD_CONFIG;
    default:
      return rankingErrorMessages.INTERNAL_SERVER_ERROR;
  }
};

export const handleFeedError = (error: unknown, res: Response, context: string): void => {
  // Contract violations carry their own status and a message safe to return
  if (error instanceof RankingError) {
    logger.warn(`${context} rejected: ${error.name}`, { message: error.message });
    res.status(error.statusCode).json({
      success: false,
      error: error.message,
    } satisfies ErrorResponse);
    return;
  }

  logger.error(`${context} error:`, error);
  res.status(500).json({
    success: false,
    error: genericMessageFor(context),
  } satisfies ErrorResponse);
};
