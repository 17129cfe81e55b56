import { Request, Response } from 'express';
import { handleFeedError } from '../../utils/errorHandlers';
import { errorHandler } from '../../middleware/errorHandler';
import { ConfigurationError, EmptyPoolError } from '../../utils/errors';
import { rankingErrorMessages } from '../../utils/errorMessages';
import { logger } from '../../utils/logger';
import { createMockRequest, createMockResponse, MockResponse } from '../utils/testUtils';

jest.mock('../../utils/logger');

describe('handleFeedError', () => {
  let res: MockResponse;

  beforeEach(() => {
    jest.clearAllMocks();
    res = createMockResponse();
  });

  it('should return 400 with the message of a ranking error', () => {
    handleFeedError(new EmptyPoolError(), res as unknown as Response, 'Rank feed');

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({ success: false, error: rankingErrorMessages.EMPTY_POOL });
    expect(logger.warn).toHaveBeenCalled();
  });

  it('should include the option name for configuration errors', () => {
    handleFeedError(new ConfigurationError('diversityDecay', 'must be in the range (0, 1]'), res as unknown as Response, 'Rank feed');

    expect(res.json).toHaveBeenCalledWith({
      success: false,
      error: 'Invalid ranking configuration: diversityDecay must be in the range (0, 1]',
    });
  });

  it.each([
    ['Rank feed', rankingErrorMessages.FAILED_TO_RANK],
    ['Score predictions', rankingErrorMessages.FAILED_TO_SCORE],
    ['Simulate feed', rankingErrorMessages.FAILED_TO_SIMULATE],
    ['Something else', rankingErrorMessages.INTERNAL_SERVER_ERROR],
  ])('should hide unexpected errors behind a generic message for %s', (context, message) => {
    handleFeedError(new Error('boom'), res as unknown as Response, context);

    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json).toHaveBeenCalledWith({ success: false, error: message });
    expect(logger.error).toHaveBeenCalledWith(`${context} error:`, expect.any(Error));
  });
});

describe('errorHandler', () => {
  let res: MockResponse;
  const req = createMockRequest({ method: 'POST', originalUrl: '/api/v1/feed/rank' });

  beforeEach(() => {
    jest.clearAllMocks();
    res = createMockResponse();
  });

  it('should log malformed JSON at warn and return its 400 message', () => {
    const error = Object.assign(new SyntaxError('Unexpected token } in JSON at position 9'), { status: 400 });

    errorHandler(error, req as unknown as Request, res as unknown as Response, jest.fn());

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({ success: false, error: 'Unexpected token } in JSON at position 9' });
    expect(logger.warn).toHaveBeenCalledWith('Request rejected with 400:', error);
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('should log unexpected errors at error and hide their message', () => {
    const error = new Error('database exploded');

    errorHandler(error, req as unknown as Request, res as unknown as Response, jest.fn());

    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json).toHaveBeenCalledWith({ success: false, error: 'Internal server error' });
    expect(logger.error).toHaveBeenCalledWith('Unhandled error:', error);
    expect(logger.warn).not.toHaveBeenCalled();
  });
});
