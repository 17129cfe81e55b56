export const rankingErrorMessages = {
  EMPTY_POOL: 'Candidate pool is empty: supply at least one in-network or discovery candidate',
  INVALID_PROBABILITY: 'Probability must be a number between 0 and 1',
  UNKNOWN_ACTION: 'Unknown action kind',
  INVALID_CONFIGURATION: 'Invalid ranking configuration',
  INVALID_CANDIDATE: 'Invalid candidate',
  DUPLICATE_CANDIDATE_ID: 'Duplicate candidate id in pool',
  CANDIDATES_REQUIRED: 'inNetwork and discovery must be arrays',
  PREDICTIONS_REQUIRED: 'predictions object is required',
  FAILED_TO_RANK: 'Failed to rank feed',
  FAILED_TO_SCORE: 'Failed to score predictions',
  FAILED_TO_SIMULATE: 'Failed to simulate feed',
  FAILED_TO_LOAD_CONFIG: 'Failed to load ranking configuration',
  INTERNAL_SERVER_ERROR: 'Internal server error',
};

export const authErrorMessages = {
  VIEWER_REQUIRED: 'Authentication required. Please provide X-Viewer-Id header.',
  VIEWER_INVALID: 'Invalid X-Viewer-Id format. Must be a non-empty string.',
  INTERNAL_AUTH_ERROR: 'Internal authentication error',
};
