import { rankingErrorMessages } from './errorMessages';

/**
 * Base class for contract violations raised by the ranking pipeline.
 * None of these are retried: the pipeline is deterministic, so the
 * same input fails the same way.
 */
export class RankingError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode = 400) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class EmptyPoolError extends RankingError {
  constructor() {
    super(rankingErrorMessages.EMPTY_POOL);
  }
}

export class InvalidProbabilityError extends RankingError {
  readonly candidateId?: string;
  readonly action: string;
  readonly value: unknown;

  constructor(action: string, value: unknown, candidateId?: string) {
    const where = candidateId ? ` (candidate ${candidateId})` : '';
    super(`${rankingErrorMessages.INVALID_PROBABILITY}: ${action}=${String(value)}${where}`);
    this.action = action;
    this.value = value;
    this.candidateId = candidateId;
  }
}

export class ConfigurationError extends RankingError {
  readonly option: string;

  constructor(option: string, reason: string) {
    super(`${rankingErrorMessages.INVALID_CONFIGURATION}: ${option} ${reason}`);
    this.option = option;
  }
}

export class CandidateValidationError extends RankingError {
  constructor(reason: string) {
    super(`${rankingErrorMessages.INVALID_CANDIDATE}: ${reason}`);
  }
}
