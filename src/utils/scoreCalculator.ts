import {
  ActionContribution,
  ActionKind,
  ActionPredictions,
  ActionWeights,
  ALL_ACTIONS,
  Candidate,
  DEFAULT_ACTION_WEIGHTS,
  NEGATIVE_ACTIONS,
  ScoreBreakdown,
} from '../types/ranking';
import { InvalidProbabilityError } from './errors';
import { logger } from './logger';

export interface ScoreMetrics {
  count: number;
  avgScore: number;
  maxScore: number;
  minScore: number;
  variance: number;
}

/**
 * Score calculator for predicted engagement
 *
 * Formula: Σ weight(a) · P(a) over positive actions
 *        − Σ weight(a) · P(a) over negative actions
 *
 * Weights are positive magnitudes; the sign comes from the action kind.
 * A missing probability counts as 0.
 */
export class ScoreCalculator {

  /**
   * Calculate the weighted score with a per-action breakdown
   * @param predictions Predicted probability per action kind
   * @param weights Weight magnitude per action kind
   * @param candidateId Only used to make validation errors traceable
   */
  static calculateScore(
    predictions: ActionPredictions,
    weights: ActionWeights = DEFAULT_ACTION_WEIGHTS,
    candidateId?: string
  ): ScoreBreakdown {
    this.validatePredictions(predictions, candidateId);

    const contributions: ActionContribution[] = [];
    let positiveTotal = 0;
    let negativeTotal = 0;

    for (const action of ALL_ACTIONS) {
      const probability = predictions[action] ?? 0;
      const weight = weights[action];
      const magnitude = weight * probability;

      if (NEGATIVE_ACTIONS.has(action)) {
        negativeTotal += magnitude;
        contributions.push({ action, probability, weight, contribution: -magnitude });
      } else {
        positiveTotal += magnitude;
        contributions.push({ action, probability, weight, contribution: magnitude });
      }
    }

    return {
      contributions,
      positiveTotal,
      negativeTotal,
      finalScore: positiveTotal - negativeTotal,
    };
  }

  /**
   * Throws InvalidProbabilityError for any probability outside [0, 1]
   */
  static validatePredictions(predictions: ActionPredictions, candidateId?: string): void {
    for (const [action, value] of Object.entries(predictions)) {
      if (value === undefined) {
        continue;
      }
      if (typeof value !== 'number' || !Number.isFinite(value) || value < 0 || value > 1) {
        logger.warn('Rejected prediction outside [0, 1]', { candidateId, action, value });
        throw new InvalidProbabilityError(action, value, candidateId);
      }
    }
  }

  /**
   * Score every candidate independently. Returns new candidate objects
   * with `score` set; inputs are left untouched.
   */
  static scoreCandidates(
    candidates: readonly Candidate[],
    weights: ActionWeights = DEFAULT_ACTION_WEIGHTS
  ): Candidate[] {
    return candidates.map(candidate => ({
      ...candidate,
      score: this.calculateScore(candidate.predictions, weights, candidate.id).finalScore,
    }));
  }

  /**
   * Contributions sorted by absolute size, dropping the negligible ones
   */
  static topContributions(breakdown: ScoreBreakdown, threshold = 0.001): ActionContribution[] {
    return breakdown.contributions
      .filter(c => Math.abs(c.contribution) > threshold)
      .sort((a, b) => Math.abs(b.contribution) - Math.abs(a.contribution));
  }

  static getScoreMetrics(scores: readonly number[]): ScoreMetrics {
    if (scores.length === 0) {
      return { count: 0, avgScore: 0, maxScore: 0, minScore: 0, variance: 0 };
    }

    const avgScore = scores.reduce((sum, score) => sum + score, 0) / scores.length;
    const maxScore = Math.max(...scores);
    const minScore = Math.min(...scores);
    const variance = scores.reduce((sum, score) => sum + Math.pow(score - avgScore, 2), 0) / scores.length;

    return { count: scores.length, avgScore, maxScore, minScore, variance };
  }

  static isPenalty(action: ActionKind): boolean {
    return NEGATIVE_ACTIONS.has(action);
  }
}
