/**
 * Country Ranking
 *
 * Orchestrates filter -> score -> sort -> truncate to produce the
 * recommendation shortlist.
 *
 * @module ranking/ranker
 */

import type { Country } from '../schemas/country.js';
import type { CriteriaSpecification } from '../schemas/criteria.js';
import { filterCountries, findFailedThreshold } from './filter.js';
import { scoreCountry, type ScoreBreakdown, type ScoreOutcome } from './scorer.js';

// ============================================================================
// Constants
// ============================================================================

/** Number of recommendations returned when none is requested */
export const DEFAULT_TOP_N = 5;

// ============================================================================
// Types
// ============================================================================

/**
 * One entry of the recommendation shortlist.
 */
export interface RankedResult {
  readonly country: Country;
  readonly score: number;
  readonly breakdown: ScoreBreakdown;
  /** Whether the score is guaranteed to lie within [0, 100] */
  readonly bounded: boolean;
}

/**
 * A country paired with how it fared against the criteria.
 */
export interface CountryEvaluation {
  readonly country: Country;
  readonly outcome: ScoreOutcome;
}

export interface RecommendOptions {
  /**
   * Keep countries whose weighted total is 0 or below. By default these
   * are dropped along with disqualified countries.
   */
  keepZeroScores?: boolean;
}

// ============================================================================
// Evaluation
// ============================================================================

/**
 * Evaluate every country, in collection order.
 *
 * Countries failing any minimum requirement (weighted or not) are
 * reported as disqualified before scoring runs.
 */
export function evaluateCountries(
  countries: readonly Country[],
  criteria: CriteriaSpecification
): CountryEvaluation[] {
  return countries.map((country) => {
    const failure = findFailedThreshold(country, criteria);
    const outcome: ScoreOutcome = failure
      ? { status: 'disqualified', failure }
      : scoreCountry(country, criteria);
    return { country, outcome };
  });
}

// ============================================================================
// Ranking
// ============================================================================

/**
 * Recommend the best-scoring countries.
 *
 * Steps:
 * 1. Drop countries failing a minimum requirement
 * 2. Score the rest
 * 3. Drop unscored and (unless kept) non-positive scores
 * 4. Sort by score descending; ties keep collection order
 * 5. Return the first `topN`
 *
 * @param countries - Collection to rank
 * @param criteria - Weights and minimum requirements
 * @param topN - Maximum results; zero or negative yields an empty list
 * @param options - Ranking options
 * @returns Ranked results, highest score first
 */
export function recommendCountries(
  countries: readonly Country[],
  criteria: CriteriaSpecification,
  topN: number = DEFAULT_TOP_N,
  options: RecommendOptions = {}
): RankedResult[] {
  const limit = Math.floor(topN);
  if (!(limit > 0)) {
    return [];
  }

  const ranked: RankedResult[] = [];

  for (const country of filterCountries(countries, criteria)) {
    const outcome = scoreCountry(country, criteria);
    if (outcome.status !== 'scored') {
      continue;
    }
    if (outcome.total <= 0 && !options.keepZeroScores) {
      continue;
    }
    ranked.push({
      country,
      score: outcome.total,
      breakdown: outcome.breakdown,
      bounded: outcome.bounded,
    });
  }

  // Array.prototype.sort is stable, so equal scores keep collection order
  ranked.sort((a, b) => b.score - a.score);

  return ranked.slice(0, limit);
}
