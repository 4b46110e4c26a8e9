/**
 * Recommendation Formatters
 *
 * CLI output for ranked results and single-country evaluations,
 * in text and JSON shapes.
 *
 * @module cli/formatters/recommendation
 */

import chalk from 'chalk';
import {
  breakdownEntries,
  explainRecommendation,
  getMetricLabel,
  type CountryEvaluation,
  type RankedResult,
} from '../../ranking/index.js';
import { toCountryRecord, type CountryRecord } from '../../schemas/country.js';

// ============================================================================
// Types
// ============================================================================

/**
 * JSON shape of a ranked result.
 */
export interface RankedResultJson {
  rank: number;
  country: CountryRecord;
  score: number;
  breakdown: Record<string, number>;
  bounded: boolean;
}

// ============================================================================
// Text Output
// ============================================================================

/**
 * Format the recommendation shortlist with a heading per entry.
 *
 * @example
 * ```
 * #1 Recommendation:
 *
 * ============================================================
 * Country: Portugal
 * ...
 * ```
 */
export function formatRecommendations(results: readonly RankedResult[]): string {
  return results
    .map((result, i) => `${chalk.bold(`#${i + 1} Recommendation:`)}\n${explainRecommendation(result)}`)
    .join('\n');
}

/**
 * Describe why a country was left out of the shortlist, or its score.
 */
export function formatEvaluationLine(evaluation: CountryEvaluation): string {
  const { country, outcome } = evaluation;

  switch (outcome.status) {
    case 'scored':
      return `${country.name}: ${outcome.total.toFixed(2)}`;
    case 'disqualified': {
      const { metric, actual, threshold } = outcome.failure;
      return `${country.name}: ${chalk.red('disqualified')} (${getMetricLabel(metric)} ${actual} < ${threshold})`;
    }
    case 'unscored':
      return `${country.name}: ${chalk.yellow('not scored')} (no known metrics in weights: ${outcome.skipped.join(', ')})`;
  }
}

/**
 * Full text for a single-country evaluation: the explanation when it
 * scored, the reason otherwise.
 */
export function formatEvaluation(evaluation: CountryEvaluation): string {
  const { country, outcome } = evaluation;
  if (outcome.status !== 'scored') {
    return formatEvaluationLine(evaluation);
  }

  const explanation = explainRecommendation({
    country,
    score: outcome.total,
    breakdown: outcome.breakdown,
    bounded: outcome.bounded,
  });

  if (outcome.skipped.length === 0) {
    return explanation;
  }
  return `${explanation}\n${chalk.dim(`Ignored unknown metrics: ${outcome.skipped.join(', ')}`)}`;
}

// ============================================================================
// JSON Output
// ============================================================================

/**
 * Convert ranked results to plain JSON objects with 1-based ranks.
 */
export function toRankedResultJson(results: readonly RankedResult[]): RankedResultJson[] {
  return results.map((result, i) => ({
    rank: i + 1,
    country: toCountryRecord(result.country),
    score: result.score,
    breakdown: Object.fromEntries(breakdownEntries(result.breakdown)),
    bounded: result.bounded,
  }));
}
