/**
 * Ranking Module Exports
 *
 * Central export point for scoring, filtering, ranking and explanation.
 *
 * @module ranking
 */

// Minimum requirement filtering
export {
  type ThresholdFailure,
  checkThreshold,
  findFailedThreshold,
  filterCountries,
} from './filter.js';

// Weighted scoring
export {
  type ScoreBreakdown,
  type ScoreOutcome,
  type ScoreResult,
  normalizeMetric,
  scoreCountry,
  calculateScore,
  breakdownEntries,
} from './scorer.js';

// Ranking
export {
  DEFAULT_TOP_N,
  type RankedResult,
  type CountryEvaluation,
  type RecommendOptions,
  evaluateCountries,
  recommendCountries,
} from './ranker.js';

// Explanation
export {
  METRIC_LABELS,
  EXPLANATION_WIDTH,
  getMetricLabel,
  formatBreakdownRow,
  explainRecommendation,
} from './explainer.js';
