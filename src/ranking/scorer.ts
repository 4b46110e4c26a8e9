/**
 * Weighted Scoring
 *
 * Scores one country against one criteria specification, producing a
 * weighted total and the contribution of each metric.
 *
 * Formula:
 * ```
 * total = sum(normalized(metric) * weight)   for each weighted metric
 * normalized(cost_of_living_index) = 100 - raw
 * normalized(any other metric)     = raw
 * ```
 *
 * @module ranking/scorer
 */

import { INVERTED_METRICS, isMetricName, type MetricName } from '../schemas/common.js';
import type { Country } from '../schemas/country.js';
import { WEIGHT_SUM_TOLERANCE, type CriteriaSpecification } from '../schemas/criteria.js';
import { checkThreshold, type ThresholdFailure } from './filter.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Weighted contribution per metric, in the order the weights were applied.
 */
export type ScoreBreakdown = Readonly<Partial<Record<MetricName, number>>>;

/**
 * Result of scoring a single country.
 *
 * - `scored`: every weighted metric passed its threshold
 * - `disqualified`: a weighted metric fell below its minimum requirement
 * - `unscored`: none of the weighted metrics exist on a country
 */
export type ScoreOutcome =
  | {
      readonly status: 'scored';
      readonly total: number;
      readonly breakdown: ScoreBreakdown;
      /** Weighted names that are not known metrics */
      readonly skipped: readonly string[];
      /** True when the total is guaranteed to fall within [0, 100] */
      readonly bounded: boolean;
    }
  | {
      readonly status: 'disqualified';
      readonly failure: ThresholdFailure;
    }
  | {
      readonly status: 'unscored';
      readonly skipped: readonly string[];
    };

/**
 * Plain total and breakdown. A disqualified or unscored country has a
 * total of 0 and an empty breakdown.
 */
export interface ScoreResult {
  total: number;
  breakdown: ScoreBreakdown;
}

// ============================================================================
// Normalization
// ============================================================================

/**
 * Put a raw metric value on a "higher is better" scale.
 *
 * @param metric - Metric name
 * @param raw - Raw value from the country record
 * @returns 100 - raw for inverted metrics, raw otherwise
 */
export function normalizeMetric(metric: MetricName, raw: number): number {
  return INVERTED_METRICS.has(metric) ? 100 - raw : raw;
}

// ============================================================================
// Scoring
// ============================================================================

/**
 * Score a country against a criteria specification.
 *
 * Weights are applied in iteration order. A minimum requirement on a
 * weighted metric is checked as that metric is reached; the first failure
 * disqualifies the country and discards whatever was accumulated.
 */
export function scoreCountry(country: Country, criteria: CriteriaSpecification): ScoreOutcome {
  const breakdown: Partial<Record<MetricName, number>> = {};
  const skipped: string[] = [];
  let total = 0;
  let applied = 0;
  let weightSum = 0;
  let bounded = true;

  for (const [metric, weight] of Object.entries(criteria.weights)) {
    if (!isMetricName(metric)) {
      skipped.push(metric);
      continue;
    }

    const raw = country.metrics[metric];
    const normalized = normalizeMetric(metric, raw);

    const failure = checkThreshold(country, metric, criteria);
    if (failure) {
      return { status: 'disqualified', failure };
    }

    const contribution = normalized * weight;
    breakdown[metric] = contribution;
    total += contribution;
    applied++;

    weightSum += weight;
    if (weight < 0 || (weight > 0 && (normalized < 0 || normalized > 100))) {
      bounded = false;
    }
  }

  if (applied === 0) {
    return { status: 'unscored', skipped };
  }

  return {
    status: 'scored',
    total,
    breakdown: Object.freeze(breakdown),
    skipped,
    bounded: bounded && weightSum <= 1 + WEIGHT_SUM_TOLERANCE,
  };
}

/**
 * Score a country and return just the total and breakdown.
 *
 * @example
 * ```typescript
 * const { total, breakdown } = calculateScore(portugal, createCriteria());
 * breakdown.cost_of_living_index; // (100 - 45) * 0.15 = 8.25
 * ```
 */
export function calculateScore(country: Country, criteria: CriteriaSpecification): ScoreResult {
  const outcome = scoreCountry(country, criteria);
  if (outcome.status !== 'scored') {
    return { total: 0, breakdown: {} };
  }
  return { total: outcome.total, breakdown: outcome.breakdown };
}

/**
 * Breakdown entries in insertion order, typed by metric.
 */
export function breakdownEntries(breakdown: ScoreBreakdown): Array<[MetricName, number]> {
  const entries: Array<[MetricName, number]> = [];
  for (const key of Object.keys(breakdown)) {
    if (!isMetricName(key)) {
      continue;
    }
    const value = breakdown[key];
    if (value !== undefined) {
      entries.push([key, value]);
    }
  }
  return entries;
}
