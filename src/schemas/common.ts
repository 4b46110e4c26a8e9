/**
 * Common Zod Schemas - Shared types used across the advisor
 *
 * Defines the closed set of country metrics and the categorical
 * expat community size.
 */

import { z } from 'zod';

// ============================================
// Metric Names
// ============================================

/**
 * Every numeric metric a country record carries.
 *
 * All metrics are 0-100 scores except `internet_speed`, which is an
 * average download rate in Mbps with no upper bound.
 */
export const METRIC_NAMES = [
  'cost_of_living_index',
  'quality_of_life_index',
  'safety_index',
  'healthcare_index',
  'climate_score',
  'job_market_score',
  'english_proficiency',
  'visa_ease',
  'tax_friendliness',
  'internet_speed',
] as const;

export const MetricNameSchema = z.enum(METRIC_NAMES);

export type MetricName = z.infer<typeof MetricNameSchema>;

/**
 * The nine metrics covered by the default weight distribution.
 */
export const STANDARD_METRICS = [
  'cost_of_living_index',
  'quality_of_life_index',
  'safety_index',
  'healthcare_index',
  'climate_score',
  'job_market_score',
  'english_proficiency',
  'visa_ease',
  'tax_friendliness',
] as const satisfies readonly MetricName[];

/**
 * Metrics where a lower raw value is better. These are inverted
 * (100 - raw) before weighting.
 */
export const INVERTED_METRICS: ReadonlySet<MetricName> = new Set<MetricName>([
  'cost_of_living_index',
]);

/**
 * Type guard for arbitrary metric names coming from user input.
 */
export function isMetricName(name: string): name is MetricName {
  return MetricNameSchema.safeParse(name).success;
}

// ============================================
// Expat Community Size
// ============================================

/**
 * Relative size of the expat community in a country.
 */
export const ExpatCommunitySizeSchema = z.enum(['Small', 'Medium', 'Large']);

export type ExpatCommunitySize = z.infer<typeof ExpatCommunitySizeSchema>;

// ============================================
// Metric Value Schemas
// ============================================

/**
 * A bounded 0-100 index score.
 */
export const IndexScoreSchema = z.number().min(0).max(100);

/**
 * A non-negative rate with no upper bound (e.g. Mbps).
 */
export const RateSchema = z.number().nonnegative();
