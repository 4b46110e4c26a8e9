/**
 * Criteria Schema
 *
 * A criteria specification describes what a user cares about: how much
 * each metric matters (weights) and the floors a country must clear
 * (minimum requirements). Preferred regions and deal-breakers are carried
 * for forward compatibility; nothing in scoring consults them yet.
 */

import { z } from 'zod';
import { ConfigurationError, formatZodIssues } from '../errors.js';
import { STANDARD_METRICS, isMetricName, type MetricName } from './common.js';

// ============================================================================
// Constants
// ============================================================================

/**
 * Weights applied when a criteria specification is created with no weights.
 * Covers the nine standard metrics and sums to 1.0.
 */
export const DEFAULT_WEIGHTS: Readonly<Record<(typeof STANDARD_METRICS)[number], number>> = Object.freeze({
  cost_of_living_index: 0.15,
  quality_of_life_index: 0.2,
  safety_index: 0.15,
  healthcare_index: 0.1,
  climate_score: 0.1,
  job_market_score: 0.1,
  english_proficiency: 0.05,
  visa_ease: 0.1,
  tax_friendliness: 0.05,
});

/** Allowed drift when checking that weights sum to 1 */
export const WEIGHT_SUM_TOLERANCE = 1e-6;

// ============================================================================
// Schemas
// ============================================================================

/**
 * Untyped criteria input (e.g. parsed JSON or CLI flags).
 * Metric names are free-form strings: unknown names are ignored by scoring.
 */
export const CriteriaInputSchema = z.object({
  weights: z.record(z.string(), z.number()).default({}),
  minRequirements: z.record(z.string(), z.number()).default({}),
  preferredRegions: z.array(z.string()).default([]),
  dealBreakers: z.array(z.string()).default([]),
});

export type CriteriaInput = z.input<typeof CriteriaInputSchema>;

/**
 * Frozen criteria used for a single query.
 */
export interface CriteriaSpecification {
  /** Metric name to weight; iteration order is application order */
  readonly weights: Readonly<Record<string, number>>;
  /** Metric name to minimum raw value */
  readonly minRequirements: Readonly<Record<string, number>>;
  readonly preferredRegions: readonly string[];
  readonly dealBreakers: readonly string[];
}

// ============================================================================
// Construction
// ============================================================================

/**
 * Build a criteria specification, substituting DEFAULT_WEIGHTS when no
 * weights are given.
 *
 * @example
 * ```typescript
 * const criteria = createCriteria({
 *   weights: { safety_index: 0.6, healthcare_index: 0.4 },
 *   minRequirements: { internet_speed: 80 },
 * });
 * ```
 */
export function createCriteria(input: CriteriaInput = {}): CriteriaSpecification {
  const weights = input.weights ?? {};
  const hasWeights = Object.keys(weights).length > 0;

  return Object.freeze({
    weights: Object.freeze({ ...(hasWeights ? weights : DEFAULT_WEIGHTS) }),
    minRequirements: Object.freeze({ ...(input.minRequirements ?? {}) }),
    preferredRegions: Object.freeze([...(input.preferredRegions ?? [])]),
    dealBreakers: Object.freeze([...(input.dealBreakers ?? [])]),
  });
}

/**
 * Validate untyped input and build a criteria specification.
 *
 * @throws {ConfigurationError} If the input does not match CriteriaInputSchema
 */
export function parseCriteria(value: unknown): CriteriaSpecification {
  const result = CriteriaInputSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError('Invalid criteria', formatZodIssues(result.error));
  }
  return createCriteria(result.data);
}

// ============================================================================
// Accessors
// ============================================================================

/**
 * Minimum requirement for a metric, or undefined when none is set.
 */
export function getThreshold(criteria: CriteriaSpecification, metric: MetricName): number | undefined {
  return Object.hasOwn(criteria.minRequirements, metric) ? criteria.minRequirements[metric] : undefined;
}

// ============================================================================
// Advisory Validation
// ============================================================================

/**
 * Report weight settings that will produce scores outside the usual
 * 0-100 framing. Scoring accepts all of these; the result is advisory.
 *
 * @returns Human-readable warnings, empty when the weights look sane
 */
export function validateWeights(criteria: CriteriaSpecification): string[] {
  const warnings: string[] = [];
  let sum = 0;

  for (const [metric, weight] of Object.entries(criteria.weights)) {
    if (!isMetricName(metric)) {
      warnings.push(`Unknown metric in weights will be ignored: ${metric}`);
      continue;
    }
    if (weight < 0) {
      warnings.push(`Negative weight for ${metric}: ${weight}`);
    }
    sum += weight;
  }

  if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    warnings.push(`Weights sum to ${Number(sum.toFixed(6))}, not 1`);
  }

  for (const metric of Object.keys(criteria.minRequirements)) {
    if (!isMetricName(metric)) {
      warnings.push(`Unknown metric in minimum requirements will be ignored: ${metric}`);
    }
  }

  return warnings;
}
