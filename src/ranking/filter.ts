/**
 * Minimum Requirement Filtering
 *
 * Removes countries that fall below any floor in the criteria's
 * minimum requirements. Threshold comparison lives here and is shared
 * with the scorer's gate so both agree on what "fails" means.
 *
 * @module ranking/filter
 */

import { isMetricName, type MetricName } from '../schemas/common.js';
import type { Country } from '../schemas/country.js';
import { getThreshold, type CriteriaSpecification } from '../schemas/criteria.js';

// ============================================================================
// Types
// ============================================================================

/**
 * A minimum requirement a country did not meet.
 */
export interface ThresholdFailure {
  readonly metric: MetricName;
  readonly threshold: number;
  /** The country's raw (un-normalized) value */
  readonly actual: number;
}

// ============================================================================
// Threshold Checks
// ============================================================================

/**
 * Check one metric against its minimum requirement.
 *
 * Raw values are compared, so an inverted metric like cost of living is
 * gated on its original scale.
 *
 * @returns The failure, or null when there is no threshold or it is met
 */
export function checkThreshold(
  country: Country,
  metric: MetricName,
  criteria: CriteriaSpecification
): ThresholdFailure | null {
  const threshold = getThreshold(criteria, metric);
  if (threshold === undefined) {
    return null;
  }

  const actual = country.metrics[metric];
  return actual < threshold ? { metric, threshold, actual } : null;
}

/**
 * Find the first minimum requirement a country fails, in the order the
 * requirements were given. Unknown metric names never fail.
 */
export function findFailedThreshold(
  country: Country,
  criteria: CriteriaSpecification
): ThresholdFailure | null {
  for (const metric of Object.keys(criteria.minRequirements)) {
    if (!isMetricName(metric)) {
      continue;
    }
    const failure = checkThreshold(country, metric, criteria);
    if (failure) {
      return failure;
    }
  }
  return null;
}

// ============================================================================
// Filtering
// ============================================================================

/**
 * Keep only countries that meet every minimum requirement.
 * Order of the input collection is preserved.
 */
export function filterCountries(
  countries: readonly Country[],
  criteria: CriteriaSpecification
): Country[] {
  return countries.filter((country) => findFailedThreshold(country, criteria) === null);
}
