/**
 * Zod Schemas for All Data Types
 *
 * Central export point for metrics, country records and criteria.
 */

// ============================================================================
// Common Types
// ============================================================================

export {
  METRIC_NAMES,
  STANDARD_METRICS,
  INVERTED_METRICS,
  MetricNameSchema,
  ExpatCommunitySizeSchema,
  IndexScoreSchema,
  RateSchema,
  isMetricName,
  type MetricName,
  type ExpatCommunitySize,
} from './common.js';

// ============================================================================
// Country Schema
// ============================================================================

export {
  CountryRecordSchema,
  CountryDatasetSchema,
  createCountry,
  toCountryRecord,
  getMetricValue,
  type CountryRecord,
  type Country,
  type CountryMetrics,
} from './country.js';

// ============================================================================
// Criteria Schema
// ============================================================================

export {
  DEFAULT_WEIGHTS,
  WEIGHT_SUM_TOLERANCE,
  CriteriaInputSchema,
  createCriteria,
  parseCriteria,
  getThreshold,
  validateWeights,
  type CriteriaInput,
  type CriteriaSpecification,
} from './criteria.js';
