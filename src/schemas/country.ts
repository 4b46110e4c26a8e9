/**
 * Country Schema
 *
 * A country is the entity the advisor ranks. Raw records use the
 * snake_case keys of the dataset files; `createCountry` turns a validated
 * record into the frozen `Country` value the ranking code works with.
 */

import { z } from 'zod';
import {
  ExpatCommunitySizeSchema,
  IndexScoreSchema,
  RateSchema,
  isMetricName,
  type ExpatCommunitySize,
  type MetricName,
} from './common.js';

// ============================================
// Raw Record Schema
// ============================================

/**
 * A country record as stored in a dataset file.
 */
export const CountryRecordSchema = z.object({
  name: z.string().trim().min(1, 'Country name must not be empty'),
  cost_of_living_index: IndexScoreSchema,
  quality_of_life_index: IndexScoreSchema,
  safety_index: IndexScoreSchema,
  healthcare_index: IndexScoreSchema,
  climate_score: IndexScoreSchema,
  job_market_score: IndexScoreSchema,
  english_proficiency: IndexScoreSchema,
  visa_ease: IndexScoreSchema,
  tax_friendliness: IndexScoreSchema,
  internet_speed: RateSchema,
  expat_community_size: ExpatCommunitySizeSchema,
});

export type CountryRecord = z.infer<typeof CountryRecordSchema>;

/**
 * A dataset is a non-empty list of country records.
 */
export const CountryDatasetSchema = z.array(CountryRecordSchema).min(1, 'Dataset must contain at least one country');

// ============================================
// Country Value Object
// ============================================

export type CountryMetrics = Readonly<Record<MetricName, number>>;

/**
 * Immutable country used throughout scoring and ranking.
 */
export interface Country {
  readonly name: string;
  readonly metrics: CountryMetrics;
  readonly expatCommunitySize: ExpatCommunitySize;
}

/**
 * Build a frozen Country from a validated record.
 */
export function createCountry(record: CountryRecord): Country {
  const metrics: CountryMetrics = Object.freeze({
    cost_of_living_index: record.cost_of_living_index,
    quality_of_life_index: record.quality_of_life_index,
    safety_index: record.safety_index,
    healthcare_index: record.healthcare_index,
    climate_score: record.climate_score,
    job_market_score: record.job_market_score,
    english_proficiency: record.english_proficiency,
    visa_ease: record.visa_ease,
    tax_friendliness: record.tax_friendliness,
    internet_speed: record.internet_speed,
  });

  return Object.freeze({
    name: record.name,
    metrics,
    expatCommunitySize: record.expat_community_size,
  });
}

/**
 * Convert a Country back to its dataset record shape (used for JSON output).
 */
export function toCountryRecord(country: Country): CountryRecord {
  return {
    name: country.name,
    ...country.metrics,
    expat_community_size: country.expatCommunitySize,
  };
}

/**
 * Look up a metric by an arbitrary name.
 *
 * @returns The raw value, or undefined when the name is not a known metric
 */
export function getMetricValue(country: Country, name: string): number | undefined {
  if (!isMetricName(name)) {
    return undefined;
  }
  return country.metrics[name];
}
