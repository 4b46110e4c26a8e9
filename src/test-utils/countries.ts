/**
 * Test helpers for building countries.
 */

import { createCountry, type Country, type CountryRecord } from '../schemas/country.js';

/**
 * A complete record with every metric at 50, overridable per field.
 */
export function createMockRecord(overrides: Partial<CountryRecord> = {}): CountryRecord {
  return {
    name: 'Testland',
    cost_of_living_index: 50,
    quality_of_life_index: 50,
    safety_index: 50,
    healthcare_index: 50,
    climate_score: 50,
    job_market_score: 50,
    english_proficiency: 50,
    visa_ease: 50,
    tax_friendliness: 50,
    internet_speed: 50,
    expat_community_size: 'Medium',
    ...overrides,
  };
}

/**
 * A frozen country built from createMockRecord.
 */
export function createMockCountry(overrides: Partial<CountryRecord> = {}): Country {
  return createCountry(createMockRecord(overrides));
}

/**
 * The first seed country's values, used for exact-arithmetic checks.
 */
export const PORTUGAL_RECORD: CountryRecord = {
  name: 'Portugal',
  cost_of_living_index: 45,
  quality_of_life_index: 75,
  safety_index: 82,
  healthcare_index: 72,
  climate_score: 85,
  job_market_score: 60,
  english_proficiency: 65,
  visa_ease: 75,
  tax_friendliness: 60,
  internet_speed: 95,
  expat_community_size: 'Large',
};
