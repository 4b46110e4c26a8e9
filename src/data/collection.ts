/**
 * Country Collections
 *
 * Validation and freezing shared by the seed dataset and file loader.
 *
 * @module data/collection
 */

import { DatasetError, formatZodIssues } from '../errors.js';
import { CountryDatasetSchema, createCountry, type Country } from '../schemas/country.js';

/** Source label used in errors for the built-in dataset */
export const SEED_SOURCE = 'built-in seed';

/**
 * Validate raw records and build a frozen collection.
 *
 * @param data - Parsed JSON (expected to be an array of country records)
 * @param source - Where the data came from, for error messages
 * @throws {DatasetError} On schema violations or duplicate country names
 */
export function buildCountryCollection(data: unknown, source: string): readonly Country[] {
  const result = CountryDatasetSchema.safeParse(data);
  if (!result.success) {
    throw new DatasetError(
      `Invalid country dataset (${source}):\n  - ${formatZodIssues(result.error).join('\n  - ')}`,
      source
    );
  }

  const countries = result.data.map(createCountry);
  assertUniqueNames(countries, source);
  return Object.freeze(countries);
}

/**
 * Ensure no two countries share a name (case-insensitive).
 *
 * @throws {DatasetError} Naming the first duplicate found
 */
export function assertUniqueNames(countries: readonly Country[], source: string): void {
  const seen = new Set<string>();
  for (const country of countries) {
    const key = country.name.toLowerCase();
    if (seen.has(key)) {
      throw new DatasetError(`Duplicate country name in ${source}: ${country.name}`, source);
    }
    seen.add(key);
  }
}
