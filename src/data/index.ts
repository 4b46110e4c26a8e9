/**
 * Country Dataset
 *
 * The built-in seed list lives in countries.json; callers may supply
 * their own records through `buildCountryCollection` or
 * `loadCountriesFromFile`.
 *
 * @module data
 */

import type { Country } from '../schemas/country.js';
import { SEED_SOURCE, buildCountryCollection } from './collection.js';
import seedRecords from './countries.json';

/**
 * The twelve built-in countries.
 */
export const SEED_COUNTRIES: readonly Country[] = buildCountryCollection(seedRecords, SEED_SOURCE);

export { SEED_SOURCE, buildCountryCollection, assertUniqueNames } from './collection.js';
export { loadCountriesFromFile } from './loader.js';
