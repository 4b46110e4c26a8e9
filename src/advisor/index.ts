/**
 * Relocation Advisor
 *
 * Holds one read-only country collection and answers recommendation
 * queries against it. Every query is independent; the advisor keeps no
 * state between calls.
 *
 * @module advisor
 */

import { SEED_COUNTRIES, assertUniqueNames } from '../data/index.js';
import type { Country } from '../schemas/country.js';
import type { CriteriaSpecification } from '../schemas/criteria.js';
import {
  DEFAULT_TOP_N,
  evaluateCountries,
  explainRecommendation,
  recommendCountries,
  type CountryEvaluation,
  type RankedResult,
  type RecommendOptions,
} from '../ranking/index.js';

/**
 * Recommendation entry point for a fixed country collection.
 *
 * @example
 * ```typescript
 * const advisor = new RelocationAdvisor();
 * const results = advisor.recommend(createCriteria({ minRequirements: { safety_index: 80 } }), 3);
 * for (const result of results) {
 *   console.log(advisor.explain(result));
 * }
 * ```
 */
export class RelocationAdvisor {
  /** Collection every query is evaluated against */
  readonly countries: readonly Country[];

  /**
   * @param countries - Collection to rank (defaults to the built-in seed)
   * @throws {DatasetError} If two countries share a name
   */
  constructor(countries: readonly Country[] = SEED_COUNTRIES, source = 'advisor collection') {
    assertUniqueNames(countries, source);
    this.countries = Object.freeze([...countries]);
  }

  /**
   * Ranked shortlist of up to `topN` countries.
   */
  recommend(
    criteria: CriteriaSpecification,
    topN: number = DEFAULT_TOP_N,
    options: RecommendOptions = {}
  ): RankedResult[] {
    return recommendCountries(this.countries, criteria, topN, options);
  }

  /**
   * Outcome for every country, in collection order.
   */
  evaluate(criteria: CriteriaSpecification): CountryEvaluation[] {
    return evaluateCountries(this.countries, criteria);
  }

  /**
   * Text explanation of one ranked result.
   */
  explain(result: RankedResult): string {
    return explainRecommendation(result);
  }

  /**
   * Find a country by name, ignoring case.
   */
  findCountry(name: string): Country | undefined {
    const key = name.trim().toLowerCase();
    return this.countries.find((country) => country.name.toLowerCase() === key);
  }
}
