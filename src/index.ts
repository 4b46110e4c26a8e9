/**
 * Relocation Advisor
 *
 * Library entry point: build criteria, rank countries, explain results.
 *
 * @example
 * ```typescript
 * import { RelocationAdvisor, createCriteria } from 'relocation-advisor';
 *
 * const advisor = new RelocationAdvisor();
 * const [best] = advisor.recommend(createCriteria({ minRequirements: { internet_speed: 100 } }), 1);
 * console.log(advisor.explain(best));
 * ```
 *
 * @module relocation-advisor
 */

export * from './schemas/index.js';
export * from './ranking/index.js';
export { RelocationAdvisor } from './advisor/index.js';
export { SEED_COUNTRIES, buildCountryCollection, loadCountriesFromFile } from './data/index.js';
export { SCENARIOS, SCENARIO_IDS, getScenario, listScenarios, scenarioCriteria, type Scenario, type ScenarioId } from './scenarios/index.js';
export { ConfigurationError, DatasetError } from './errors.js';
