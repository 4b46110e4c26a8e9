/**
 * Scenario Presets
 *
 * Ready-made criteria for common relocation profiles. Each preset is
 * plain criteria input; the CLI lets explicit flags override it.
 *
 * @module scenarios
 */

import { createCriteria, type CriteriaInput, type CriteriaSpecification } from '../schemas/criteria.js';

// ============================================================================
// Types
// ============================================================================

export const SCENARIO_IDS = ['digital-nomad', 'family', 'budget-retiree'] as const;

export type ScenarioId = (typeof SCENARIO_IDS)[number];

export interface Scenario {
  readonly id: ScenarioId;
  readonly title: string;
  readonly description: string;
  readonly criteria: Readonly<CriteriaInput>;
  /** Suggested shortlist length */
  readonly topN: number;
}

// ============================================================================
// Presets
// ============================================================================

export const SCENARIOS: Readonly<Record<ScenarioId, Scenario>> = Object.freeze({
  'digital-nomad': {
    id: 'digital-nomad',
    title: 'Digital Nomad',
    description: 'Remote worker who wants low costs, good weather and fast internet',
    criteria: {
      weights: {
        cost_of_living_index: 0.25,
        quality_of_life_index: 0.15,
        safety_index: 0.15,
        healthcare_index: 0.1,
        climate_score: 0.15,
        // Remote work makes the local job market nearly irrelevant
        job_market_score: 0.02,
        english_proficiency: 0.08,
        visa_ease: 0.1,
        tax_friendliness: 0,
      },
      minRequirements: {
        internet_speed: 80,
        safety_index: 60,
      },
    },
    topN: 3,
  },
  family: {
    id: 'family',
    title: 'Family Relocation',
    description: 'Family prioritizing safety, healthcare and quality of life',
    criteria: {
      weights: {
        cost_of_living_index: 0.1,
        quality_of_life_index: 0.25,
        safety_index: 0.25,
        healthcare_index: 0.2,
        climate_score: 0.05,
        job_market_score: 0.1,
        english_proficiency: 0.05,
        visa_ease: 0,
        tax_friendliness: 0,
      },
      minRequirements: {
        safety_index: 75,
        healthcare_index: 70,
        quality_of_life_index: 70,
      },
    },
    topN: 3,
  },
  'budget-retiree': {
    id: 'budget-retiree',
    title: 'Budget-Conscious Retiree',
    description: 'Retiree on a fixed income who needs affordable healthcare and sunshine',
    criteria: {
      weights: {
        cost_of_living_index: 0.3,
        quality_of_life_index: 0.15,
        safety_index: 0.15,
        healthcare_index: 0.2,
        climate_score: 0.15,
        job_market_score: 0,
        english_proficiency: 0.05,
        visa_ease: 0,
        tax_friendliness: 0,
      },
      minRequirements: {
        healthcare_index: 60,
        safety_index: 65,
      },
    },
    topN: 3,
  },
});

// ============================================================================
// Lookup
// ============================================================================

function isScenarioId(id: string): id is ScenarioId {
  return SCENARIO_IDS.some((known) => known === id);
}

/**
 * Find a scenario by id.
 */
export function getScenario(id: string): Scenario | undefined {
  return isScenarioId(id) ? SCENARIOS[id] : undefined;
}

/**
 * All scenarios, in declaration order.
 */
export function listScenarios(): Scenario[] {
  return SCENARIO_IDS.map((id) => SCENARIOS[id]);
}

/**
 * Build the criteria specification for a scenario.
 */
export function scenarioCriteria(scenario: Scenario): CriteriaSpecification {
  return createCriteria(scenario.criteria);
}
