/**
 * Criteria Options
 *
 * Shared option definitions and parsing for commands that take criteria
 * (recommend, score). Turns repeatable `metric=value` flags and an
 * optional scenario preset into a validated criteria specification.
 *
 * @module cli/options
 */

import type { Command } from 'commander';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { getScenario, type Scenario } from '../scenarios/index.js';
import { parseCriteria, type CriteriaSpecification } from '../schemas/criteria.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Criteria-related options shared by recommend and score.
 */
export interface CriteriaCommandOptions {
  /** Scenario preset id */
  scenario?: string;
  /** Repeated metric=weight pairs */
  weight: string[];
  /** Repeated metric=minimum pairs */
  min: string[];
  /** Preferred regions (carried, not enforced) */
  region: string[];
  /** Deal-breakers (carried, not enforced) */
  dealBreaker: string[];
  /** Fail on weight warnings */
  strict?: boolean;
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Commander argument parser that accumulates repeated option values.
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Parse `metric=value` pairs into a mapping, keeping flag order.
 *
 * @throws {ConfigurationError} If a pair is malformed or the value is not a number
 */
export function parseMetricPairs(pairs: readonly string[], flag: string): Record<string, number> {
  const result: Record<string, number> = {};
  const issues: string[] = [];

  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    const metric = separator > 0 ? pair.slice(0, separator).trim() : '';
    const rawValue = separator > 0 ? pair.slice(separator + 1).trim() : '';
    const value = Number(rawValue);

    if (!metric || rawValue === '' || !Number.isFinite(value)) {
      issues.push(`${flag} ${pair}: expected <metric>=<number>`);
      continue;
    }
    result[metric] = value;
  }

  if (issues.length > 0) {
    throw new ConfigurationError(`Invalid ${flag} values`, issues);
  }
  return result;
}

const TopNSchema = z.coerce.number().int().min(0);

/**
 * Parse the --top value.
 *
 * @throws {ConfigurationError} If the value is not a non-negative integer
 */
export function parseTopN(value: string): number {
  const result = TopNSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError(`Invalid --top value: ${value} (expected a non-negative integer)`);
  }
  return result.data;
}

/**
 * Resolve the scenario named by --scenario, if any.
 *
 * @throws {ConfigurationError} If the id is unknown
 */
export function resolveScenario(id: string | undefined): Scenario | undefined {
  if (id === undefined) {
    return undefined;
  }
  const scenario = getScenario(id);
  if (!scenario) {
    throw new ConfigurationError(`Unknown scenario: ${id}`, ['Run "relocate scenarios" to list presets']);
  }
  return scenario;
}

/**
 * Build a criteria specification from command options.
 *
 * Explicit --weight values replace the scenario's weights entirely;
 * explicit --min values are merged over the scenario's minimums. With
 * neither weights nor a scenario, the default weights apply.
 */
export function buildCriteriaFromOptions(
  options: CriteriaCommandOptions,
  scenario: Scenario | undefined
): CriteriaSpecification {
  const weights = parseMetricPairs(options.weight, '--weight');
  const minimums = parseMetricPairs(options.min, '--min');
  const hasExplicitWeights = Object.keys(weights).length > 0;

  return parseCriteria({
    weights: hasExplicitWeights ? weights : (scenario?.criteria.weights ?? {}),
    minRequirements: { ...scenario?.criteria.minRequirements, ...minimums },
    preferredRegions: [...(scenario?.criteria.preferredRegions ?? []), ...options.region],
    dealBreakers: [...(scenario?.criteria.dealBreakers ?? []), ...options.dealBreaker],
  });
}

// ============================================================================
// Registration
// ============================================================================

/**
 * Add the shared criteria options to a command.
 */
export function addCriteriaOptions(command: Command): Command {
  return command
    .option('-s, --scenario <id>', 'Start from a scenario preset (see "relocate scenarios")')
    .option('-w, --weight <metric=value>', 'Weight for a metric (repeatable)', collect, [])
    .option('-m, --min <metric=value>', 'Minimum raw value for a metric (repeatable)', collect, [])
    .option('--region <name>', 'Preferred region (repeatable, informational)', collect, [])
    .option('--deal-breaker <name>', 'Deal-breaker (repeatable, informational)', collect, [])
    .option('--strict', 'Fail when weights are negative, unknown, or do not sum to 1');
}
