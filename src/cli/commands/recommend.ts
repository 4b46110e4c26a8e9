/**
 * Recommend Command
 *
 * Ranks the loaded countries against criteria built from a scenario
 * preset and/or explicit weight and minimum flags.
 *
 * @module cli/commands/recommend
 */

import { Command } from 'commander';
import { getConfig } from '../../config/index.js';
import { ConfigurationError } from '../../errors.js';
import { validateWeights, type CriteriaSpecification } from '../../schemas/criteria.js';
import { createAdvisor } from '../advisor.js';
import { getBaseCommand, reportError, type BaseCommand } from '../base-command.js';
import { formatEvaluationLine, formatRecommendations, toRankedResultJson } from '../formatters/index.js';
import {
  addCriteriaOptions,
  buildCriteriaFromOptions,
  parseTopN,
  resolveScenario,
  type CriteriaCommandOptions,
} from '../options.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for the recommend command.
 */
export interface RecommendCommandOptions extends CriteriaCommandOptions {
  /** Maximum number of recommendations */
  top?: string;
  /** Keep countries whose weighted total is 0 or below */
  keepZero?: boolean;
  /** Output format */
  format?: 'text' | 'json';
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Surface weight warnings, or fail on them in strict mode.
 *
 * @throws {ConfigurationError} In strict mode when there are warnings
 */
export function checkWeights(criteria: CriteriaSpecification, strict: boolean, base: BaseCommand): void {
  const warnings = validateWeights(criteria);
  if (warnings.length === 0) {
    return;
  }
  if (strict) {
    throw new ConfigurationError('Weight validation failed', warnings);
  }
  for (const warning of warnings) {
    base.warn(warning);
  }
}

// ============================================================================
// Command Registration
// ============================================================================

/**
 * Register the recommend command.
 *
 * @param program - Root program
 */
export function registerRecommendCommand(program: Command): void {
  const command = program
    .command('recommend')
    .description('Recommend the best countries for your criteria');

  addCriteriaOptions(command)
    .option('-n, --top <count>', 'Maximum number of recommendations')
    .option('--keep-zero', 'Keep countries whose weighted score is 0 or below')
    .option('-f, --format <type>', 'Output format: text, json', 'text')
    .action(async (options: RecommendCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);

      try {
        await handleRecommend(options, base);
      } catch (error) {
        reportError(base, error);
      }
    });
}

/**
 * Handle the recommend command.
 *
 * @param options - Command options
 * @param base - Base command for output
 */
async function handleRecommend(options: RecommendCommandOptions, base: BaseCommand): Promise<void> {
  const config = getConfig();
  const scenario = resolveScenario(options.scenario);
  const criteria = buildCriteriaFromOptions(options, scenario);
  const topN = options.top !== undefined ? parseTopN(options.top) : (scenario?.topN ?? config.defaultTopN);

  checkWeights(criteria, options.strict === true || config.strictWeights, base);

  const advisor = await createAdvisor(base);
  const results = advisor.recommend(criteria, topN, { keepZeroScores: options.keepZero === true });

  if (base.isVerbose()) {
    for (const evaluation of advisor.evaluate(criteria)) {
      base.debug(formatEvaluationLine(evaluation));
    }
  }

  if (options.format === 'json') {
    base.json(toRankedResultJson(results));
    return;
  }

  if (scenario) {
    base.section(`Scenario: ${scenario.title}`);
    base.info(scenario.description);
    base.blank();
  }

  if (results.length === 0) {
    console.log('No countries meet the criteria.');
    return;
  }

  console.log(formatRecommendations(results));
}

export default registerRecommendCommand;
