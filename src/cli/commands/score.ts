/**
 * Score Command
 *
 * Evaluates a single country against the criteria and explains the
 * result, including why it would be left out of a shortlist.
 *
 * @module cli/commands/score
 */

import { Command } from 'commander';
import { getConfig } from '../../config/index.js';
import { evaluateCountries } from '../../ranking/index.js';
import { createAdvisor } from '../advisor.js';
import { EXIT_CODES, getBaseCommand, reportError, type BaseCommand } from '../base-command.js';
import { formatEvaluation } from '../formatters/index.js';
import { addCriteriaOptions, buildCriteriaFromOptions, resolveScenario, type CriteriaCommandOptions } from '../options.js';
import { checkWeights } from './recommend.js';

/**
 * Register the score command.
 *
 * @param program - Root program
 */
export function registerScoreCommand(program: Command): void {
  const command = program
    .command('score <country>')
    .description('Score one country and explain the result');

  addCriteriaOptions(command).action(async (name: string, options: CriteriaCommandOptions, cmd: Command) => {
    const base = getBaseCommand(cmd);

    try {
      await handleScore(name, options, base);
    } catch (error) {
      reportError(base, error);
    }
  });
}

/**
 * Handle the score command.
 */
async function handleScore(name: string, options: CriteriaCommandOptions, base: BaseCommand): Promise<void> {
  const criteria = buildCriteriaFromOptions(options, resolveScenario(options.scenario));
  checkWeights(criteria, options.strict === true || getConfig().strictWeights, base);

  const advisor = await createAdvisor(base);
  const country = advisor.findCountry(name);
  if (!country) {
    base.error(`Country not found: ${name}`, EXIT_CODES.NOT_FOUND);
    return;
  }

  const [evaluation] = evaluateCountries([country], criteria);
  console.log(formatEvaluation(evaluation));
}

export default registerScoreCommand;
