/**
 * Scenarios Command
 *
 * Lists the built-in scenario presets usable with --scenario.
 *
 * @module cli/commands/scenarios
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { listScenarios } from '../../scenarios/index.js';
import { getBaseCommand } from '../base-command.js';

/**
 * Options for the scenarios command.
 */
export interface ScenariosOptions {
  /** Output format */
  format?: 'text' | 'json';
}

/**
 * Register the scenarios command.
 *
 * @param program - Root program
 */
export function registerScenariosCommand(program: Command): void {
  program
    .command('scenarios')
    .description('List scenario presets')
    .option('-f, --format <type>', 'Output format: text, json', 'text')
    .action((options: ScenariosOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);
      const scenarios = listScenarios();

      if (options.format === 'json') {
        base.json(scenarios);
        return;
      }

      base.section('Scenarios');
      for (const scenario of scenarios) {
        base.info(`${chalk.cyan(scenario.id)}  ${chalk.bold(scenario.title)}`);
        base.info(`  ${scenario.description}`);
        const minimums = Object.entries(scenario.criteria.minRequirements ?? {})
          .map(([metric, value]) => `${metric} >= ${value}`)
          .join(', ');
        if (minimums) {
          base.keyValue('  Minimums', minimums);
        }
        base.keyValue('  Top', scenario.topN);
        base.blank();
      }
    });
}

export default registerScenariosCommand;
