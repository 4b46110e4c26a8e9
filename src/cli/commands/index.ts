/**
 * CLI Commands Registry
 *
 * Registers all available CLI commands with the main program.
 * Each command is implemented in its own file and registered here.
 *
 * Available commands:
 * - recommend: Rank countries against criteria
 * - score: Evaluate and explain a single country
 * - countries: List the loaded dataset
 * - scenarios: List scenario presets
 * - metrics: List metric names
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerRecommendCommand } from './recommend.js';
import { registerScoreCommand } from './score.js';
import { registerCountriesCommand } from './countries.js';
import { registerScenariosCommand } from './scenarios.js';
import { registerMetricsCommand } from './metrics.js';

/**
 * Register all CLI commands with the program.
 *
 * @param program - Commander program instance
 */
export function registerCommands(program: Command): void {
  registerRecommendCommand(program);
  registerScoreCommand(program);
  registerCountriesCommand(program);
  registerScenariosCommand(program);
  registerMetricsCommand(program);
}

/**
 * Get help text for all available commands.
 *
 * @returns Array of command help entries
 */
export function getCommandHelp(): Array<{ name: string; description: string }> {
  return [
    { name: 'recommend', description: 'Recommend the best countries for your criteria' },
    { name: 'score <country>', description: 'Score one country and explain the result' },
    { name: 'countries', description: 'List the countries being ranked' },
    { name: 'scenarios', description: 'List scenario presets' },
    { name: 'metrics', description: 'List metric names for --weight and --min' },
  ];
}
