/**
 * Countries Command
 *
 * Lists the loaded country dataset.
 *
 * @module cli/commands/countries
 */

import { Command } from 'commander';
import { toCountryRecord, type Country } from '../../schemas/country.js';
import { createAdvisor } from '../advisor.js';
import { getBaseCommand, reportError, type BaseCommand } from '../base-command.js';
import { formatTable, type TableColumn } from '../formatters/index.js';

/**
 * Options for the countries command.
 */
export interface CountriesOptions {
  /** Output format */
  format?: 'table' | 'json';
}

const COLUMNS: readonly TableColumn[] = [
  { header: 'COUNTRY', width: 16 },
  { header: 'COST', width: 6 },
  { header: 'QOL', width: 6 },
  { header: 'SAFETY', width: 8 },
  { header: 'HEALTH', width: 8 },
  { header: 'CLIMATE', width: 9 },
  { header: 'JOBS', width: 6 },
  { header: 'ENGLISH', width: 9 },
  { header: 'VISA', width: 6 },
  { header: 'TAX', width: 5 },
  { header: 'MBPS', width: 6 },
  { header: 'EXPATS', width: 8 },
];

/**
 * Table cells for one country, in COLUMNS order.
 */
export function countryRow(country: Country): string[] {
  const m = country.metrics;
  return [
    country.name,
    ...[
      m.cost_of_living_index,
      m.quality_of_life_index,
      m.safety_index,
      m.healthcare_index,
      m.climate_score,
      m.job_market_score,
      m.english_proficiency,
      m.visa_ease,
      m.tax_friendliness,
      m.internet_speed,
    ].map(String),
    country.expatCommunitySize,
  ];
}

/**
 * Register the countries command.
 *
 * @param program - Root program
 */
export function registerCountriesCommand(program: Command): void {
  program
    .command('countries')
    .description('List the countries being ranked')
    .option('-f, --format <type>', 'Output format: table, json', 'table')
    .action(async (options: CountriesOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);

      try {
        await handleCountries(options, base);
      } catch (error) {
        reportError(base, error);
      }
    });
}

async function handleCountries(options: CountriesOptions, base: BaseCommand): Promise<void> {
  const advisor = await createAdvisor(base);

  if (options.format === 'json') {
    base.json(advisor.countries.map(toCountryRecord));
    return;
  }

  base.section('Countries');
  console.log(formatTable(COLUMNS, advisor.countries.map(countryRow)));
  base.blank();
  base.info(`Total: ${advisor.countries.length} countr${advisor.countries.length === 1 ? 'y' : 'ies'}`);
}

export default registerCountriesCommand;
