/**
 * CLI Advisor Factory
 *
 * Chooses the country collection for a CLI run: the --dataset flag wins,
 * then RELOCATE_DATASET, then the built-in seed list.
 *
 * @module cli/advisor
 */

import { RelocationAdvisor } from '../advisor/index.js';
import { getConfig } from '../config/index.js';
import { SEED_COUNTRIES, SEED_SOURCE, loadCountriesFromFile } from '../data/index.js';
import type { BaseCommand } from './base-command.js';

/**
 * Create an advisor over the configured country collection.
 *
 * @throws {DatasetError} If a dataset file is configured and cannot be loaded
 */
export async function createAdvisor(base: BaseCommand): Promise<RelocationAdvisor> {
  const datasetPath = base.options.dataset ?? getConfig().datasetPath;

  if (!datasetPath) {
    base.debug(`Using ${SEED_SOURCE} (${SEED_COUNTRIES.length} countries)`);
    return new RelocationAdvisor(SEED_COUNTRIES, SEED_SOURCE);
  }

  const countries = await loadCountriesFromFile(datasetPath);
  base.debug(`Loaded ${countries.length} countries from ${datasetPath}`);
  return new RelocationAdvisor(countries, datasetPath);
}
