/**
 * Dataset File Loader
 *
 * Reads a caller-supplied JSON dataset from disk. The ranking core never
 * touches the filesystem; only the CLI uses this.
 *
 * @module data/loader
 */

import * as fs from 'node:fs/promises';
import { DatasetError } from '../errors.js';
import type { Country } from '../schemas/country.js';
import { buildCountryCollection } from './collection.js';

/**
 * Load and validate a country dataset from a JSON file.
 *
 * @param filePath - Path to a JSON array of country records
 * @returns Frozen country collection
 * @throws {DatasetError} If the file is missing, unreadable, not JSON, or invalid
 */
export async function loadCountriesFromFile(filePath: string): Promise<readonly Country[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new DatasetError(`Dataset file not found: ${filePath}`, filePath);
    }
    throw new DatasetError(
      `Failed to read dataset file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new DatasetError(
      `Dataset file is not valid JSON (${filePath}): ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }

  return buildCountryCollection(data, filePath);
}
