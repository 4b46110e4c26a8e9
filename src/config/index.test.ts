/**
 * Tests for configuration module
 *
 * @module config/index.test
 */

import { describe, it, expect } from '@jest/globals';
import { getConfig, loadConfig } from './index.js';
import { ConfigurationError } from '../errors.js';

describe('config', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.defaultTopN).toBe(5);
    expect(config.strictWeights).toBe(false);
    expect(config.datasetPath).toBeUndefined();
  });

  it('should read overrides', () => {
    const config = loadConfig({
      RELOCATE_DEFAULT_TOP_N: '3',
      RELOCATE_DATASET: '/data/countries.json',
      RELOCATE_STRICT_WEIGHTS: 'true',
      NODE_ENV: 'production',
    });

    expect(config.defaultTopN).toBe(3);
    expect(config.datasetPath).toBe('/data/countries.json');
    expect(config.strictWeights).toBe(true);
  });

  it('should reject an unknown NODE_ENV', () => {
    expect(() => loadConfig({ NODE_ENV: 'staging' })).toThrow(/NODE_ENV/);
  });

  it('should reject a non-positive top N', () => {
    expect(() => loadConfig({ RELOCATE_DEFAULT_TOP_N: '0' })).toThrow(ConfigurationError);
  });

  it('should reject an invalid strict flag and name the variable', () => {
    expect(() => loadConfig({ RELOCATE_STRICT_WEIGHTS: 'yes' })).toThrow(/RELOCATE_STRICT_WEIGHTS/);
  });

  it('should cache the process configuration', () => {
    expect(getConfig()).toBe(getConfig());
  });
});
