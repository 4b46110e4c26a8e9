/**
 * Unit Tests for Zod Schemas
 *
 * Tests metric names, country records and criteria construction with
 * valid and invalid data.
 */

import { describe, it, expect } from '@jest/globals';
import {
  METRIC_NAMES,
  STANDARD_METRICS,
  MetricNameSchema,
  isMetricName,
  CountryRecordSchema,
  createCountry,
  toCountryRecord,
  getMetricValue,
  DEFAULT_WEIGHTS,
  createCriteria,
  parseCriteria,
  getThreshold,
  validateWeights,
} from './index.js';
import { ConfigurationError } from '../errors.js';
import { createMockRecord, PORTUGAL_RECORD } from '../test-utils/countries.js';

// ============================================================================
// Metric Names
// ============================================================================

describe('MetricNameSchema', () => {
  it('should accept all ten metrics', () => {
    expect(METRIC_NAMES).toHaveLength(10);
    for (const metric of METRIC_NAMES) {
      expect(MetricNameSchema.safeParse(metric).success).toBe(true);
    }
  });

  it('should treat the categorical attribute as a non-metric', () => {
    expect(isMetricName('expat_community_size')).toBe(false);
    expect(isMetricName('name')).toBe(false);
  });

  it('should list nine standard metrics without internet speed', () => {
    expect(STANDARD_METRICS).toHaveLength(9);
    expect(STANDARD_METRICS).not.toContain('internet_speed');
  });
});

// ============================================================================
// Country
// ============================================================================

describe('CountryRecordSchema', () => {
  it('should accept a complete record', () => {
    expect(CountryRecordSchema.safeParse(PORTUGAL_RECORD).success).toBe(true);
  });

  it('should accept internet speed above 100', () => {
    expect(CountryRecordSchema.safeParse(createMockRecord({ internet_speed: 250 })).success).toBe(true);
  });

  it('should reject a missing metric', () => {
    const { visa_ease: _omitted, ...partial } = createMockRecord();
    expect(CountryRecordSchema.safeParse(partial).success).toBe(false);
  });

  it('should reject a negative internet speed', () => {
    expect(CountryRecordSchema.safeParse(createMockRecord({ internet_speed: -1 })).success).toBe(false);
  });

  it('should reject a blank name', () => {
    expect(CountryRecordSchema.safeParse(createMockRecord({ name: '   ' })).success).toBe(false);
  });
});

describe('createCountry', () => {
  it('should build a frozen country that round-trips to its record', () => {
    const country = createCountry(PORTUGAL_RECORD);

    expect(country.name).toBe('Portugal');
    expect(country.metrics.cost_of_living_index).toBe(45);
    expect(country.expatCommunitySize).toBe('Large');
    expect(Object.isFrozen(country.metrics)).toBe(true);
    expect(toCountryRecord(country)).toEqual(PORTUGAL_RECORD);
  });
});

describe('getMetricValue', () => {
  const country = createCountry(PORTUGAL_RECORD);

  it('should return known metric values', () => {
    expect(getMetricValue(country, 'internet_speed')).toBe(95);
  });

  it('should return undefined for unknown names', () => {
    expect(getMetricValue(country, 'nightlife_score')).toBeUndefined();
    expect(getMetricValue(country, 'expat_community_size')).toBeUndefined();
  });
});

// ============================================================================
// Criteria
// ============================================================================

describe('createCriteria', () => {
  it('should substitute the default weights when none are given', () => {
    const criteria = createCriteria();

    expect(criteria.weights).toEqual(DEFAULT_WEIGHTS);
    expect(Object.keys(criteria.weights)).toEqual([...STANDARD_METRICS]);
    const sum = Object.values(criteria.weights).reduce((total, w) => total + w, 0);
    expect(sum).toBeCloseTo(1.0, 10);
  });

  it('should substitute the default weights for an empty mapping', () => {
    expect(createCriteria({ weights: {} }).weights).toEqual(DEFAULT_WEIGHTS);
  });

  it('should keep caller weights as given, in order', () => {
    const criteria = createCriteria({ weights: { visa_ease: 3, safety_index: 2 } });
    expect(Object.entries(criteria.weights)).toEqual([
      ['visa_ease', 3],
      ['safety_index', 2],
    ]);
  });

  it('should carry regions and deal-breakers', () => {
    const criteria = createCriteria({ preferredRegions: ['Europe'], dealBreakers: ['winter'] });
    expect(criteria.preferredRegions).toEqual(['Europe']);
    expect(criteria.dealBreakers).toEqual(['winter']);
  });

  it('should freeze the result and not alias the input', () => {
    const weights: Record<string, number> = { safety_index: 1 };
    const criteria = createCriteria({ weights });
    weights.safety_index = 0;

    expect(criteria.weights.safety_index).toBe(1);
    expect(Object.isFrozen(criteria)).toBe(true);
    expect(Object.isFrozen(criteria.weights)).toBe(true);
  });
});

describe('parseCriteria', () => {
  it('should apply defaults for missing fields', () => {
    const criteria = parseCriteria({});
    expect(criteria.weights).toEqual(DEFAULT_WEIGHTS);
    expect(criteria.minRequirements).toEqual({});
    expect(criteria.preferredRegions).toEqual([]);
  });

  it('should accept unknown metric names', () => {
    const criteria = parseCriteria({ weights: { nightlife_score: 1 } });
    expect(criteria.weights).toEqual({ nightlife_score: 1 });
  });

  it('should throw ConfigurationError listing each issue', () => {
    let caught: unknown;
    try {
      parseCriteria({ weights: { safety_index: 'high' }, dealBreakers: 'snow' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    const issues = caught instanceof ConfigurationError ? caught.issues : [];
    expect(issues).toHaveLength(2);
    expect(issues[0]).toMatch(/^weights\.safety_index: /);
    expect(issues[1]).toMatch(/^dealBreakers: /);
  });

  it('should reject non-object input', () => {
    expect(() => parseCriteria('cheap please')).toThrow(ConfigurationError);
  });
});

describe('getThreshold', () => {
  it('should return the requirement or undefined', () => {
    const criteria = createCriteria({ minRequirements: { safety_index: 70 } });
    expect(getThreshold(criteria, 'safety_index')).toBe(70);
    expect(getThreshold(criteria, 'visa_ease')).toBeUndefined();
  });
});

describe('validateWeights', () => {
  it('should accept the default weights', () => {
    expect(validateWeights(createCriteria())).toEqual([]);
  });

  it('should flag weights that do not sum to 1', () => {
    expect(validateWeights(createCriteria({ weights: { safety_index: 0.5, visa_ease: 0.2 } }))).toEqual([
      'Weights sum to 0.7, not 1',
    ]);
  });

  it('should flag negative weights', () => {
    expect(validateWeights(createCriteria({ weights: { safety_index: 1.5, visa_ease: -0.5 } }))).toEqual([
      'Negative weight for visa_ease: -0.5',
    ]);
  });

  it('should flag unknown metrics in weights and requirements', () => {
    const criteria = createCriteria({
      weights: { safety_index: 1, beaches: 0.5 },
      minRequirements: { nightlife_score: 10 },
    });
    expect(validateWeights(criteria)).toEqual([
      'Unknown metric in weights will be ignored: beaches',
      'Unknown metric in minimum requirements will be ignored: nightlife_score',
    ]);
  });
});
