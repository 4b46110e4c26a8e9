/**
 * Tests for RelocationAdvisor
 */

import { describe, it, expect } from '@jest/globals';
import { RelocationAdvisor } from './index.js';
import { SEED_COUNTRIES } from '../data/index.js';
import { DatasetError } from '../errors.js';
import { createCriteria } from '../schemas/criteria.js';
import { createMockCountry } from '../test-utils/countries.js';

describe('RelocationAdvisor', () => {
  it('should use the seed countries by default', () => {
    const advisor = new RelocationAdvisor();
    expect(advisor.countries).toHaveLength(SEED_COUNTRIES.length);
  });

  it('should reject duplicate country names', () => {
    const countries = [createMockCountry({ name: 'A' }), createMockCountry({ name: 'A' })];
    expect(() => new RelocationAdvisor(countries)).toThrow(DatasetError);
  });

  it('should recommend from its own collection', () => {
    const advisor = new RelocationAdvisor([
      createMockCountry({ name: 'Calm', safety_index: 90 }),
      createMockCountry({ name: 'Risky', safety_index: 30 }),
    ]);

    const results = advisor.recommend(createCriteria({ weights: { safety_index: 1 } }));

    expect(results.map((r) => r.country.name)).toEqual(['Calm', 'Risky']);
  });

  it('should respect topN', () => {
    const advisor = new RelocationAdvisor();
    expect(advisor.recommend(createCriteria(), 3)).toHaveLength(3);
  });

  it('should evaluate every country', () => {
    const advisor = new RelocationAdvisor();
    const evaluations = advisor.evaluate(createCriteria({ minRequirements: { safety_index: 80 } }));

    expect(evaluations).toHaveLength(12);
    const mexico = evaluations.find((e) => e.country.name === 'Mexico');
    expect(mexico?.outcome.status).toBe('disqualified');
  });

  it('should explain a result', () => {
    const advisor = new RelocationAdvisor();
    const [top] = advisor.recommend(createCriteria(), 1);
    expect(advisor.explain(top)).toContain('Country: Singapore\n');
  });

  it('should find countries ignoring case and whitespace', () => {
    const advisor = new RelocationAdvisor();
    expect(advisor.findCountry('  new zealand ')?.name).toBe('New Zealand');
    expect(advisor.findCountry('Atlantis')).toBeUndefined();
  });
});
