/**
 * Tests for the Recommendation Explainer
 */

import { describe, it, expect } from '@jest/globals';
import { explainRecommendation, formatBreakdownRow, getMetricLabel, METRIC_LABELS } from './explainer.js';
import { recommendCountries, type RankedResult } from './ranker.js';
import { calculateScore } from './scorer.js';
import { createCriteria } from '../schemas/criteria.js';
import { createCountry } from '../schemas/country.js';
import { STANDARD_METRICS } from '../schemas/common.js';
import { SEED_COUNTRIES } from '../data/index.js';
import { PORTUGAL_RECORD } from '../test-utils/countries.js';

const portugal = createCountry(PORTUGAL_RECORD);

describe('getMetricLabel', () => {
  it('should label every standard metric', () => {
    for (const metric of STANDARD_METRICS) {
      expect(METRIC_LABELS[metric]).toBeDefined();
    }
    expect(getMetricLabel('visa_ease')).toBe('Visa Accessibility');
  });

  it('should fall back to the raw name', () => {
    expect(getMetricLabel('internet_speed')).toBe('internet_speed');
    expect(getMetricLabel('nightlife_score')).toBe('nightlife_score');
  });
});

describe('formatBreakdownRow', () => {
  it('should dot-pad the label and right-align the value', () => {
    expect(formatBreakdownRow('quality_of_life_index', 15)).toBe(
      '  Quality of Life.........................  15.00'
    );
  });

  it('should right-align small values to six characters', () => {
    expect(formatBreakdownRow('tax_friendliness', 3)).toBe('  Tax Friendliness........................   3.00');
  });
});

describe('explainRecommendation', () => {
  it('should render the default-weight explanation for Portugal', () => {
    const { total, breakdown } = calculateScore(portugal, createCriteria());
    const text = explainRecommendation({ country: portugal, score: total, breakdown, bounded: true });

    expect(text).toBe(
      [
        '',
        '============================================================',
        'Country: Portugal',
        'Overall Score: 71.00/100',
        '============================================================',
        '',
        'Score Breakdown:',
        '------------------------------------------------------------',
        '  Quality of Life.........................  15.00',
        '  Safety..................................  12.30',
        '  Climate.................................   8.50',
        '  Cost of Living (inverted)...............   8.25',
        '  Visa Accessibility......................   7.50',
        '  Healthcare..............................   7.20',
        '  Job Market..............................   6.00',
        '  English Proficiency.....................   3.25',
        '  Tax Friendliness........................   3.00',
        '',
        'Key Statistics:',
        '------------------------------------------------------------',
        '  Cost of Living Index: 45/100 (lower is cheaper)',
        '  Safety Index: 82/100',
        '  Healthcare Index: 72/100',
        '  Average Internet Speed: 95 Mbps',
        '  Expat Community: Large',
        '',
      ].join('\n')
    );
  });

  it('should explain the top seed recommendation', () => {
    const [top] = recommendCountries(SEED_COUNTRIES, createCriteria(), 1);
    const lines = explainRecommendation(top).split('\n');

    expect(lines[2]).toBe('Country: Singapore');
    expect(lines[3]).toBe('Overall Score: 74.65/100');
    expect(lines[8]).toBe('  Quality of Life.........................  18.40');
    expect(lines[16]).toBe('  Cost of Living (inverted)...............   2.25');
    expect(lines).toContain('  Average Internet Speed: 200 Mbps');
  });

  it('should omit the /100 suffix for unbounded results', () => {
    const result: RankedResult = {
      country: portugal,
      score: 190,
      breakdown: { internet_speed: 190 },
      bounded: false,
    };
    const lines = explainRecommendation(result).split('\n');

    expect(lines[3]).toBe('Overall Score: 190.00');
    expect(lines[8]).toBe('  internet_speed.......................... 190.00');
  });

  it('should keep insertion order for equal contributions', () => {
    const result: RankedResult = {
      country: portugal,
      score: 20,
      breakdown: { visa_ease: 10, safety_index: 10 },
      bounded: true,
    };
    const lines = explainRecommendation(result).split('\n');

    expect(lines.slice(8, 10)).toEqual([
      '  Visa Accessibility......................  10.00',
      '  Safety..................................  10.00',
    ]);
  });
});
