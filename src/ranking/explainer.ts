/**
 * Recommendation Explainer
 *
 * Renders a ranked result as plain text: the overall score, the weighted
 * contribution of each metric (largest first), and a handful of key
 * statistics straight from the country record.
 *
 * @module ranking/explainer
 */

import { isMetricName, type MetricName } from '../schemas/common.js';
import type { RankedResult } from './ranker.js';
import { breakdownEntries } from './scorer.js';

// ============================================================================
// Constants
// ============================================================================

/**
 * Display labels for breakdown rows. Metrics without a label are shown
 * by their raw name.
 */
export const METRIC_LABELS: Readonly<Partial<Record<MetricName, string>>> = Object.freeze({
  cost_of_living_index: 'Cost of Living (inverted)',
  quality_of_life_index: 'Quality of Life',
  safety_index: 'Safety',
  healthcare_index: 'Healthcare',
  climate_score: 'Climate',
  job_market_score: 'Job Market',
  english_proficiency: 'English Proficiency',
  visa_ease: 'Visa Accessibility',
  tax_friendliness: 'Tax Friendliness',
});

/** Width of the header and section rules */
export const EXPLANATION_WIDTH = 60;

/** Width the breakdown labels are dot-padded to */
const LABEL_WIDTH = 40;

/** Width the breakdown values are right-aligned to */
const VALUE_WIDTH = 6;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Human-readable label for a metric, falling back to the name itself.
 */
export function getMetricLabel(metric: string): string {
  return (isMetricName(metric) ? METRIC_LABELS[metric] : undefined) ?? metric;
}

/**
 * Format a breakdown row: dot-padded label, right-aligned value.
 *
 * @example
 * ```
 *   Quality of Life.........................  15.00
 * ```
 */
export function formatBreakdownRow(metric: string, contribution: number): string {
  const label = getMetricLabel(metric).padEnd(LABEL_WIDTH, '.');
  return `  ${label} ${contribution.toFixed(2).padStart(VALUE_WIDTH)}`;
}

// ============================================================================
// Explanation
// ============================================================================

/**
 * Render a ranked result as a multi-line explanation.
 *
 * The "/100" suffix on the overall score is only shown when the result is
 * bounded, i.e. non-negative weights summing to at most 1 over values in
 * the 0-100 range.
 */
export function explainRecommendation(result: RankedResult): string {
  const { country, score, breakdown } = result;
  const heavyRule = '='.repeat(EXPLANATION_WIDTH);
  const lightRule = '-'.repeat(EXPLANATION_WIDTH);

  const rows = breakdownEntries(breakdown)
    .sort((a, b) => b[1] - a[1])
    .map(([metric, contribution]) => formatBreakdownRow(metric, contribution));

  const lines = [
    '',
    heavyRule,
    `Country: ${country.name}`,
    `Overall Score: ${score.toFixed(2)}${result.bounded ? '/100' : ''}`,
    heavyRule,
    '',
    'Score Breakdown:',
    lightRule,
    ...rows,
    '',
    'Key Statistics:',
    lightRule,
    `  Cost of Living Index: ${country.metrics.cost_of_living_index}/100 (lower is cheaper)`,
    `  Safety Index: ${country.metrics.safety_index}/100`,
    `  Healthcare Index: ${country.metrics.healthcare_index}/100`,
    `  Average Internet Speed: ${country.metrics.internet_speed} Mbps`,
    `  Expat Community: ${country.expatCommunitySize}`,
  ];

  return lines.join('\n') + '\n';
}
