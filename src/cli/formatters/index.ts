/**
 * CLI Formatters
 *
 * Re-exports all CLI formatting utilities.
 *
 * @module cli/formatters
 */

// Table helpers
export { truncate, padRight, formatTable, type TableColumn } from './table.js';

// Recommendation output
export {
  formatRecommendations,
  formatEvaluation,
  formatEvaluationLine,
  toRankedResultJson,
  type RankedResultJson,
} from './recommendation.js';
