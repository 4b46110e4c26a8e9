/**
 * Metrics Command
 *
 * Lists the metric names accepted by --weight and --min.
 *
 * @module cli/commands/metrics
 */

import { Command } from 'commander';
import { getMetricLabel } from '../../ranking/index.js';
import { INVERTED_METRICS, METRIC_NAMES, type MetricName } from '../../schemas/common.js';
import { DEFAULT_WEIGHTS } from '../../schemas/criteria.js';
import { getBaseCommand } from '../base-command.js';
import { formatTable, type TableColumn } from '../formatters/index.js';

const COLUMNS: readonly TableColumn[] = [
  { header: 'METRIC', width: 24 },
  { header: 'LABEL', width: 28 },
  { header: 'DEFAULT WEIGHT', width: 16 },
  { header: 'SCALE', width: 20 },
];

/**
 * Default weight for a metric, or '-' when it is not weighted by default.
 */
function defaultWeight(metric: MetricName): string {
  const entry = Object.entries(DEFAULT_WEIGHTS).find(([name]) => name === metric);
  return entry ? entry[1].toFixed(2) : '-';
}

function scale(metric: MetricName): string {
  if (metric === 'internet_speed') {
    return 'Mbps, higher better';
  }
  return INVERTED_METRICS.has(metric) ? '0-100, lower better' : '0-100, higher better';
}

/**
 * Table rows describing every metric.
 */
export function metricRows(): string[][] {
  return METRIC_NAMES.map((metric) => [metric, getMetricLabel(metric), defaultWeight(metric), scale(metric)]);
}

/**
 * Register the metrics command.
 *
 * @param program - Root program
 */
export function registerMetricsCommand(program: Command): void {
  program
    .command('metrics')
    .description('List metric names for --weight and --min')
    .action((_options: Record<string, unknown>, cmd: Command) => {
      const base = getBaseCommand(cmd);
      base.section('Metrics');
      console.log(formatTable(COLUMNS, metricRows()));
    });
}

export default registerMetricsCommand;
