import { closeSync, openSync, writeFileSync } from 'node:fs';
import { ConfigurationError, errorMessage } from './errors.ts';
import { daysRemaining } from './format.ts';
import type { CheckResult } from './types.ts';
import type { Logger } from './logger.ts';

export const METRIC_NAME = 'check_certificates_expiration';

function escapeLabel(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

/**
 * Prometheus text exposition of every result, in the order given.
 * Error results were stamped with `now`, so they export as 0 days.
 */
export function renderMetrics(results: readonly CheckResult[], now: Date): string {
  const lines = [
    `# HELP ${METRIC_NAME} Days until HTTPs SSL certificate expires`,
    `# TYPE ${METRIC_NAME} gauge`,
  ];

  for (const result of results) {
    const labels = `domain="${escapeLabel(result.hostname)}",outcome="${result.status}"`;
    lines.push(`${METRIC_NAME}{${labels}} ${daysRemaining(result.notAfter, now)}`);
  }

  return lines.join('\n') + '\n';
}

/**
 * Make sure the metrics file can be written before any host is probed.
 * This opens the target itself, the same file the export later overwrites.
 * Existing content is left alone until the run writes its own.
 */
export function prepareMetricsFile(path: string, logger: Logger): void {
  try {
    closeSync(openSync(path, 'a'));
  } catch (err) {
    throw new ConfigurationError(`Can't create Prometheus metrics file '${path}': ${errorMessage(err)}`);
  }
  logger.info(`[metrics] Prometheus metrics file touched: '${path}'`);
}

// Overwrites the target in place, so only write access to the file is needed
export function writeMetricsFile(path: string, results: readonly CheckResult[], now: Date, logger: Logger): void {
  logger.info(`[metrics] Exporting Prometheus metrics into file '${path}'`);

  try {
    writeFileSync(path, renderMetrics(results, now));
  } catch (err) {
    throw new ConfigurationError(`Can't write Prometheus metrics file '${path}': ${errorMessage(err)}`);
  }

  logger.info(`[metrics] Finished Prometheus metrics export (${results.length} items)`);
}
