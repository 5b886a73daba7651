import type { CheckResult, FormattedRow } from './types.ts';

export const DEFAULT_ALERT_LIMIT_DAYS = 7;

const DAY_MS = 24 * 60 * 60 * 1000;

export interface FormatOptions {
  alertLimitDays?: number;
  onlyAlerting?: boolean;
}

export function daysRemaining(notAfter: Date, now: Date): number {
  return Math.floor((notAfter.getTime() - now.getTime()) / DAY_MS);
}

// YYYY-MM-DD HH:MM:SS in UTC
export function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

export function formatRow(result: CheckResult, now: Date): FormattedRow {
  if (result.status === 'error') {
    return {
      hostname: result.hostname,
      notBeforeDisplay: 'error',
      notAfterDisplay: 'error',
      daysRemaining: 'error',
      status: 'error',
    };
  }

  return {
    hostname: result.hostname,
    notBeforeDisplay: formatTimestamp(result.notBefore),
    notAfterDisplay: formatTimestamp(result.notAfter),
    daysRemaining: daysRemaining(result.notAfter, now),
    status: 'ok',
  };
}

export function isAlerting(row: FormattedRow, alertLimitDays: number): boolean {
  return row.daysRemaining === 'error' || row.daysRemaining <= alertLimitDays;
}

// Errors rank ahead of every numeric value
function sortKey(row: FormattedRow): number {
  return row.daysRemaining === 'error' ? Number.NEGATIVE_INFINITY : row.daysRemaining;
}

/**
 * Turn check results into display rows, most urgent first.
 * Array.prototype.sort is stable, so equal keys keep their input order.
 */
export function formatResults(
  results: readonly CheckResult[],
  now: Date,
  options: FormatOptions = {}
): FormattedRow[] {
  const alertLimitDays = options.alertLimitDays ?? DEFAULT_ALERT_LIMIT_DAYS;

  let rows = results.map((result) => formatRow(result, now));

  if (options.onlyAlerting) {
    rows = rows.filter((row) => isAlerting(row, alertLimitDays));
  }

  return rows.sort((a, b) => {
    const ka = sortKey(a);
    const kb = sortKey(b);
    if (ka === kb) return 0;
    return ka < kb ? -1 : 1;
  });
}
