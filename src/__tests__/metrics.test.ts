import { describe, it, expect, afterEach } from 'vitest';
import { chmodSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { prepareMetricsFile, renderMetrics, writeMetricsFile } from '../metrics.ts';
import { ConfigurationError } from '../errors.ts';
import { createSilentLogger } from '../logger.ts';
import type { CheckResult } from '../types.ts';

const DAY = 24 * 60 * 60 * 1000;
const now = new Date('2026-01-01T00:00:00Z');
const logger = createSilentLogger();

const results: CheckResult[] = [
  {
    hostname: 'a.example.com',
    notBefore: new Date(now.getTime() - 10 * DAY),
    notAfter: new Date(now.getTime() + 30 * DAY),
    status: 'ok',
  },
  { hostname: 'down.example.com', notBefore: now, notAfter: now, status: 'error' },
  {
    hostname: 'old.example.com',
    notBefore: new Date(now.getTime() - 400 * DAY),
    notAfter: new Date(now.getTime() - 2.5 * DAY),
    status: 'ok',
  },
];

const expected = [
  '# HELP check_certificates_expiration Days until HTTPs SSL certificate expires',
  '# TYPE check_certificates_expiration gauge',
  'check_certificates_expiration{domain="a.example.com",outcome="ok"} 30',
  'check_certificates_expiration{domain="down.example.com",outcome="error"} 0',
  'check_certificates_expiration{domain="old.example.com",outcome="ok"} -3',
  '',
].join('\n');

describe('renderMetrics', () => {
  it('should emit the header and one line per result in the given order', () => {
    expect(renderMetrics(results, now)).toBe(expected);
  });

  it('should emit only the header for no results', () => {
    expect(renderMetrics([], now)).toBe(
      '# HELP check_certificates_expiration Days until HTTPs SSL certificate expires\n' +
        '# TYPE check_certificates_expiration gauge\n'
    );
  });

  it('should escape quotes and backslashes in label values', () => {
    const odd: CheckResult = { hostname: 'we"ird\\host', notBefore: now, notAfter: now, status: 'error' };
    expect(renderMetrics([odd], now).split('\n')[2]).toBe(
      'check_certificates_expiration{domain="we\\"ird\\\\host",outcome="error"} 0'
    );
  });
});

describe('metrics file', () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  it('should create an empty file when preparing', () => {
    dir = mkdtempSync(join(tmpdir(), 'metrics-'));
    const path = join(dir, 'certs.prom');

    prepareMetricsFile(path, logger);

    expect(readFileSync(path, 'utf-8')).toBe('');
  });

  it('should fail fast when the file cannot be created', () => {
    dir = mkdtempSync(join(tmpdir(), 'metrics-'));
    const path = join(dir, 'missing', 'certs.prom');

    expect(() => prepareMetricsFile(path, logger)).toThrow(ConfigurationError);
  });

  it('should overwrite previous content', () => {
    dir = mkdtempSync(join(tmpdir(), 'metrics-'));
    const path = join(dir, 'certs.prom');
    writeFileSync(path, 'stale line\nanother stale line\n');

    writeMetricsFile(path, results, now, logger);

    expect(readFileSync(path, 'utf-8')).toBe(expected);
    expect(readdirSync(dir)).toEqual(['certs.prom']);
  });

  it('should report a failed export as a configuration error', () => {
    dir = mkdtempSync(join(tmpdir(), 'metrics-'));
    const path = join(dir, 'gone', 'certs.prom');

    expect(() => writeMetricsFile(path, results, now, logger)).toThrow(
      `Can't write Prometheus metrics file '${path}'`
    );
    expect(() => writeMetricsFile(path, results, now, logger)).toThrow(ConfigurationError);
  });

  // Root ignores directory permissions
  it.skipIf(process.getuid?.() === 0)('should export into a writable file inside a read-only directory', () => {
    dir = mkdtempSync(join(tmpdir(), 'metrics-'));
    const path = join(dir, 'certs.prom');
    writeFileSync(path, 'old\n');
    chmodSync(path, 0o666);
    chmodSync(dir, 0o555);

    try {
      prepareMetricsFile(path, logger);
      writeMetricsFile(path, results, now, logger);
      expect(readFileSync(path, 'utf-8')).toBe(expected);
      expect(readdirSync(dir)).toEqual(['certs.prom']);
    } finally {
      chmodSync(dir, 0o755);
    }
  });
});
