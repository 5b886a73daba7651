import { probeCertificate, type ProbeOptions } from './probe.ts';
import type { CheckResult, ProbeOutcome } from './types.ts';
import type { Logger } from './logger.ts';

export type { CheckResult, ProbeOutcome };

export type Prober = (hostname: string, options: ProbeOptions) => Promise<ProbeOutcome>;

export const MAX_CONCURRENCY = 50;

export interface CheckOptions {
  logger: Logger;
  now: Date;
  retries?: number;
  retryDelayMs?: number;
  concurrency?: number;
  timeoutMs?: number;
  port?: number;
  signal?: AbortSignal;
  probe?: Prober;
}

export function classify(outcome: ProbeOutcome, hostname: string, now: Date): CheckResult {
  if (outcome.kind === 'success') {
    return {
      hostname,
      notBefore: outcome.notBefore,
      notAfter: outcome.notAfter,
      status: 'ok',
    };
  }

  return {
    hostname,
    notBefore: now,
    notAfter: now,
    status: 'error',
  };
}

async function probeWithRetry(hostname: string, options: CheckOptions): Promise<ProbeOutcome> {
  const probe = options.probe || probeCertificate;
  const retryCount = Math.max(1, options.retries || 1);
  const retryDelay = options.retryDelayMs ?? 1000;
  const probeOptions: ProbeOptions = {
    port: options.port,
    timeoutMs: options.timeoutMs,
    logger: options.logger,
  };

  let outcome: ProbeOutcome = { kind: 'failure', reason: 'Not attempted' };
  let attempts = 0;

  while (attempts < retryCount) {
    outcome = await probe(hostname, probeOptions);

    if (outcome.kind === 'success') {
      return outcome;
    }

    attempts++;
    if (attempts < retryCount && !options.signal?.aborted) {
      options.logger.info(`[checker] Retry #${attempts + 1} of ${retryCount} for ${hostname}`);
      await sleep(retryDelay);
    } else {
      break;
    }
  }

  return outcome;
}

export async function checkHost(hostname: string, options: CheckOptions): Promise<CheckResult> {
  options.logger.info(`[checker] Processing '${hostname}'`);
  const outcome = await probeWithRetry(hostname, options);
  const result = classify(outcome, hostname, options.now);

  if (result.status === 'error') {
    options.logger.warn(`[checker] Labeling '${hostname}' as failed to get validated`);
  } else {
    options.logger.info(
      `[checker] ${hostname} not before ${result.notBefore.toISOString()}, not after ${result.notAfter.toISOString()}`
    );
  }

  return result;
}

/**
 * Check every non-blank hostname, at most `concurrency` at a time.
 * Results come back in input order. Once `signal` aborts, no new
 * probes start and only the hosts already checked are returned.
 */
export async function runChecks(hosts: readonly string[], options: CheckOptions): Promise<CheckResult[]> {
  const hostnames = hosts.map((h) => h.trim()).filter((h) => h !== '');
  const concurrency = Math.min(MAX_CONCURRENCY, Math.max(1, options.concurrency || 1));
  const slots: (CheckResult | undefined)[] = new Array(hostnames.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < hostnames.length && !options.signal?.aborted) {
      const index = next++;
      slots[index] = await checkHost(hostnames[index], options);
    }
  };

  const workers: Promise<void>[] = [];
  for (let i = 0; i < Math.min(concurrency, hostnames.length); i++) {
    workers.push(worker());
  }
  await Promise.all(workers);

  const results = slots.filter((r): r is CheckResult => r !== undefined);

  if (options.signal?.aborted) {
    options.logger.warn(`[checker] Interrupted after ${results.length} of ${hostnames.length} hosts`);
  }

  if (results.length === 0) {
    options.logger.warn("[checker] Couldn't process anything");
  } else {
    options.logger.info(`[checker] Processed ${results.length} items`);
  }

  return results;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
