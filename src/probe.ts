import tls from 'node:tls';
import { isIP } from 'node:net';
import type { X509Certificate } from 'node:crypto';
import { errorMessage } from './errors.ts';
import type { ProbeOutcome } from './types.ts';
import type { Logger } from './logger.ts';

export const DEFAULT_PORT = 443;
export const DEFAULT_TIMEOUT_MS = 10 * 1000;

export interface ProbeOptions {
  port?: number;
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Connect to `hostname` with SNI and read the leaf certificate's validity window.
 * Resolves to a failure outcome instead of rejecting, whatever goes wrong.
 */
export function probeCertificate(hostname: string, options: ProbeOptions = {}): Promise<ProbeOutcome> {
  const port = options.port ?? DEFAULT_PORT;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const logger = options.logger;

  return new Promise((resolve) => {
    let settled = false;

    const finish = (outcome: ProbeOutcome): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutHandle);
      socket.destroy();
      if (outcome.kind === 'failure') {
        logger?.warn(`[probe] ${hostname}:${port} failed: ${outcome.reason}`);
      }
      resolve(outcome);
    };

    logger?.debug(`[probe] Connecting to ${hostname}:${port}`);

    // Expired and self-signed certificates still have dates worth reporting
    const socket = tls.connect({
      host: hostname,
      port,
      // SNI must not be an IP address
      servername: isIP(hostname) ? undefined : hostname,
      rejectUnauthorized: false,
    });

    const timeoutHandle = setTimeout(() => {
      finish({ kind: 'failure', reason: `Timeout after ${timeoutMs}ms` });
    }, timeoutMs);

    socket.once('secureConnect', () => {
      finish(readValidity(socket));
    });

    socket.on('error', (err) => {
      finish({ kind: 'failure', reason: err.message || err.name });
    });

    socket.once('close', () => {
      finish({ kind: 'failure', reason: 'Connection closed before handshake completed' });
    });
  });
}

function readValidity(socket: tls.TLSSocket): ProbeOutcome {
  let cert: X509Certificate | undefined;
  try {
    cert = socket.getPeerX509Certificate();
  } catch (err) {
    return { kind: 'failure', reason: `Unreadable certificate: ${errorMessage(err)}` };
  }

  if (!cert) {
    return { kind: 'failure', reason: 'No certificate presented' };
  }

  const notBefore = new Date(cert.validFrom);
  const notAfter = new Date(cert.validTo);

  if (Number.isNaN(notBefore.getTime()) || Number.isNaN(notAfter.getTime())) {
    return { kind: 'failure', reason: `Unreadable validity window: ${cert.validFrom} - ${cert.validTo}` };
  }

  return { kind: 'success', notBefore, notAfter };
}
