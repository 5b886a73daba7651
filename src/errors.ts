/**
 * Raised for anything that prevents a run from starting: bad flag
 * combinations, missing credentials, an unwritable metrics path.
 * The CLI prints the message and exits 1 before any host is probed.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
