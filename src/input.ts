import { existsSync, readFileSync, statSync } from 'node:fs';
import { ConfigurationError } from './errors.ts';
import { createBackend, type BackendContext } from './backends.ts';
import type { CliOptions } from './cli.ts';

export type InputSource =
  | { kind: 'file'; path: string }
  | { kind: 'domain'; domain: string }
  | { kind: 'backend'; name: string };

export function parseHostList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '');
}

/**
 * Pick the host list source from the CLI flags.
 * A file wins over a domain, a domain over a backend; file plus domain is refused.
 */
export function selectInputSource(cli: Pick<CliOptions, 'inputFilename' | 'domain' | 'backendName'>): InputSource {
  if (!cli.inputFilename && !cli.domain && !cli.backendName) {
    throw new ConfigurationError('Specify one of these: input file, domain, domain backend');
  }
  if (cli.inputFilename && cli.domain) {
    throw new ConfigurationError('Only one parameter is allowed: input file or domain');
  }

  if (cli.inputFilename) return { kind: 'file', path: cli.inputFilename };
  if (cli.domain) return { kind: 'domain', domain: cli.domain };
  return { kind: 'backend', name: cli.backendName ?? '' };
}

/**
 * Validate the source before any network work: the file must exist,
 * the backend must be known and have its credentials.
 * Returns a loader that produces the host list.
 */
export function prepareInput(source: InputSource, context: BackendContext): () => Promise<string[]> {
  switch (source.kind) {
    case 'file': {
      if (!existsSync(source.path) || !statSync(source.path).isFile()) {
        throw new ConfigurationError(`Can't open input file: '${source.path}'`);
      }
      return async () => parseHostList(readFileSync(source.path, 'utf-8'));
    }
    case 'domain':
      return async () => parseHostList(source.domain);
    case 'backend': {
      const backend = createBackend(source.name, context);
      return () => backend.fetch();
    }
  }
}
