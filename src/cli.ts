import { parseArgs } from 'node:util';
import { ConfigurationError, errorMessage } from './errors.ts';
import { DEFAULT_ALERT_LIMIT_DAYS } from './format.ts';

export const VERSION = '1.0.0';

export interface CliOptions {
  backendName?: string;
  inputFilename?: string;
  domain?: string;
  sensorMode: boolean;
  onlyAlerting: boolean;
  onlyNames: boolean;
  alertLimitDays: number;
  generateMetrics: boolean;
  retries: number;
  concurrency: number;
  verbose: boolean;
  help: boolean;
  version: boolean;
}

const OPTIONS = {
  'backend-name': { type: 'string', short: 'b' },
  'input-filename': { type: 'string', short: 'i' },
  domain: { type: 'string', short: 'd' },
  'sensor-mode': { type: 'boolean', short: 's' },
  'only-alerting': { type: 'boolean', short: 'l' },
  'only-names': { type: 'boolean', short: 'n' },
  'alert-limit': { type: 'string', short: 'A' },
  'generate-metrics': { type: 'boolean', short: 'G' },
  retries: { type: 'string', short: 'R' },
  concurrency: { type: 'string', short: 'c' },
  verbose: { type: 'boolean', short: 'v' },
  help: { type: 'boolean', short: 'h' },
  version: { type: 'boolean', short: 'V' },
} as const;

export function usage(program: string = 'check-certificates'): string {
  return `SSL Certificate checker
Version: ${VERSION}

Usage: ${program} [-h] [-v] [-s] [-l] [-n] [-A n] [-G] [-R n] [-c n] -i input_filename -d domain_name -b backend_name

   -b, --backend-name       Domain list backend name (pastebin)
   -i, --input-filename     Path to the list of domains to check
   -d, --domain             Domain name to check
   -s, --sensor-mode        Exit with non-zero if there was something to print out
   -l, --only-alerting      Show only alerting domains (expiring soon and erroneous)
   -n, --only-names         Show only domain names instead of the full table
   -A, --alert-limit        Set threshold of upcoming expiration alert to n days
   -G, --generate-metrics   Generates a Prometheus metrics file to be served by nginx
   -R, --retries            Attempts per domain before labeling it as failed (default 1)
   -c, --concurrency        Domains checked at the same time (default 1)
   -v, --verbose            Enable debug output
   -V, --version            Show version
   -h, --help               Show help
`;
}

function parseInteger(flag: string, raw: string | undefined, fallback: number, min?: number): number {
  if (raw === undefined) return fallback;
  if (!/^-?\d+$/.test(raw.trim())) {
    throw new ConfigurationError(`${flag} expects an integer, got '${raw}'`);
  }
  const value = parseInt(raw, 10);
  if (min !== undefined && value < min) {
    throw new ConfigurationError(`${flag} must be at least ${min}, got ${value}`);
  }
  return value;
}

function shortFlag(name: string): string {
  for (const [long, config] of Object.entries(OPTIONS)) {
    if (long === name) return `-${config.short}`;
  }
  return `--${name}`;
}

// parseArgs takes `-A -1` for two flags; glue a negative limit to its flag
function joinNegativeLimit(argv: readonly string[]): string[] {
  const args: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    if ((arg === '-A' || arg === '--alert-limit') && next !== undefined && /^-\d+$/.test(next)) {
      args.push(`--alert-limit=${next}`);
      i++;
    } else {
      args.push(arg);
    }
  }
  return args;
}

function tokenize(argv: readonly string[]) {
  try {
    return parseArgs({
      args: joinNegativeLimit(argv),
      options: OPTIONS,
      strict: true,
      allowPositionals: false,
      tokens: true,
    });
  } catch (err) {
    throw new ConfigurationError(errorMessage(err));
  }
}

export function parseCli(argv: readonly string[]): CliOptions {
  const parsed = tokenize(argv);

  const seen = new Set<string>();
  for (const token of parsed.tokens) {
    if (token.kind !== 'option') continue;
    if (seen.has(token.name)) {
      throw new ConfigurationError(`Argument already set: ${shortFlag(token.name)}`);
    }
    seen.add(token.name);
  }

  const values = parsed.values;

  return {
    backendName: values['backend-name'],
    inputFilename: values['input-filename'],
    domain: values.domain,
    sensorMode: values['sensor-mode'] === true,
    onlyAlerting: values['only-alerting'] === true,
    onlyNames: values['only-names'] === true,
    alertLimitDays: parseInteger('-A', values['alert-limit'], DEFAULT_ALERT_LIMIT_DAYS),
    generateMetrics: values['generate-metrics'] === true,
    retries: parseInteger('-R', values.retries, 1, 1),
    concurrency: parseInteger('-c', values.concurrency, 1, 1),
    verbose: values.verbose === true,
    help: values.help === true,
    version: values.version === true,
  };
}
