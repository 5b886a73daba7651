import { ConfigurationError, errorMessage } from './errors.ts';
import { postForm as defaultPostForm, type HttpResponse, type PostForm } from './http.ts';
import type { Env } from './envloader.ts';
import type { Logger } from './logger.ts';

export interface DomainBackend {
  readonly name: string;
  fetch(): Promise<string[]>;
}

export interface BackendContext {
  env: Env;
  logger: Logger;
  postForm?: PostForm;
}

export type BackendFactory = (context: BackendContext) => DomainBackend;

export const PASTEBIN_API_ENDPOINT = 'https://pastebin.com/api/api_raw.php';
const PASTEBIN_DATASET_KEY = 'check_ssl';
const USER_AGENT = 'check-certificates/1.0';

function requireEnv(env: Env, key: string): string {
  const value = env[key];
  if (!value) {
    throw new ConfigurationError(`${key} not set!`);
  }
  return value;
}

export function parseDomainList(body: string, key: string = PASTEBIN_DATASET_KEY): string[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (err) {
    throw new ConfigurationError(`Domain list is not valid JSON: ${errorMessage(err)}`);
  }

  if (typeof parsed !== 'object' || parsed === null || !(key in parsed)) {
    throw new ConfigurationError(`Domain list has no '${key}' key`);
  }

  const list: unknown = Reflect.get(parsed, key);
  if (!Array.isArray(list)) {
    throw new ConfigurationError(`Domain list '${key}' is not an array`);
  }

  return list.filter((item): item is string => typeof item === 'string');
}

/**
 * Reads a JSON paste of the form `{"check_ssl": ["example.com", ...]}`.
 * Credentials are checked when the backend is created, before any probing.
 */
export const createPastebinBackend: BackendFactory = ({ env, logger, postForm }) => {
  const userKey = requireEnv(env, 'PASTEBIN_USERKEY');
  const devKey = requireEnv(env, 'PASTEBIN_DEVKEY');
  const pasteId = requireEnv(env, 'PASTEBIN_PASTEID');
  const post = postForm || defaultPostForm;

  return {
    name: 'pastebin',
    async fetch(): Promise<string[]> {
      logger.info(`[backend] Fetching domain list from pastebin paste ${pasteId}`);

      let response: HttpResponse;
      try {
        response = await post(
          PASTEBIN_API_ENDPOINT,
          {
            api_option: 'show_paste',
            api_user_key: userKey,
            api_dev_key: devKey,
            api_paste_key: pasteId,
          },
          { timeout: 30 * 1000, userAgent: USER_AGENT }
        );
      } catch (err) {
        throw new ConfigurationError(`Can't reach pastebin: ${errorMessage(err)}`);
      }

      if (response.statusCode < 200 || response.statusCode >= 300) {
        throw new ConfigurationError(`Pastebin responded with status ${response.statusCode}`);
      }

      const domains = parseDomainList(response.body);
      logger.info(`[backend] Pastebin returned ${domains.length} domains`);
      return domains;
    },
  };
};

export const backends: ReadonlyMap<string, BackendFactory> = new Map([
  ['pastebin', createPastebinBackend],
]);

export function createBackend(name: string, context: BackendContext): DomainBackend {
  const factory = backends.get(name);
  if (!factory) {
    throw new ConfigurationError(
      `Unknown backend '${name}'. Available: ${Array.from(backends.keys()).join(', ')}`
    );
  }
  return factory(context);
}
