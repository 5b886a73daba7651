import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';

export type Env = Record<string, string | undefined>;

/**
 * Load KEY=VALUE pairs from a shell-style config file into `env`.
 * Lines may start with `export `; variables already set are left alone.
 * @returns the absolute path that was read, or null when there was no file
 */
export function loadEnv(envPath: string = '.config', env: Env = process.env): string | null {
  const fullPath = resolve(process.cwd(), envPath);

  if (!existsSync(fullPath)) {
    return null;
  }

  const content = readFileSync(fullPath, 'utf-8');
  const lines = content.split('\n');

  for (const line of lines) {
    // Skip empty lines and comments
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const match = trimmed.replace(/^export\s+/, '').match(/^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/);
    if (!match) {
      continue;
    }

    const key = match[1];
    const value = match[2].trim();

    if (env[key] === undefined) {
      // Remove surrounding quotes if present
      env[key] = value.replace(/^["']|["']$/g, '');
    }
  }

  return fullPath;
}
