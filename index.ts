#!/usr/bin/env tsx
import { loadEnv } from './src/envloader.ts';
import { DEFAULT_CONFIG_FILE } from './src/config.ts';
import { runApp } from './src/app.ts';
import { errorMessage } from './src/errors.ts';

async function main(): Promise<void> {
  // Settings from .config, must be loaded before anything reads process.env
  loadEnv(process.env.CHECK_CERTIFICATES_CONFIG || DEFAULT_CONFIG_FILE);

  // Stop starting new probes on Ctrl-C; in-flight ones finish and get reported
  const controller = new AbortController();
  const stop = (): void => controller.abort();
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  const exitCode = await runApp(process.argv.slice(2), {
    env: process.env,
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    signal: controller.signal,
  });

  process.exitCode = exitCode;
}

main().catch((err) => {
  process.stderr.write(`ERROR: ${errorMessage(err)}\n`);
  process.exitCode = 1;
});
