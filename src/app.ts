import { parseCli, usage, VERSION, type CliOptions } from './cli.ts';
import { resolveSettings, type Settings } from './config.ts';
import { ConfigurationError } from './errors.ts';
import { runChecks, type Prober } from './checker.ts';
import { formatResults } from './format.ts';
import { prepareInput, selectInputSource } from './input.ts';
import { createLogger, type Logger, type LoggerOptions } from './logger.ts';
import { prepareMetricsFile, writeMetricsFile } from './metrics.ts';
import { renderNames, renderTable } from './report.ts';
import type { PostForm } from './http.ts';
import type { Env } from './envloader.ts';

export interface AppDependencies {
  env: Env;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  now?: () => Date;
  signal?: AbortSignal;
  createLogger?: (options: LoggerOptions) => Logger;
  probe?: Prober;
  postForm?: PostForm;
}

async function run(cli: CliOptions, settings: Settings, logger: Logger, deps: AppDependencies): Promise<number> {
  const now = deps.now ? deps.now() : new Date();

  if (cli.generateMetrics) {
    if (!settings.metricsPath) {
      throw new ConfigurationError('PROMETHEUS_EXPORT_FILENAME is not set');
    }
    prepareMetricsFile(settings.metricsPath, logger);
  } else {
    logger.info('[app] Prometheus metrics generation not requested');
  }

  const source = selectInputSource(cli);
  const loadHosts = prepareInput(source, { env: settings.env, logger, postForm: deps.postForm });
  const hosts = await loadHosts();

  const results = await runChecks(hosts, {
    logger,
    now,
    retries: cli.retries,
    retryDelayMs: settings.checks.retryDelayMs,
    concurrency: cli.concurrency,
    timeoutMs: settings.checks.timeoutMs,
    signal: deps.signal,
    probe: deps.probe,
  });

  const rows = formatResults(results, now, {
    alertLimitDays: cli.alertLimitDays,
    onlyAlerting: cli.onlyAlerting,
  });

  deps.stdout(cli.onlyNames ? renderNames(rows) : renderTable(rows));

  // The report is already out when this fails; the error still exits 1
  if (cli.generateMetrics && settings.metricsPath) {
    writeMetricsFile(settings.metricsPath, results, now, logger);
  }

  // Sensor mode alarms whenever anything was printed
  if (cli.sensorMode && rows.length > 0) {
    return 1;
  }
  return 0;
}

/**
 * Run the checker for the given command-line arguments.
 * @returns the process exit code
 */
export async function runApp(argv: readonly string[], deps: AppDependencies): Promise<number> {
  let cli: CliOptions;
  let settings: Settings;
  try {
    cli = parseCli(argv);
    settings = resolveSettings(deps.env);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      deps.stderr(`ERROR: ${err.message}\n`);
      return 1;
    }
    throw err;
  }

  if (cli.help) {
    deps.stdout(usage());
    return 0;
  }
  if (cli.version) {
    deps.stdout(`${VERSION}\n`);
    return 0;
  }

  const logger = (deps.createLogger || createLogger)({
    verbose: cli.verbose,
    level: settings.logging.level,
    logFile: settings.logging.file,
  });

  try {
    return await run(cli, settings, logger, deps);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      logger.debug({ err }, '[app] Configuration error');
      deps.stderr(`ERROR: ${err.message}\n`);
      return 1;
    }
    throw err;
  } finally {
    logger.flush();
  }
}
