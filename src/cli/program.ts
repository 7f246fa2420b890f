import pg from 'pg';
import { loadConfig, requireDatabaseUrl, type Config } from '../config.js';
import { RegionQueryError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { runQuery } from '../run-query.js';
import { readDataDirectory } from '../store/loader.js';
import { PostgresPointStore } from '../store/point-store.js';
import type { Point, PointStore } from '../types.js';
import { parseArgs, UsageError, USAGE, type CliOptions } from './args.js';

export const VERSION = '0.1.0';

/** Store surface the CLI drives; PostgresPointStore in production. */
export interface ManagedPointStore extends PointStore {
  initializeSchema(): Promise<void>;
  load(points: readonly Point[]): Promise<number>;
  close(): Promise<void>;
}

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  createStore?: (config: Config) => ManagedPointStore;
  /** Help and version text; stdout by default. */
  print?: (text: string) => void;
  /** Usage errors; stderr by default. */
  printError?: (text: string) => void;
}

function createPostgresStore(config: Config): ManagedPointStore {
  const pool = new pg.Pool({
    connectionString: requireDatabaseUrl(config),
    max: config.PG_POOL_MAX,
  });
  return new PostgresPointStore({ pool, statementTimeoutMs: config.PG_STATEMENT_TIMEOUT_MS });
}

async function runCommand(
  options: CliOptions,
  config: Config,
  store: ManagedPointStore,
  logger: Logger,
): Promise<void> {
  switch (options.command) {
    case 'query':
      if (options.queryPath === undefined) throw new UsageError('query needs --query <file>');
      await runQuery({
        queryPath: options.queryPath,
        outputPath: options.outputPath,
        store,
        logger,
        parallel: options.parallel || config.REGION_QUERY_PARALLEL,
      });
      return;

    case 'load': {
      if (options.dataDirectory === undefined) throw new UsageError('load needs --data-directory <dir>');
      const points = await readDataDirectory(options.dataDirectory);
      logger.info({ dir: options.dataDirectory, points: points.length }, 'data directory read');
      await store.initializeSchema();
      const inserted = await store.load(points);
      logger.info({ inserted, skipped: points.length - inserted }, 'points loaded');
      return;
    }

    case 'init-schema':
      await store.initializeSchema();
      logger.info('schema initialized');
      return;

    case undefined:
      throw new UsageError('missing command');
  }
}

function reportFailure(logger: Logger, err: unknown): void {
  if (err instanceof RegionQueryError) {
    logger.error({ stage: err.stage, err }, `${err.stage} failed: ${err.message}`);
    return;
  }
  logger.fatal({ err }, 'unexpected failure');
}

/**
 * Runs the command line and resolves to the process exit code:
 * 0 on success, 1 on any failure. The store is closed on every path.
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const print = deps.print ?? ((text: string) => process.stdout.write(`${text}\n`));
  const printError = deps.printError ?? ((text: string) => process.stderr.write(`${text}\n`));

  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    printError(`error: ${err.message}\n\n${USAGE}`);
    return 1;
  }

  if (options.help) {
    print(USAGE);
    return 0;
  }
  if (options.version) {
    print(VERSION);
    return 0;
  }

  const logger = deps.logger ?? createLogger();
  let store: ManagedPointStore | undefined;
  try {
    const config = loadConfig(deps.env ?? process.env);
    logger.level = options.debug ? 'debug' : config.LOG_LEVEL;

    store = (deps.createStore ?? createPostgresStore)(config);
    await runCommand(options, config, store, logger);
    return 0;
  } catch (err) {
    reportFailure(logger, err);
    return 1;
  } finally {
    await store?.close().catch((err: unknown) => logger.warn({ err }, 'failed to close point store'));
  }
}
