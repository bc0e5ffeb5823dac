/**
 * misis-id command line
 *
 * Usage:
 *   misis-id --login <login> --password <password> [--format text|json] [--verbose]
 *
 * Environment:
 *   - MISIS_LOGIN / MISIS_PASSWORD: used when the flags are missing
 *   - MISIS_BASE_URL, MISIS_TIMEOUT_MS, MISIS_MAX_RETRIES, MISIS_BACKOFF_MS
 *   - LOG_LEVEL: log level when --verbose is not given (default: info)
 */

import { parseArgs } from 'node:util';
import { loadConfig, type AppConfig, type Env } from '../shared/config.js';
import { isPortalError } from '../shared/errors.js';
import { getErrorMessage } from '../shared/utils/helpers.js';
import { createLogger, type Logger, type LogSink } from '../shared/utils/logger.js';
import type { FetchLike } from '../shared/utils/http-client.js';
import { withMisisClient } from '../portal/client.js';
import { formatStudentInfo, isOutputFormat, OUTPUT_FORMATS, type OutputFormat } from '../portal/format.js';

export const USAGE = `Usage: misis-id --login <login> --password <password> [--format text|json] [--verbose]

Examples:
  misis-id --login your_login --password your_password
  misis-id --login your_login --password your_password --format json
  misis-id --login your_login --password your_password --verbose`;

export interface CliOptions {
  login: string;
  password: string;
  format: OutputFormat;
  verbose: boolean;
}

export interface CliDeps {
  env?: Env;
  /** Command output (default: process.stdout) */
  write?: (text: string) => void;
  /** Log lines (default: stderr) */
  logSink?: LogSink;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      login: { type: 'string' },
      password: { type: 'string' },
      format: { type: 'string', default: 'text' },
      verbose: { type: 'boolean', default: false }
    },
    strict: true,
    allowPositionals: false
  }).values;
}

export function parseCliArgs(argv: string[], env: Env = {}): CliOptions {
  let values: ReturnType<typeof readArgs>;
  try {
    values = readArgs(argv);
  } catch (error: unknown) {
    throw new UsageError(getErrorMessage(error));
  }

  const login = values.login ?? env.MISIS_LOGIN;
  const password = values.password ?? env.MISIS_PASSWORD;

  if (!login) throw new UsageError('the following argument is required: --login');
  if (!password) throw new UsageError('the following argument is required: --password');

  const format = values.format ?? 'text';
  if (!isOutputFormat(format)) {
    throw new UsageError(`--format must be one of: ${OUTPUT_FORMATS.join(', ')} (got '${format}')`);
  }

  return { login, password, format, verbose: values.verbose ?? false };
}

/**
 * Run the command and return the process exit code.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const write = deps.write ?? ((text: string) => process.stdout.write(text));

  let options: CliOptions;
  try {
    options = parseCliArgs(argv, env);
  } catch (error: unknown) {
    createLogger('cli', { level: 'error', sink: deps.logSink }).error(getErrorMessage(error));
    write(`${USAGE}\n`);
    return 1;
  }

  let config: AppConfig;
  try {
    config = loadConfig(env);
  } catch (error: unknown) {
    reportError(createLogger('cli', { level: 'error', sink: deps.logSink }), error);
    return 1;
  }

  const logger = createLogger('cli', {
    level: options.verbose ? 'debug' : config.logLevel ?? 'info',
    sink: deps.logSink
  });

  try {
    const info = await withMisisClient(
      {
        baseUrl: config.baseUrl,
        timeout: config.timeout,
        maxRetries: config.maxRetries,
        backoffBaseMs: config.backoffBaseMs,
        logger: logger.child('MisisClient'),
        fetch: deps.fetch,
        sleep: deps.sleep
      },
      async client => {
        logger.info('Authenticating...');
        await client.authenticate(options.login, options.password);

        logger.info('Fetching student info...');
        return client.getStudentInfo();
      }
    );

    write(`${formatStudentInfo(info, options.format)}\n`);
    return 0;

  } catch (error: unknown) {
    reportError(logger, error);
    return 1;
  }
}

function reportError(logger: Logger, error: unknown): void {
  if (isPortalError(error)) {
    logger.error(`MISIS error (${error.kind}): ${error.message}`, error);
  } else {
    logger.error(`Unexpected error: ${getErrorMessage(error)}`, error);
  }
}
