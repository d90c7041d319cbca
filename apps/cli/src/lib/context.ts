import { createLogger, type EnvSource, type Logger } from '@s3t/shared';
import { S3TablesCatalogClient, type TableCatalog } from '@s3t/tables-client';
import { resolveCliConfig, type CliConfig, type GlobalOptions } from './config';
import { TerminalPicker, type SelectionPort } from './picker';

export type CliDependencies = {
  env?: EnvSource;
  catalogFactory?: (config: CliConfig) => TableCatalog;
  loggerFactory?: (config: CliConfig) => Logger;
  picker?: SelectionPort;
};

export type CommandContext = {
  config: CliConfig;
  logger: Logger;
  catalog: TableCatalog;
  picker: SelectionPort;
  close(): void;
};

function createCatalog(config: CliConfig): TableCatalog {
  return new S3TablesCatalogClient({
    region: config.region,
    profile: config.profile,
    endpoint: config.endpoint
  });
}

export function createCommandContext(options: GlobalOptions, deps: CliDependencies = {}): CommandContext {
  const config = resolveCliConfig(options, deps.env);
  const logger = (deps.loggerFactory ?? ((resolved: CliConfig) => createLogger(resolved.logLevel)))(config);
  const catalog = (deps.catalogFactory ?? createCatalog)(config);
  logger.debug({ profile: config.profile ?? null, region: config.region ?? null }, 'Resolved CLI configuration');
  return {
    config,
    logger,
    catalog,
    picker: deps.picker ?? new TerminalPicker(),
    close: () => catalog.destroy?.()
  };
}

/**
 * Runs `task` with a signal that is aborted on SIGINT, and passes it through to
 * every catalog call the task makes.
 */
export async function withInterruptSignal<T>(task: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const abortController = new AbortController();
  const stop = () => {
    abortController.abort();
    process.off('SIGINT', stop);
  };
  process.on('SIGINT', stop);

  try {
    return await task(abortController.signal);
  } finally {
    process.off('SIGINT', stop);
  }
}

/**
 * Runs a command body under `withInterruptSignal`. A failure is logged with the
 * command's logger and rethrown for the entry point to report. The context is
 * closed either way.
 */
export async function runCommand<T>(context: CommandContext, task: (signal: AbortSignal) => Promise<T>): Promise<T> {
  try {
    return await withInterruptSignal(task);
  } catch (err) {
    context.logger.error({ err }, 'Command failed');
    throw err;
  } finally {
    context.close();
  }
}
