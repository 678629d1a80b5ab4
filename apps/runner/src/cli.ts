import { isFatalTrackingError } from '@jobwatch/tracking';
import type { Logger } from 'pino';
import { ConfigError, loadRunnerConfig, type RunnerConfig } from './config.js';
import { runOnce, type RunDependencies } from './run.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

export interface MainOptions extends Omit<RunDependencies, 'logger'> {
  logger: Logger;
  env?: Record<string, string | undefined>;
}

/**
 * One run from environment to exit code. Configuration and run failures are logged here or by
 * the run logger; anything else propagates.
 */
export async function main(options: MainOptions): Promise<number> {
  const { logger, env = process.env, ...deps } = options;
  const now = deps.now ?? (() => new Date());

  let config: RunnerConfig;
  try {
    config = loadRunnerConfig(env, now());
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.fatal({ event: 'config_invalid', variable: error.variable }, error.message);
      return EXIT_FAILURE;
    }
    throw error;
  }

  try {
    await runOnce(config, { ...deps, logger, now });
    return EXIT_OK;
  } catch (error) {
    // run_failed already carries the serialized error
    if (isFatalTrackingError(error)) {
      logger.error(
        { event: 'run_aborted', reason: error.name, historyFile: config.historyFile },
        'Run aborted; history file left as it was',
      );
    }
    return EXIT_FAILURE;
  }
}
