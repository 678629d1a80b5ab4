import { main } from './cli.js';
import { loadEnvFiles } from './config.js';
import { createRunnerLogger } from './observability/logger.js';
import { serializeError } from './observability/with-run-logger.js';

loadEnvFiles(process.cwd());
const logger = createRunnerLogger();

main({ logger }).then(
  (code) => {
    process.exit(code);
  },
  (error: unknown) => {
    logger.fatal(
      {
        event: 'runner_fatal_error',
        error: serializeError(error),
      },
      'Runner fatal error',
    );
    process.exit(1);
  },
);
