import type { Logger } from 'pino';
import { createRunnerLogger } from '../src/observability/logger.js';

export interface CapturedLogger {
  logger: Logger;
  records: () => Array<Record<string, unknown>>;
}

export function createCapturedLogger(env: NodeJS.ProcessEnv = {}): CapturedLogger {
  const lines: string[] = [];
  const logger = createRunnerLogger(env, {
    write: (line: string) => {
      lines.push(line);
    },
  });

  return {
    logger,
    records: () => lines.map((line): Record<string, unknown> => JSON.parse(line)),
  };
}
