import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';

interface SerializedError {
  name?: string;
  message: string;
  stack?: string;
  cause?: SerializedError;
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
      ...(error.cause !== undefined ? { cause: serializeError(error.cause) } : {}),
    };
  }

  return {
    message: String(error),
  };
}

export interface WithRunLoggerOptions<TResult> {
  logger: Logger;
  runId?: string;
  context?: Record<string, unknown>;
  summary?: (result: TResult) => Record<string, unknown>;
  run: () => Promise<TResult>;
}

/**
 * Logs `run_started`, then `run_completed` or `run_failed`. Failures are rethrown.
 */
export async function withRunLogger<TResult>({
  logger,
  runId = randomUUID(),
  context,
  summary,
  run,
}: WithRunLoggerOptions<TResult>): Promise<TResult> {
  const startedAt = Date.now();
  const common = {
    runId,
    ...context,
  };

  logger.info(
    {
      event: 'run_started',
      ...common,
    },
    'Run started',
  );

  try {
    const result = await run();
    logger.info(
      {
        event: 'run_completed',
        ...common,
        durationMs: Date.now() - startedAt,
        ...(summary ? summary(result) : {}),
      },
      'Run completed',
    );
    return result;
  } catch (error) {
    logger.error(
      {
        event: 'run_failed',
        ...common,
        durationMs: Date.now() - startedAt,
        error: serializeError(error),
      },
      'Run failed',
    );
    throw error;
  }
}
