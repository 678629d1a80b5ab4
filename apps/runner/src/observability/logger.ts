import pino, { type DestinationStream, type LevelWithSilent, type Logger } from 'pino';

const DEFAULT_LOG_LEVEL: LevelWithSilent = 'info';
const DEFAULT_SERVICE_NAME = 'jobwatch-runner';
const VALID_LOG_LEVELS: readonly LevelWithSilent[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLogLevel(value: string): value is LevelWithSilent {
  return VALID_LOG_LEVELS.some((level) => level === value);
}

function readLogLevel(env: NodeJS.ProcessEnv): LevelWithSilent {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  if (!raw || !isLogLevel(raw)) {
    return DEFAULT_LOG_LEVEL;
  }

  return raw;
}

export function createRunnerLogger(env: NodeJS.ProcessEnv = process.env, destination?: DestinationStream): Logger {
  const service = env.LOG_SERVICE_NAME?.trim() || DEFAULT_SERVICE_NAME;
  const options = {
    level: readLogLevel(env),
    base: { service },
    timestamp: () => `,"ts":"${new Date().toISOString()}"`,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    messageKey: 'message',
  };

  return destination ? pino(options, destination) : pino(options);
}
