import type { TrackingLogger } from '@jobwatch/tracking';
import type { Logger } from 'pino';

export function createTrackingLogger(logger: Logger): TrackingLogger {
  return {
    info: (message) => logger.info({ event: 'tracking_stage' }, message),
    warn: (message) => logger.warn({ event: 'tracking_stage' }, message),
    error: (message) => logger.error({ event: 'tracking_stage' }, message),
  };
}
