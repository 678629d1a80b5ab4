import type { TrackingLogger } from './types.js';

export const consoleLogger: TrackingLogger = {
  info: (msg) => console.log(msg),
  warn: (msg) => console.warn(msg),
  error: (msg) => console.error(msg),
};
