import type { JobSource } from './types.js';

/**
 * Typed helper for source definitions.
 */
export function defineSource<T extends JobSource>(source: T): T {
  return source;
}
