import { randomUUID } from 'node:crypto';
import { link, mkdir, open, rename, rm, type FileHandle } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { writeFileAtomic } from './atomic-write.js';
import { ConcurrentRunError, PersistenceError, hasErrorCode } from './errors.js';
import { consoleLogger } from './logger.js';
import type { TrackingLogger } from './types.js';

export const DEFAULT_LOCK_TTL_MS = 60 * 60 * 1000;

const lockFileSchema = z.object({
  owner_id: z.string().min(1),
  pid: z.number().int(),
  acquired_at: z.string(),
  expires_at: z.string(),
});

type LockFile = z.infer<typeof lockFileSchema>;

export interface RunLock {
  readonly path: string;
  readonly ownerId: string;
  /**
   * Push `expires_at` forward. Throws ConcurrentRunError when the file no longer names this owner.
   */
  refresh(): Promise<void>;
  release(): Promise<void>;
}

export interface AcquireRunLockOptions {
  ttlMs?: number;
  ownerId?: string;
  now?: () => Date;
  /** Interval of the background refresh. Defaults to a third of the TTL; 0 disables it. */
  heartbeatMs?: number;
  logger?: TrackingLogger;
}

interface LockSnapshot {
  contents: LockFile | null;
  ino: number;
  mtimeMs: number;
}

function serialize(contents: LockFile): string {
  return `${JSON.stringify(contents, null, 2)}\n`;
}

function parseContents(text: string): LockFile | null {
  try {
    const parsed = lockFileSchema.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data : null;
  } catch (error) {
    if (error instanceof SyntaxError) {
      return null;
    }
    throw error;
  }
}

/**
 * Contents and identity of the file at `path`, read through one handle. `null` when there is none.
 */
async function inspectLock(path: string): Promise<LockSnapshot | null> {
  let handle: FileHandle;
  try {
    handle = await open(path, 'r');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return null;
    }
    throw new PersistenceError(path, `Failed to read lock file ${path}`, { cause: error });
  }

  try {
    const stats = await handle.stat();
    const text = await handle.readFile('utf-8');
    return { contents: parseContents(text), ino: stats.ino, mtimeMs: stats.mtimeMs };
  } catch (error) {
    throw new PersistenceError(path, `Failed to read lock file ${path}`, { cause: error });
  } finally {
    await handle.close();
  }
}

/**
 * Write the contents beside the lock, then hard-link them into place. The lock path never exists
 * without its contents, and `link` fails with EEXIST when another run got there first.
 */
async function tryCreateLockFile(path: string, contents: LockFile): Promise<boolean> {
  const tmpPath = `${path}.${randomUUID()}.tmp`;

  try {
    const handle = await open(tmpPath, 'wx');
    try {
      await handle.writeFile(serialize(contents), 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }

    await link(tmpPath, path);
    return true;
  } catch (error) {
    if (hasErrorCode(error, 'EEXIST')) {
      return false;
    }
    throw new PersistenceError(path, `Failed to create lock file ${path}`, { cause: error });
  } finally {
    await Promise.allSettled([rm(tmpPath, { force: true })]);
  }
}

/**
 * A lock with readable contents is stale once `expires_at` has passed. Unreadable contents give
 * no expiry, so the file's modification time plus the TTL stands in for it.
 */
function isStale(snapshot: LockSnapshot, now: Date, ttlMs: number): boolean {
  const expiresAt = snapshot.contents ? Date.parse(snapshot.contents.expires_at) : Number.NaN;
  const deadline = Number.isNaN(expiresAt) ? snapshot.mtimeMs + ttlMs : expiresAt;
  return deadline <= now.getTime();
}

function sameFile(a: LockSnapshot, b: LockSnapshot): boolean {
  return a.ino === b.ino && a.mtimeMs === b.mtimeMs;
}

async function restoreLock(movedPath: string, path: string): Promise<void> {
  try {
    await link(movedPath, path);
  } catch (error) {
    if (!hasErrorCode(error, 'EEXIST')) {
      throw new PersistenceError(path, `Failed to restore lock file ${path}`, { cause: error });
    }
  }
}

/**
 * Move a stale lock out of the way. Succeeds only when the file moved is the one inspected;
 * a lock another run created in between is put back.
 */
async function evictStaleLock(path: string, inspected: LockSnapshot): Promise<void> {
  const movedPath = `${path}.${randomUUID()}.stale`;

  try {
    await rename(path, movedPath);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return;
    }
    throw new PersistenceError(path, `Failed to move stale lock file ${path}`, { cause: error });
  }

  try {
    const moved = await inspectLock(movedPath);
    if (moved && !sameFile(moved, inspected)) {
      await restoreLock(movedPath, path);
      throw new ConcurrentRunError(path, moved.contents?.owner_id);
    }
  } finally {
    await rm(movedPath, { force: true });
  }
}

/**
 * Take the single-writer lock guarding a history file.
 *
 * A stale lock (past `expires_at`, or unreadable and older than the TTL) is taken over once;
 * a live lock raises ConcurrentRunError. While held, the lock is refreshed in the background so
 * a long run does not outlive its own expiry.
 */
export async function acquireRunLock(path: string, options: AcquireRunLockOptions = {}): Promise<RunLock> {
  const ttlMs = options.ttlMs ?? DEFAULT_LOCK_TTL_MS;
  const ownerId = options.ownerId ?? randomUUID();
  const now = options.now ?? (() => new Date());

  const buildContents = (): LockFile => {
    const acquiredAt = now();
    return {
      owner_id: ownerId,
      pid: process.pid,
      acquired_at: acquiredAt.toISOString(),
      expires_at: new Date(acquiredAt.getTime() + ttlMs).toISOString(),
    };
  };

  await mkdir(dirname(path), { recursive: true });

  const contents = buildContents();
  if (await tryCreateLockFile(path, contents)) {
    return createHandle(path, contents, ttlMs, now, options);
  }

  const holder = await inspectLock(path);
  if (holder) {
    if (!isStale(holder, now(), ttlMs)) {
      throw new ConcurrentRunError(path, holder.contents?.owner_id);
    }
    await evictStaleLock(path, holder);
  }

  const takeover = buildContents();
  if (await tryCreateLockFile(path, takeover)) {
    return createHandle(path, takeover, ttlMs, now, options);
  }

  const winner = await inspectLock(path);
  throw new ConcurrentRunError(path, winner?.contents?.owner_id);
}

function createHandle(
  path: string,
  contents: LockFile,
  ttlMs: number,
  now: () => Date,
  options: AcquireRunLockOptions,
): RunLock {
  const ownerId = contents.owner_id;
  const logger = options.logger ?? consoleLogger;
  const heartbeatMs = options.heartbeatMs ?? Math.max(1000, Math.floor(ttlMs / 3));
  let released = false;
  let pendingRefresh: Promise<void> | null = null;

  const refresh = async (): Promise<void> => {
    if (released) {
      throw new ConcurrentRunError(path);
    }

    const current = await inspectLock(path);
    if (current?.contents?.owner_id !== ownerId) {
      throw new ConcurrentRunError(path, current?.contents?.owner_id);
    }

    const renewed: LockFile = {
      ...contents,
      expires_at: new Date(now().getTime() + ttlMs).toISOString(),
    };
    try {
      await writeFileAtomic(path, serialize(renewed));
    } catch (error) {
      throw new PersistenceError(path, `Failed to refresh lock file ${path}`, { cause: error });
    }
  };

  const timer =
    heartbeatMs > 0
      ? setInterval(() => {
          if (pendingRefresh) {
            return;
          }
          pendingRefresh = refresh()
            .catch((error: unknown) => {
              const message = error instanceof Error ? error.message : String(error);
              logger.warn(`[lock] Failed to refresh ${path}: ${message}`);
            })
            .finally(() => {
              pendingRefresh = null;
            });
        }, heartbeatMs)
      : null;
  timer?.unref();

  return {
    path,
    ownerId,
    refresh,
    async release(): Promise<void> {
      if (released) {
        return;
      }

      if (timer) {
        clearInterval(timer);
      }
      if (pendingRefresh) {
        await pendingRefresh;
      }
      released = true;

      const current = await inspectLock(path);
      if (current?.contents?.owner_id === ownerId) {
        await rm(path, { force: true });
      }
    },
  };
}
