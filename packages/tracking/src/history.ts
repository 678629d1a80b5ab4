import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { writeFileAtomic } from './atomic-write.js';
import { assertObservedDate, isObservedDate } from './dates.js';
import { CorruptHistoryError, PersistenceError, hasErrorCode } from './errors.js';
import type { HistoryEntry } from './types.js';

export const HISTORY_FORMAT_VERSION = 1;

const observedDateSchema = z.string().refine(isObservedDate, { message: 'expected a YYYY-MM-DD date' });

const historyRecordSchema = z
  .object({
    fingerprint: z.string().min(1),
    first_seen: observedDateSchema,
    last_seen: observedDateSchema,
  })
  .passthrough();

export const historyFileSchema = z
  .object({
    version: z.literal(HISTORY_FORMAT_VERSION),
    entries: z.array(historyRecordSchema),
  })
  .passthrough();

export type HistoryFile = z.infer<typeof historyFileSchema>;

function describeIssue(issue: z.ZodIssue): string {
  const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${location}: ${issue.message}`;
}

function cloneEntry(entry: HistoryEntry): HistoryEntry {
  return entry.extra ? { ...entry, extra: { ...entry.extra } } : { ...entry };
}

/**
 * Fingerprint → first/last-seen mapping persisted between runs.
 *
 * Entries are only ever added or moved forward in time. `load` and `save` are the only I/O;
 * everything else works on the in-memory map.
 */
export class HistoryStore {
  private readonly byFingerprint = new Map<string, HistoryEntry>();
  /** Top-level document fields this version does not know about, written back unchanged. */
  private documentExtra: Record<string, unknown> = {};

  static empty(): HistoryStore {
    return new HistoryStore();
  }

  static fromEntries(entries: Iterable<HistoryEntry>): HistoryStore {
    const store = new HistoryStore();
    for (const entry of entries) {
      store.absorb(entry);
    }
    return store;
  }

  /**
   * Missing file → empty store (first run). Unreadable or malformed file → CorruptHistoryError.
   * A fingerprint listed more than once is folded into one entry.
   */
  static async load(path: string): Promise<HistoryStore> {
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return HistoryStore.empty();
      }
      throw new CorruptHistoryError(path, 'file cannot be read', { cause: error });
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      throw new CorruptHistoryError(path, 'invalid JSON', { cause: error });
    }

    const parsed = historyFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new CorruptHistoryError(path, parsed.error.issues.map(describeIssue).join('; '));
    }

    const { version: _version, entries, ...documentExtra } = parsed.data;
    const store = HistoryStore.fromEntries(
      entries.map(({ fingerprint, first_seen, last_seen, ...extra }) => ({
        fingerprint,
        firstSeen: first_seen,
        lastSeen: last_seen,
        ...(Object.keys(extra).length > 0 ? { extra } : {}),
      })),
    );
    store.documentExtra = documentExtra;
    return store;
  }

  get size(): number {
    return this.byFingerprint.size;
  }

  contains(fingerprint: string): boolean {
    return this.byFingerprint.has(fingerprint);
  }

  get(fingerprint: string): HistoryEntry | undefined {
    const entry = this.byFingerprint.get(fingerprint);
    return entry ? cloneEntry(entry) : undefined;
  }

  /**
   * Entries sorted by fingerprint.
   */
  entries(): HistoryEntry[] {
    return [...this.byFingerprint.keys()].sort().flatMap((fingerprint) => {
      const entry = this.get(fingerprint);
      return entry ? [entry] : [];
    });
  }

  /**
   * Unseen fingerprint → new entry with first = last = observedDate.
   * Seen fingerprint → last_seen moves to observedDate if later; first_seen never changes.
   */
  record(fingerprint: string, observedDate: string): void {
    assertObservedDate(observedDate);

    const existing = this.byFingerprint.get(fingerprint);
    if (!existing) {
      this.byFingerprint.set(fingerprint, { fingerprint, firstSeen: observedDate, lastSeen: observedDate });
      return;
    }

    if (observedDate > existing.lastSeen) {
      existing.lastSeen = observedDate;
    }
  }

  /**
   * Fold another history into this one: earliest first_seen, latest last_seen per fingerprint.
   */
  merge(other: HistoryStore): void {
    for (const entry of other.entries()) {
      this.absorb(entry);
    }
  }

  toJSON(): HistoryFile {
    return {
      ...this.documentExtra,
      version: HISTORY_FORMAT_VERSION,
      entries: this.entries().map((entry) => ({
        fingerprint: entry.fingerprint,
        first_seen: entry.firstSeen,
        last_seen: entry.lastSeen,
        ...entry.extra,
      })),
    };
  }

  /**
   * Replace the file at `path` atomically. On failure the previous file is left as it was
   * and a PersistenceError is thrown.
   */
  async save(path: string): Promise<void> {
    const content = `${JSON.stringify(this.toJSON(), null, 2)}\n`;
    try {
      await writeFileAtomic(path, content);
    } catch (error) {
      throw new PersistenceError(path, `Failed to save history to ${path}`, { cause: error });
    }
  }

  private absorb(entry: HistoryEntry): void {
    const existing = this.byFingerprint.get(entry.fingerprint);
    if (!existing) {
      this.byFingerprint.set(entry.fingerprint, cloneEntry(entry));
      return;
    }

    if (entry.firstSeen < existing.firstSeen) {
      existing.firstSeen = entry.firstSeen;
    }
    if (entry.lastSeen > existing.lastSeen) {
      existing.lastSeen = entry.lastSeen;
    }
    if (entry.extra) {
      existing.extra = { ...entry.extra, ...existing.extra };
    }
  }
}
