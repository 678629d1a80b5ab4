import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { JobSource } from '@jobwatch/posting-sdk';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { EXIT_FAILURE, EXIT_OK, main } from '../src/cli.js';
import { createCapturedLogger } from './helpers.js';

const source: JobSource = {
  manifest: { id: 'fixture', name: 'Fixture batch', version: '0.1.0' },
  fetch: async () => ({ postings: [{ title: 'ML Engineer', company: 'Acme' }], validationDropped: 0 }),
};

describe('main', () => {
  let dir: string;
  let env: Record<string, string>;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'jobwatch-cli-'));
    env = {
      INPUT_FILE: join(dir, 'jobs_raw.json'),
      HISTORY_FILE: join(dir, 'job_history.json'),
      OUTPUT_DIR: join(dir, 'processed'),
      RUN_DATE: '2026-10-19',
    };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('exits cleanly after a successful run', async () => {
    const { logger, records } = createCapturedLogger();

    await expect(main({ logger, env, source })).resolves.toBe(EXIT_OK);
    expect(records().at(-1)).toMatchObject({ event: 'run_completed', newCount: 1 });
  });

  it('fails on invalid configuration before running', async () => {
    const { logger, records } = createCapturedLogger();

    await expect(main({ logger, env: { ...env, RUN_DATE: 'tomorrow' }, source })).resolves.toBe(EXIT_FAILURE);
    expect(records()).toEqual([
      expect.objectContaining({
        level: 'fatal',
        event: 'config_invalid',
        variable: 'RUN_DATE',
        message: 'RUN_DATE must be a YYYY-MM-DD date, got "tomorrow"',
      }),
    ]);
  });

  it('reports an aborted run on a store failure', async () => {
    await writeFile(join(dir, 'job_history.json'), '{ not json');
    const { logger, records } = createCapturedLogger();

    await expect(main({ logger, env, source })).resolves.toBe(EXIT_FAILURE);
    expect(records().at(-1)).toMatchObject({
      level: 'error',
      event: 'run_aborted',
      reason: 'CorruptHistoryError',
      historyFile: join(dir, 'job_history.json'),
    });
  });

  it('fails without an abort notice when the input cannot be read', async () => {
    const { logger, records } = createCapturedLogger();

    await expect(main({ logger, env })).resolves.toBe(EXIT_FAILURE);
    expect(records().at(-1)).toMatchObject({
      event: 'run_failed',
      error: { name: 'SourceReadError' },
    });
    expect(records().some((record) => record.event === 'run_aborted')).toBe(false);
  });
});
