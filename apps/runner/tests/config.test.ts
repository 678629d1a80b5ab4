import { describe, expect, it } from 'vitest';
import { ConfigError, loadRunnerConfig, readBoolEnv, readIntEnv } from '../src/config.js';

const now = new Date('2026-10-19T23:30:00.000Z');

describe('loadRunnerConfig', () => {
  it('applies defaults', () => {
    expect(loadRunnerConfig({}, now)).toEqual({
      inputFile: 'data/jobs_raw.json',
      historyFile: 'data/job_history.json',
      outputDir: 'data/processed',
      lockFile: 'data/job_history.json.lock',
      lockTtlMs: 3_600_000,
      runDate: '2026-10-19',
      forceProcess: false,
      classifier: null,
      githubOutput: undefined,
    });
  });

  it('derives the lock path from a custom history file', () => {
    const config = loadRunnerConfig({ HISTORY_FILE: 'state/history.json' }, now);
    expect(config.lockFile).toBe('state/history.json.lock');
  });

  it('keeps an explicit lock path and run date', () => {
    const config = loadRunnerConfig({ LOCK_FILE: '/tmp/run.lock', RUN_DATE: '2026-01-31', FORCE_PROCESS: 'yes' }, now);
    expect(config.lockFile).toBe('/tmp/run.lock');
    expect(config.runDate).toBe('2026-01-31');
    expect(config.forceProcess).toBe(true);
  });

  it('rejects an impossible run date', () => {
    expect(() => loadRunnerConfig({ RUN_DATE: '2026-02-30' }, now)).toThrow(ConfigError);
    expect(() => loadRunnerConfig({ RUN_DATE: '19/10/2026' }, now)).toThrow(
      'RUN_DATE must be a YYYY-MM-DD date, got "19/10/2026"',
    );
  });

  it('builds an ollama classifier config when enabled', () => {
    const config = loadRunnerConfig({ CLASSIFIER_ENABLED: 'true' }, now);
    expect(config.classifier).toEqual({
      provider: 'ollama',
      model: 'mistral:latest',
      searchTerm: 'junior AI engineer, machine learning engineer or data scientist roles',
      baseUrl: undefined,
      apiKey: undefined,
      timeoutMs: 60_000,
      maxRetries: 2,
    });
  });

  it('reads openrouter settings', () => {
    const config = loadRunnerConfig(
      {
        CLASSIFIER_ENABLED: '1',
        CLASSIFIER_PROVIDER: 'OpenRouter',
        CLASSIFIER_MODEL: 'mistralai/mistral-7b-instruct',
        CLASSIFIER_API_KEY: 'test-key',
        CLASSIFIER_TIMEOUT_MS: '5000',
        SEARCH_QUERY: 'data engineer roles',
      },
      now,
    );

    expect(config.classifier).toMatchObject({
      provider: 'openrouter',
      model: 'mistralai/mistral-7b-instruct',
      apiKey: 'test-key',
      timeoutMs: 5000,
      searchTerm: 'data engineer roles',
    });
  });

  it('requires an API key for openrouter', () => {
    expect(() => loadRunnerConfig({ CLASSIFIER_ENABLED: 'on', CLASSIFIER_PROVIDER: 'openrouter' }, now)).toThrow(
      'CLASSIFIER_API_KEY environment variable is required',
    );
  });

  it('rejects an unknown provider', () => {
    expect(() => loadRunnerConfig({ CLASSIFIER_ENABLED: 'true', CLASSIFIER_PROVIDER: 'bard' }, now)).toThrow(
      'CLASSIFIER_PROVIDER must be one of ollama, openrouter, got "bard"',
    );
  });

  it('ignores classifier settings while disabled', () => {
    const config = loadRunnerConfig({ CLASSIFIER_ENABLED: 'false', CLASSIFIER_PROVIDER: 'bard' }, now);
    expect(config.classifier).toBeNull();
  });
});

describe('env helpers', () => {
  it('falls back on unusable integers', () => {
    expect(readIntEnv({ N: 'abc' }, 'N', 7)).toBe(7);
    expect(readIntEnv({ N: '-5' }, 'N', 7)).toBe(7);
    expect(readIntEnv({ N: '12.9' }, 'N', 7)).toBe(12);
  });

  it('falls back on unknown booleans', () => {
    expect(readBoolEnv({ B: 'maybe' }, 'B', true)).toBe(true);
    expect(readBoolEnv({ B: ' OFF ' }, 'B', true)).toBe(false);
    expect(readBoolEnv({ B: '' }, 'B', false)).toBe(false);
  });
});
