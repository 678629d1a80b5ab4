import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import type { ClassifierConfig } from '@jobwatch/classifier';
import { DEFAULT_LOCK_TTL_MS, isObservedDate, toObservedDate } from '@jobwatch/tracking';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';

type Env = Record<string, string | undefined>;

const DEFAULT_INPUT_FILE = 'data/jobs_raw.json';
const DEFAULT_HISTORY_FILE = 'data/job_history.json';
const DEFAULT_OUTPUT_DIR = 'data/processed';
const DEFAULT_CLASSIFIER_MODEL = 'mistral:latest';
const DEFAULT_SEARCH_QUERY = 'junior AI engineer, machine learning engineer or data scientist roles';

const providerSchema = z.enum(['ollama', 'openrouter']);

export class ConfigError extends Error {
  readonly variable: string;

  constructor(variable: string, message: string) {
    super(message);
    this.name = 'ConfigError';
    this.variable = variable;
  }
}

export interface RunnerConfig {
  inputFile: string;
  historyFile: string;
  outputDir: string;
  lockFile: string;
  lockTtlMs: number;
  runDate: string;
  forceProcess: boolean;
  /** `null` when classification is disabled. */
  classifier: ClassifierConfig | null;
  githubOutput?: string;
}

/**
 * Load `.env` then `.env.local` from `rootDir`; the latter overrides.
 */
export function loadEnvFiles(rootDir: string): void {
  const envPath = resolve(rootDir, '.env');
  const envLocalPath = resolve(rootDir, '.env.local');

  if (existsSync(envPath)) {
    loadDotenv({ path: envPath });
  }

  if (existsSync(envLocalPath)) {
    loadDotenv({ path: envLocalPath, override: true });
  }
}

function readEnv(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

export function readRequiredEnv(env: Env, name: string): string {
  const value = readEnv(env, name);
  if (!value) {
    throw new ConfigError(name, `${name} environment variable is required`);
  }

  return value;
}

export function readIntEnv(env: Env, name: string, fallback: number): number {
  const raw = readEnv(env, name);
  if (!raw) {
    return fallback;
  }

  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }

  return Math.floor(parsed);
}

export function readBoolEnv(env: Env, name: string, fallback: boolean): boolean {
  const raw = readEnv(env, name);
  if (!raw) {
    return fallback;
  }

  const normalized = raw.toLowerCase();
  if (normalized === '1' || normalized === 'true' || normalized === 'yes' || normalized === 'on') {
    return true;
  }

  if (normalized === '0' || normalized === 'false' || normalized === 'no' || normalized === 'off') {
    return false;
  }

  return fallback;
}

function readRunDate(env: Env, now: Date): string {
  const raw = readEnv(env, 'RUN_DATE');
  if (!raw) {
    return toObservedDate(now);
  }

  if (!isObservedDate(raw)) {
    throw new ConfigError('RUN_DATE', `RUN_DATE must be a YYYY-MM-DD date, got "${raw}"`);
  }

  return raw;
}

function readClassifierConfig(env: Env): ClassifierConfig | null {
  if (!readBoolEnv(env, 'CLASSIFIER_ENABLED', false)) {
    return null;
  }

  const rawProvider = readEnv(env, 'CLASSIFIER_PROVIDER') ?? 'ollama';
  const provider = providerSchema.safeParse(rawProvider.toLowerCase());
  if (!provider.success) {
    throw new ConfigError(
      'CLASSIFIER_PROVIDER',
      `CLASSIFIER_PROVIDER must be one of ${providerSchema.options.join(', ')}, got "${rawProvider}"`,
    );
  }

  return {
    provider: provider.data,
    model: readEnv(env, 'CLASSIFIER_MODEL') ?? DEFAULT_CLASSIFIER_MODEL,
    searchTerm: readEnv(env, 'SEARCH_QUERY') ?? DEFAULT_SEARCH_QUERY,
    baseUrl: readEnv(env, 'CLASSIFIER_BASE_URL'),
    apiKey: provider.data === 'openrouter' ? readRequiredEnv(env, 'CLASSIFIER_API_KEY') : readEnv(env, 'CLASSIFIER_API_KEY'),
    timeoutMs: readIntEnv(env, 'CLASSIFIER_TIMEOUT_MS', 60_000),
    maxRetries: readIntEnv(env, 'CLASSIFIER_MAX_RETRIES', 2),
  };
}

export function loadRunnerConfig(env: Env = process.env, now: Date = new Date()): RunnerConfig {
  const historyFile = readEnv(env, 'HISTORY_FILE') ?? DEFAULT_HISTORY_FILE;

  return {
    inputFile: readEnv(env, 'INPUT_FILE') ?? DEFAULT_INPUT_FILE,
    historyFile,
    outputDir: readEnv(env, 'OUTPUT_DIR') ?? DEFAULT_OUTPUT_DIR,
    lockFile: readEnv(env, 'LOCK_FILE') ?? `${historyFile}.lock`,
    lockTtlMs: readIntEnv(env, 'LOCK_TTL_MS', DEFAULT_LOCK_TTL_MS),
    runDate: readRunDate(env, now),
    forceProcess: readBoolEnv(env, 'FORCE_PROCESS', false),
    classifier: readClassifierConfig(env),
    githubOutput: readEnv(env, 'GITHUB_OUTPUT'),
  };
}
