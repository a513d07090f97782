import { ConfigError } from './errors';
import type { SyncSettings } from './types';

export type RemoteMode = 'simulated' | 'http';

export interface AppConfig {
  port: number;
  databasePath: string;
  sync: SyncSettings;
  syncIntervalMs: number;
  remote: {
    mode: RemoteMode;
    apiBaseUrl: string;
    timeoutMs: number;
    failureRate: number;
    delayMs: number;
  };
}

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string, fallback: string): string {
  const value = env[key];
  return value !== undefined && value.trim() !== '' ? value.trim() : fallback;
}

function readInt(env: Env, key: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigError(`${key} must be an integer between ${min} and ${max}, got "${raw}"`);
  }
  return value;
}

function readRate(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new ConfigError(`${key} must be a number between 0 and 1, got "${raw}"`);
  }
  return value;
}

function readMode(env: Env): RemoteMode {
  const mode = readString(env, 'REMOTE_MODE', 'simulated');
  if (mode !== 'simulated' && mode !== 'http') {
    throw new ConfigError(`REMOTE_MODE must be "simulated" or "http", got "${mode}"`);
  }
  return mode;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: readInt(env, 'PORT', 3000, 0, 65535),
    databasePath: readString(env, 'DATABASE_PATH', './data/tasks.sqlite3'),
    sync: {
      batchSize: readInt(env, 'SYNC_BATCH_SIZE', 50, 1),
      maxRetries: readInt(env, 'MAX_RETRIES', 3, 0),
      retryBackoffMs: readInt(env, 'RETRY_BACKOFF_MS', 0, 0),
    },
    syncIntervalMs: readInt(env, 'SYNC_INTERVAL_MS', 0, 0),
    remote: {
      mode: readMode(env),
      apiBaseUrl: readString(env, 'API_BASE_URL', 'http://localhost:4000/api'),
      timeoutMs: readInt(env, 'REMOTE_TIMEOUT_MS', 5000, 1),
      failureRate: readRate(env, 'SIMULATED_FAILURE_RATE', 0.1),
      delayMs: readInt(env, 'SIMULATED_DELAY_MS', 10, 0),
    },
  };
}
