export const APP_CONFIG = Symbol('APP_CONFIG');

export interface DatabaseConfig {
  url?: string;
  poolMax: number;
  lockTimeoutMs: number;
}

export interface SettlementConfig {
  maxAttempts: number;
}

export interface OutboxConfig {
  pollIntervalMs: number;
  batchSize: number;
  maxAttempts: number;
}

export interface AppConfig {
  port: number;
  jwtSecret: string;
  database: DatabaseConfig;
  settlement: SettlementConfig;
  outbox: OutboxConfig;
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, key: string, fallback: number, min = 0): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${key} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

export function loadAppConfig(env: Env = process.env): AppConfig {
  return {
    port: readInt(env, 'PORT', 3000, 1),
    jwtSecret: env.JWT_SECRET ?? 'dev-secret',
    database: {
      url: env.DATABASE_URL,
      poolMax: readInt(env, 'DATABASE_POOL_MAX', 10, 1),
      lockTimeoutMs: readInt(env, 'DATABASE_LOCK_TIMEOUT_MS', 5000),
    },
    settlement: {
      maxAttempts: readInt(env, 'SETTLEMENT_MAX_ATTEMPTS', 3, 1),
    },
    outbox: {
      pollIntervalMs: readInt(env, 'OUTBOX_POLL_INTERVAL_MS', 5000),
      batchSize: readInt(env, 'OUTBOX_BATCH_SIZE', 50, 1),
      maxAttempts: readInt(env, 'OUTBOX_MAX_ATTEMPTS', 5, 1),
    },
  };
}
