import { ConfigurationError } from '../errors';
import type { RetentionConfig } from '../types';

export const MEMORY_DB = ':memory:';

export interface DatabaseConfig {
  url: string;
  poolMax: number;
  idleTimeout: number;
  connectionTimeout: number;
  ssl: boolean;
  create: boolean;
}

export interface SweeperConfig {
  schedule: string;
  batchSize: number;
}

export interface AppConfig {
  port: number;
  host: string;
  nodeEnv: string;
  corsOrigin: string[] | '*';
  /** ':memory:' or a postgres:// connection string */
  db: string;
  database: DatabaseConfig;
  retention: RetentionConfig;
  sweeper: SweeperConfig;
  /** Raw SECRET value; decoded and checked by buildCryptoConfig */
  secret?: string;
  rateLimiting: {
    windowMs: number;
    maxRequests: number;
  };
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min = 1, max = Number.MAX_SAFE_INTEGER): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigurationError(`${name} must be an integer, got "${raw}"`);
  }
  const value = parseInt(raw, 10);
  if (value < min || value > max) {
    throw new ConfigurationError(`${name} must be between ${min} and ${max}, got ${value}`);
  }
  return value;
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  return raw === 'true' || raw === '1';
}

function readDb(env: Env): string {
  const raw = (env.DB ?? '').trim();
  if (raw === '' || raw === MEMORY_DB) {
    return MEMORY_DB;
  }
  if (!/^postgres(ql)?:\/\//.test(raw)) {
    throw new ConfigurationError('DB must be ":memory:" or a postgres:// connection string');
  }
  return raw;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const db = readDb(env);
  const cors = env.CORS_ORIGIN?.trim();

  return {
    port: readInt(env, 'PORT', 8080, 0, 65535),
    host: env.HOST || '0.0.0.0',
    nodeEnv: env.NODE_ENV || 'development',
    corsOrigin: !cors || cors === '*' ? '*' : cors.split(',').map(o => o.trim()).filter(o => o.length > 0),
    db,

    database: {
      url: db,
      poolMax: readInt(env, 'DB_POOL_MAX', 10),
      idleTimeout: readInt(env, 'DB_IDLE_TIMEOUT', 30000, 0),
      connectionTimeout: readInt(env, 'DB_CONNECTION_TIMEOUT', 10000, 0),
      ssl: readBool(env, 'DB_SSL', false),
      create: readBool(env, 'DB_CREATE', true)
    },

    retention: {
      maxLength: readInt(env, 'MAXLENGTH', 5000),
      dayspan: readInt(env, 'DAYSPAN', 90, 1, 65535)
    },

    sweeper: {
      schedule: env.SWEEP_SCHEDULE || '* * * * *',
      batchSize: readInt(env, 'SWEEP_BATCH_SIZE', 500)
    },

    secret: env.SECRET || undefined,

    rateLimiting: {
      windowMs: readInt(env, 'RATE_LIMIT_WINDOW_MS', 900000), // 15 minutes
      maxRequests: readInt(env, 'RATE_LIMIT_MAX_REQUESTS', 300)
    }
  };
}
