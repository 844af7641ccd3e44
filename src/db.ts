import { Pool, PoolConfig } from 'pg';
import dotenv from 'dotenv';
import path from 'path';
import { parseBooleanSetting } from './config';
import { logger } from './utils/logger';

// Load environment variables - only load from .env file in development
if (process.env.NODE_ENV !== 'production') {
  dotenv.config({ path: path.resolve(__dirname, '../.env') });
}

const commonPoolOptions: Partial<PoolConfig> = {
  max: 10,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 10000,
  keepAlive: true,
  keepAliveInitialDelayMillis: 10000,
};

/**
 * Managed Postgres hosts require SSL but often present certificates that are
 * not signed by a public CA, so certificate verification is disabled.
 */
const managedSslConfig = { rejectUnauthorized: false } as const;

function shouldUseSSL(): boolean {
  const fallback = Boolean(process.env.DATABASE_URL) || process.env.NODE_ENV === 'production';
  return parseBooleanSetting('DB_SSL', fallback);
}

export function buildPoolConfigFromEnv(): PoolConfig {
  const useSsl = shouldUseSSL();

  if (process.env.DATABASE_URL) {
    return {
      connectionString: process.env.DATABASE_URL,
      ...commonPoolOptions,
      ...(useSsl ? { ssl: managedSslConfig } : {}),
    };
  }

  return {
    user: process.env.DB_USER || 'postgres',
    host: process.env.DB_HOST || 'localhost',
    database: process.env.DB_DATABASE || 'inventory',
    password: process.env.DB_PASSWORD || 'postgres',
    port: parseInt(process.env.DB_PORT || '5432', 10),
    ...commonPoolOptions,
    ...(useSsl ? { ssl: managedSslConfig } : {}),
  };
}

export function createPool(config: PoolConfig = buildPoolConfigFromEnv()): Pool {
  const pool = new Pool(config);

  // Idle clients can error when the server drops them; log instead of crashing
  pool.on('error', (err) => {
    logger.error('[db] Idle client error', { err: logger.serializeError(err) });
  });

  logger.info('[db] Pool initialized', {
    usesConnectionString: Boolean(config.connectionString),
    sslEnabled: Boolean(config.ssl),
  });

  return pool;
}
