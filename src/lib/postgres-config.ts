import type { PoolConfig } from 'pg';

/**
 * Connection settings handed to the pg pool. Credentials are supplied by the
 * caller; nothing here persists them.
 */
export interface PostgresConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  connectionString?: string;
  max: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
  applicationName: string;
}

export const defaultPostgresConfig: PostgresConfig = {
  host: 'localhost',
  port: 5432,
  database: 'postgres',
  user: 'postgres',
  password: '',
  max: 10,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 5000,
  applicationName: 'odoo-schema-explorer',
};

export const toPoolConfig = (config: Partial<PostgresConfig> = {}): PoolConfig => {
  const merged: PostgresConfig = { ...defaultPostgresConfig, ...config };

  const poolConfig: PoolConfig = {
    max: merged.max,
    idleTimeoutMillis: merged.idleTimeoutMillis,
    connectionTimeoutMillis: merged.connectionTimeoutMillis,
    application_name: merged.applicationName,
  };

  if (merged.connectionString) {
    poolConfig.connectionString = merged.connectionString;
    return poolConfig;
  }

  return {
    ...poolConfig,
    host: merged.host,
    port: merged.port,
    database: merged.database,
    user: merged.user,
    password: merged.password,
  };
};
