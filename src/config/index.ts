export type DatabaseDialect = 'sqlite' | 'postgres';

export interface DatabaseConfig {
  dialect: DatabaseDialect;
  // sqlite file path, or ':memory:'
  storage: string;
  host: string;
  port: number;
  name: string;
  user: string;
  password: string;
}

export interface AppConfig {
  port: number;
  nodeEnv: string;
  database: DatabaseConfig;
  seedSampleData: boolean;
}

const parsePort = (value: string | undefined, fallback: number, variable: string): number => {
  if (value === undefined || value === '') return fallback;

  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`${variable} must be a port number, got "${value}"`);
  }
  return port;
};

const parseDialect = (value: string | undefined): DatabaseDialect => {
  if (value === undefined || value === '') return 'sqlite';
  if (value === 'sqlite' || value === 'postgres') return value;
  throw new Error(`DB_DIALECT must be "sqlite" or "postgres", got "${value}"`);
};

const parseFlag = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined || value === '') return fallback;
  return !['false', '0', 'no', 'off'].includes(value.toLowerCase());
};

/**
 * Build the application configuration from environment variables.
 * Call after dotenv has populated process.env.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => ({
  port: parsePort(env.PORT, 8000, 'PORT'),
  nodeEnv: env.NODE_ENV || 'development',
  database: {
    dialect: parseDialect(env.DB_DIALECT),
    storage: env.DB_STORAGE || './activities.db',
    host: env.DB_HOST || 'localhost',
    port: parsePort(env.DB_PORT, 5432, 'DB_PORT'),
    name: env.DB_NAME || 'mergington',
    user: env.DB_USER || 'postgres',
    password: env.DB_PASSWORD || 'password',
  },
  seedSampleData: parseFlag(env.SEED_SAMPLE_DATA, true),
});

export default loadConfig;
