import { Sequelize, Options, Transaction } from 'sequelize';
import { DatabaseConfig } from '../config';

// SQLite allows one writer. Sessions take the write lock when they begin
// (IMMEDIATE) and retry while another session holds it.
const sqliteRetry = {
  max: 20,
  match: [/SQLITE_BUSY/],
};

const pool = {
  max: 5,
  min: 0,
  acquire: 30000,
  idle: 10000
};

/**
 * Open a Sequelize instance for the configured dialect.
 * SQLite keeps everything in a single file (or in memory for ':memory:').
 */
export const createConnection = (config: DatabaseConfig, options: Options = {}): Sequelize => {
  if (config.dialect === 'sqlite') {
    return new Sequelize({
      dialect: 'sqlite',
      storage: config.storage,
      logging: false,
      transactionType: Transaction.TYPES.IMMEDIATE,
      retry: sqliteRetry,
      pool,
      ...options,
    });
  }

  return new Sequelize(config.name, config.user, config.password, {
    host: config.host,
    port: config.port,
    dialect: 'postgres',
    logging: false,
    pool,
    ...options,
  });
};

export default createConnection;
