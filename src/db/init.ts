import { ActivityStore } from './store';
import { createLogger } from '../utils/logger';

const log = createLogger('db');

/**
 * Check the connection and make sure every table exists
 */
const initDatabase = async (store: ActivityStore): Promise<void> => {
  await store.sequelize.authenticate();
  log.info('Database connection has been established successfully.');

  // sync() without force/alter only creates missing tables
  await store.createSchema();
  log.info('All models were synchronized successfully.');
};

export default initDatabase;
