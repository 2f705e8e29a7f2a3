import { loadConfig } from '../../config';
import { ActivityStore, createStore } from '../../db/store';
import { seedDatabase } from '../../db/seedDatabase';
import { SeedActivity } from '../../db/seeds/sampleActivities';

/**
 * Fresh SQLite store with the schema created, in memory unless a file is given
 */
export const createTestStore = async (storage = ':memory:'): Promise<ActivityStore> => {
  const store = createStore(loadConfig({ DB_DIALECT: 'sqlite', DB_STORAGE: storage }).database);
  await store.createSchema();
  return store;
};

/**
 * In-memory store seeded with the given activities (the sample data by default)
 */
export const createSeededStore = async (
  activities?: SeedActivity[],
  storage?: string
): Promise<ActivityStore> => {
  const store = await createTestStore(storage);
  await seedDatabase(store, activities);
  return store;
};
