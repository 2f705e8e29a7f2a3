import dotenv from 'dotenv';
import { loadConfig } from '../config';
import { createLogger } from '../utils/logger';
import initDatabase from './init';
import { ActivityStore, createStore } from './store';
import { sampleActivities, SeedActivity } from './seeds/sampleActivities';

const log = createLogger('seed');

/**
 * Insert the given activities and their initial participants in one
 * transaction. Does nothing when any activity already exists.
 *
 * @returns the number of activities inserted
 */
export async function seedDatabase(
  store: ActivityStore,
  activities: SeedActivity[] = sampleActivities
): Promise<number> {
  return store.session(async (session) => {
    if (await session.countActivities() > 0) {
      log.info('Activities already present, skipping seed');
      return 0;
    }

    for (const { participants, ...details } of activities) {
      const activity = await session.createActivity(details);

      for (const email of participants) {
        const participant = await session.ensureParticipant(email);
        await session.addAssociation(activity, participant);
      }
    }

    log.info(`Seeded ${activities.length} activities`);
    return activities.length;
  });
}

// Execute the seed if this file is run directly
if (require.main === module) {
  dotenv.config();
  const store = createStore(loadConfig().database);

  initDatabase(store)
    .then(() => seedDatabase(store))
    .then(() => store.close())
    .catch((error: unknown) => {
      log.error('Database seeding failed', error);
      process.exit(1);
    });
}
