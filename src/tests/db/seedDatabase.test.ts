import { ActivityStore } from '../../db/store';
import { seedDatabase } from '../../db/seedDatabase';
import { sampleActivities } from '../../db/seeds/sampleActivities';
import { createTestStore } from '../helpers/testStore';

// Mock logger
jest.mock('../../utils/logger', () => ({
  createLogger: () => ({
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }),
}));

describe('seedDatabase', () => {
  let store: ActivityStore;

  beforeEach(async () => {
    store = await createTestStore();
  });

  afterEach(async () => {
    await store.close();
  });

  it('inserts the sample activities into an empty database', async () => {
    const inserted = await seedDatabase(store);

    expect(inserted).toBe(3);
    expect(await store.models.Activity.count()).toBe(3);
    expect(await store.models.Participant.count()).toBe(6);
    expect(await store.models.ActivityParticipant.count()).toBe(6);
  });

  it('stores the configured capacity of each sample activity', async () => {
    await seedDatabase(store);

    const activities = await store.models.Activity.findAll({ order: [['id', 'ASC']] });
    expect(activities.map((activity) => [activity.name, activity.maxParticipants])).toEqual(
      sampleActivities.map((activity) => [activity.name, activity.maxParticipants])
    );
  });

  it('does nothing when activities already exist', async () => {
    await seedDatabase(store);

    const inserted = await seedDatabase(store);

    expect(inserted).toBe(0);
    expect(await store.models.Activity.count()).toBe(3);
  });

  it('creates a participant shared by two activities once', async () => {
    await seedDatabase(store, [
      {
        name: 'Art Club',
        description: 'Painting and drawing',
        schedule: 'Thursdays, 3:30 PM - 5:00 PM',
        maxParticipants: 10,
        participants: ['lee@mergington.edu'],
      },
      {
        name: 'Choir',
        description: 'Sing in the school choir',
        schedule: 'Tuesdays, 4:00 PM - 5:00 PM',
        maxParticipants: 25,
        participants: ['lee@mergington.edu', 'kim@mergington.edu'],
      },
    ]);

    expect(await store.models.Participant.count()).toBe(2);
    expect(await store.models.ActivityParticipant.count({ where: { email: 'lee@mergington.edu' } })).toBe(2);
  });

  it('creates the schema idempotently', async () => {
    await seedDatabase(store);

    await store.createSchema();

    expect(await store.models.Activity.count()).toBe(3);
  });
});
