import { loadConfig } from '../../config';

describe('loadConfig', () => {
  it('defaults to a local SQLite file', () => {
    const config = loadConfig({});

    expect(config.port).toBe(8000);
    expect(config.nodeEnv).toBe('development');
    expect(config.seedSampleData).toBe(true);
    expect(config.database.dialect).toBe('sqlite');
    expect(config.database.storage).toBe('./activities.db');
  });

  it('reads postgres settings', () => {
    const config = loadConfig({
      PORT: '3001',
      DB_DIALECT: 'postgres',
      DB_HOST: 'db.internal',
      DB_PORT: '6543',
      DB_NAME: 'school',
      DB_USER: 'app',
      DB_PASSWORD: 'test-secret',
    });

    expect(config.port).toBe(3001);
    expect(config.database).toEqual({
      dialect: 'postgres',
      storage: './activities.db',
      host: 'db.internal',
      port: 6543,
      name: 'school',
      user: 'app',
      password: 'test-secret',
    });
  });

  it('turns seeding off with a false-like flag', () => {
    expect(loadConfig({ SEED_SAMPLE_DATA: 'false' }).seedSampleData).toBe(false);
    expect(loadConfig({ SEED_SAMPLE_DATA: 'OFF' }).seedSampleData).toBe(false);
    expect(loadConfig({ SEED_SAMPLE_DATA: '1' }).seedSampleData).toBe(true);
  });

  it('rejects an unknown dialect', () => {
    expect(() => loadConfig({ DB_DIALECT: 'oracle' })).toThrow(
      'DB_DIALECT must be "sqlite" or "postgres", got "oracle"'
    );
  });

  it('rejects a port that is not a number', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow('PORT must be a port number, got "eighty"');
    expect(() => loadConfig({ DB_PORT: '70000' })).toThrow('DB_PORT must be a port number, got "70000"');
  });
});
