import dotenv from "dotenv";
import { loadConfig } from "./config";
import { createStore } from "./db/store";
import initDatabase from "./db/init";
import { seedDatabase } from "./db/seedDatabase";
import { createApp } from "./app";
import { createLogger } from "./utils/logger";

// Load environment variables
dotenv.config();

const log = createLogger('server');

const main = async (): Promise<void> => {
  const config = loadConfig();
  const store = createStore(config.database);

  await initDatabase(store);
  if (config.seedSampleData) {
    await seedDatabase(store);
  }

  const app = createApp(store);
  const server = app.listen(config.port, () => {
    log.info(`Server running on port ${config.port}`);
  });

  const shutdown = (signal: string): void => {
    log.info(`${signal} received, shutting down`);
    server.close(() => {
      store.close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          log.error('Failed to close the database connection', error);
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
};

main().catch((error: unknown) => {
  log.error('Failed to start server', error);
  process.exit(1);
});
