import dotenv from 'dotenv';
dotenv.config();

import { getServerConfig } from './config/server';
import { loadActivityCatalog } from './config/catalog';
import ActivityStore from './services/ActivityStore';
import { createApp } from './app';

const start = (): void => {
  const config = getServerConfig();
  const store = new ActivityStore(loadActivityCatalog(config.activitiesFile));
  const app = createApp({ store, config });

  const server = app.listen(config.port, () => {
    console.log(`Server running on port ${config.port}`);
    console.log(`Loaded ${Object.keys(store.list()).length} activities from ${config.activitiesFile}`);
  });

  const shutdown = (signal: string): void => {
    console.log(`${signal} received, closing server`);
    server.close(error => {
      if (error) {
        console.error('Error closing server:', error);
        process.exit(1);
      }
      process.exit(0);
    });
  };

  // Graceful shutdown
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
};

try {
  start();
} catch (error) {
  console.error('Failed to start server:', error);
  process.exit(1);
}
