/**
 * Express server exposing the odds store read API
 */

import 'dotenv/config';
import { getConfig, type Config } from '../config/index.js';
import { getDb, closeDb } from '../db/client.js';
import { createApp } from './app.js';

function main(): void {
  console.log('=== Odds Store Server ===\n');

  let config: Config;
  try {
    config = getConfig();
    console.log('Config loaded successfully');
    console.log(`Database: ${config.database.path} (${config.database.journalMode})`);
  } catch (error) {
    console.error('Failed to load config:', error);
    process.exit(1);
  }

  try {
    getDb();
    console.log('Database initialized');
  } catch (error) {
    console.error('Failed to initialize database:', error);
    process.exit(1);
  }

  const app = createApp(config.server);
  const { port } = config.server;

  const server = app.listen(port, () => {
    console.log(`\nServer running at http://localhost:${port}`);
    console.log(`API available at http://localhost:${port}/api\n`);
  });

  // Graceful shutdown
  const shutdown = () => {
    console.log('\nShutting down...');
    server.close(() => {
      closeDb();
      console.log('Server closed');
      process.exit(0);
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main();
