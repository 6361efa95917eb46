/**
 * Database migration script
 * Ensures schema is up to date; `--reset` drops and recreates every object.
 */

import 'dotenv/config';
import { getDb, closeDb, getSchemaVersion, resetSchema } from './client.js';
import { SCHEMA_VERSION } from './schema.js';

function main(): void {
  console.log('=== Odds Store Migration ===\n');

  const reset = process.argv.includes('--reset');

  try {
    const db = getDb();

    if (reset) {
      console.log('Resetting schema (all stored odds will be dropped)...');
      resetSchema(db);
    }

    console.log(`Current schema version: ${getSchemaVersion(db)}`);
    console.log(`Target schema version: ${SCHEMA_VERSION}`);

    console.log('\nObjects in database:');
    const objects = db
      .prepare<[], { name: string; type: string }>(
        "SELECT name, type FROM sqlite_master WHERE type IN ('table', 'view') ORDER BY type, name",
      )
      .all();
    objects.forEach(o => console.log(`  - ${o.name} (${o.type})`));

  } catch (error) {
    console.error('Migration failed:', error);
    process.exitCode = 1;
  } finally {
    closeDb();
  }
}

main();
