export * from './db/schema.js';
export * from './db/client.js';
export { toUtcTimestamp } from './db/timestamps.js';
export { loadConfig, parseConfig, getConfig, clearConfigCache } from './config/index.js';
export type { Config, DatabaseConfig, ServerConfig } from './config/index.js';
export { createApp } from './server/app.js';
