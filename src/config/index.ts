import { z } from 'zod';
import { readFileSync } from 'fs';
import { resolve } from 'path';

// Schema for the SQLite connection
const DatabaseSchema = z.object({
  path: z.string().min(1),
  journalMode: z.enum(['WAL', 'DELETE']).optional().default('WAL'),
});

// Schema for the read API
const ServerSchema = z.object({
  port: z.number().int().positive().optional().default(3000),
  defaultLimit: z.number().int().positive().optional().default(100),
  maxLimit: z.number().int().positive().optional().default(1000),
});

// Complete config schema
const ConfigSchema = z.object({
  database: DatabaseSchema,
  server: ServerSchema.optional().default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type DatabaseConfig = z.infer<typeof DatabaseSchema>;
export type ServerConfig = z.infer<typeof ServerSchema>;

let cachedConfig: Config | null = null;

/**
 * Load and validate configuration from config.json
 * @param configPath Path to config file (defaults to project root config.json)
 * @returns Validated configuration object, with ODDS_DB_PATH and PORT applied
 * @throws Error if config is invalid or missing
 */
export function loadConfig(configPath?: string): Config {
  if (cachedConfig && !configPath) {
    return cachedConfig;
  }

  const path = configPath || resolve(process.cwd(), 'config.json');

  let rawConfig: unknown;
  try {
    const content = readFileSync(path, 'utf-8');
    rawConfig = JSON.parse(content);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new Error(`Config file not found: ${path}`);
    }
    throw new Error(`Failed to parse config file: ${error}`);
  }

  const config = parseConfig(rawConfig);

  if (!configPath) {
    cachedConfig = config;
  }

  return config;
}

/**
 * Validate a raw config object and apply environment overrides
 * @throws Error listing every validation issue
 */
export function parseConfig(rawConfig: unknown, env: NodeJS.ProcessEnv = process.env): Config {
  const result = ConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues
      .map(issue => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid configuration:\n${errors}`);
  }

  const config = result.data;

  if (config.server.defaultLimit > config.server.maxLimit) {
    throw new Error('server.defaultLimit must not exceed server.maxLimit');
  }

  if (env.ODDS_DB_PATH) {
    config.database.path = env.ODDS_DB_PATH;
  }
  if (env.PORT) {
    const port = Number.parseInt(env.PORT, 10);
    if (!Number.isInteger(port) || port <= 0) {
      throw new Error(`Invalid PORT: ${env.PORT}`);
    }
    config.server.port = port;
  }

  return config;
}

/**
 * Config for the current working directory, loaded once
 */
export function getConfig(): Config {
  return loadConfig();
}

/**
 * Forget the loaded config so the next getConfig() reads config.json again
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
