/**
 * @fileoverview Configuration loader with environment variable support
 * @module core/config
 */

import { config as loadEnv } from 'dotenv';

import { AppConfigSchema, type AppConfig } from './schema';

// Load environment variables
loadEnv();

/**
 * Parse boolean from environment variable
 */
function parseBoolean(value: string | undefined, defaultValue: boolean = false): boolean {
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Parse number from environment variable
 */
function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Load and validate configuration from environment variables
 *
 * @param env - Environment to read (defaults to `process.env`)
 * @returns Validated configuration
 * @throws {Error} If configuration is invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const rawConfig = {
    nodeEnv: env['NODE_ENV'] ?? 'development',
    serviceName: env['SERVICE_NAME'] ?? 'dockside',
    logging: {
      level: env['LOG_LEVEL'] ?? 'info',
      pretty: parseBoolean(env['LOG_PRETTY'], false),
    },
    logs: {
      waitTimeoutMs: parseNumber(env['DOCKSIDE_WAIT_TIMEOUT_MS'], 10000),
      diagnosticTailLines: parseNumber(env['DOCKSIDE_TAIL_LINES'], 100),
      encoding: env['DOCKSIDE_LOG_ENCODING'] ?? 'utf8',
    },
    docker: {
      socketPath: env['DOCKER_SOCKET_PATH'],
    },
  };

  const result = AppConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new Error(`Invalid configuration: ${result.error.message}`);
  }
  return result.data;
}

/**
 * Singleton configuration instance
 */
let configInstance: AppConfig | null = null;

/**
 * Get configuration singleton
 */
export function getConfig(): AppConfig {
  configInstance ??= loadConfig();
  return configInstance;
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

// Export schemas and types
export * from './schema';
