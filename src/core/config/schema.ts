/**
 * @fileoverview Zod schemas for library configuration
 * @module core/config/schema
 */

import { z } from 'zod';

/**
 * Logging configuration schema
 */
export const LoggingConfigSchema = z.object({
  level: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info')
    .describe('Log level'),
  pretty: z.boolean().default(false).describe('Pretty print logs (development only)'),
});

/**
 * Log streaming defaults
 */
export const LogsConfigSchema = z.object({
  waitTimeoutMs: z
    .number()
    .int()
    .min(1)
    .default(10000)
    .describe('Default budget for waiting on matching log lines in milliseconds'),
  diagnosticTailLines: z
    .number()
    .int()
    .min(0)
    .default(100)
    .describe('Number of recent log lines attached to wait failures'),
  encoding: z
    .enum(['utf8', 'utf-8', 'ascii', 'latin1', 'utf16le', 'ucs2', 'base64', 'hex'])
    .default('utf8')
    .describe('Encoding used to decode container output'),
});

/**
 * Docker connection schema
 */
export const DockerConfigSchema = z.object({
  socketPath: z.string().min(1).optional().describe('Docker daemon socket path'),
});

/**
 * Main configuration schema
 */
export const AppConfigSchema = z.object({
  nodeEnv: z
    .enum(['development', 'test', 'staging', 'production'])
    .default('development')
    .describe('Node environment'),
  serviceName: z.string().min(1).default('dockside').describe('Service name attached to log records'),
  logging: LoggingConfigSchema,
  logs: LogsConfigSchema,
  docker: DockerConfigSchema,
});

/**
 * Inferred TypeScript types from schemas
 */
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogsConfig = z.infer<typeof LogsConfigSchema>;
export type DockerConfig = z.infer<typeof DockerConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;
