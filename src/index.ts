/**
 * @fileoverview Public entry point
 * @module dockside
 *
 * Wait for Docker containers in integration tests by streaming their
 * multiplexed output and matching log lines against a deadline.
 *
 * @example
 * ```typescript
 * import { GenericContainerManager } from 'dockside';
 *
 * const redis = new GenericContainerManager({
 *   image: 'redis:7-alpine',
 *   ports: [6379],
 *   waitPatterns: [/Ready to accept connections/],
 * });
 * await redis.start();
 * ```
 */

export * from './stream';
export * from './containers';
export { DockerLogSource, createDockerClient } from './docker/DockerLogSource';
export { loadConfig, getConfig, resetConfig, type AppConfig, type LogsConfig } from './core/config';
export { createLogger, getLogger } from './core/instrumentation';
