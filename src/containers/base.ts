/**
 * @fileoverview Container lifecycle management that waits for readiness in the logs
 * @module containers/base
 */

import type Docker from 'dockerode';
import type { Logger } from 'pino';
import type { StartedTestContainer } from 'testcontainers';

import { getConfig } from '../core/config';
import { getLogger, logError, logTiming, withContext } from '../core/instrumentation/logger';
import { getTracer, withTracing } from '../core/instrumentation/tracing';
import { createDockerClient, DockerLogSource } from '../docker/DockerLogSource';
import { streamLogs } from '../stream/LogStream';
import { OrderedMatcher, UnorderedMatcher, type LogMatcher } from '../stream/matchers';
import type { ContainerLogSource, FetchLogsOptions, StreamLogsOptions } from '../stream/types';
import { waitForLogsMatching, type WaitForLogsOptions } from '../stream/waitForLogs';

/**
 * Generic container configuration interface
 * @template TConfig - Container-specific configuration type
 */
export interface ContainerConfig<TConfig = Record<string, unknown>> {
  /** Container image name and tag */
  image: string;
  /** Exposed ports */
  ports?: number[];
  /** Environment variables */
  env?: Record<string, string>;
  /** Log line patterns that mean the container is ready */
  waitPatterns?: Array<string | RegExp>;
  /** Require `waitPatterns` to appear in order (default: any order) */
  orderedPatterns?: boolean;
  /** Budget for the readiness wait in milliseconds */
  startupTimeoutMs?: number;
  /** Additional container-specific configuration */
  config?: TConfig;
}

/**
 * The part of a started container the manager relies on.
 * Every testcontainers `StartedTestContainer` satisfies it.
 */
export interface ManagedContainer {
  getId(): string;
  stop(): Promise<unknown>;
  exec(command: string[]): Promise<{ output: string; exitCode: number }>;
}

/**
 * Collaborators a manager can be given instead of building its own
 */
export interface ContainerManagerDependencies {
  logger?: Logger;
  docker?: Docker;
  /** Override how the log source for a started container is built */
  createLogSource?: (container: ManagedContainer) => ContainerLogSource;
}

/**
 * Generic container instance interface
 */
export interface IContainerInstance<TContainer extends ManagedContainer = StartedTestContainer> {
  /** Started container instance */
  readonly container: TContainer;
  /** Start the container and wait until it is ready */
  start(): Promise<IContainerInstance<TContainer>>;
  /** Stop and cleanup the container */
  stop(): Promise<void>;
  /** Health check */
  isHealthy(): Promise<boolean>;
}

/**
 * Build the readiness matcher for a list of patterns
 */
export function buildReadinessMatcher(patterns: Array<string | RegExp>, ordered: boolean = false): LogMatcher {
  return ordered ? OrderedMatcher.byRegex(...patterns) : UnorderedMatcher.byRegex(...patterns);
}

/**
 * Abstract base class for containers whose readiness shows in their logs
 *
 * @template TContainer - Started container type
 * @template TConfig - Configuration type
 *
 * @example
 * ```typescript
 * class QueueContainer extends ContainerManager {
 *   protected startContainer() {
 *     return new GenericContainer(this.config.image).start();
 *   }
 * }
 *
 * const queue = new QueueContainer({
 *   image: 'rabbitmq:3-alpine',
 *   waitPatterns: [/Server startup complete/],
 * });
 * await queue.start();
 * ```
 */
export abstract class ContainerManager<
  TContainer extends ManagedContainer = StartedTestContainer,
  TConfig = Record<string, unknown>,
> implements IContainerInstance<TContainer>
{
  protected _container: TContainer | null = null;
  protected readonly logger: Logger;
  private docker: Docker | null;
  private source: ContainerLogSource | null = null;

  /**
   * @param config - Container configuration
   * @param dependencies - Optional logger, dockerode client and log source factory
   */
  constructor(
    protected readonly config: ContainerConfig<TConfig>,
    protected readonly dependencies: ContainerManagerDependencies = {}
  ) {
    this.logger = withContext(dependencies.logger ?? getLogger(), { image: config.image });
    this.docker = dependencies.docker ?? null;
  }

  /**
   * Start the container
   * Must be implemented by subclasses
   */
  protected abstract startContainer(): Promise<TContainer>;

  /**
   * Get the started container
   */
  get container(): TContainer {
    if (!this._container) {
      throw new Error('Container not started. Call start() first.');
    }
    return this._container;
  }

  /**
   * Log source for the started container
   */
  get logSource(): ContainerLogSource {
    const container = this.container;
    if (!this.source) {
      this.source = this.dependencies.createLogSource
        ? this.dependencies.createLogSource(container)
        : DockerLogSource.fromId(this.getDocker(), container.getId());
    }
    return this.source;
  }

  /**
   * Start the container, then wait for its readiness log lines
   */
  async start(): Promise<this> {
    if (this._container) {
      this.logger.warn('Container already started');
      return this;
    }

    return withTracing(getTracer(), 'container.start', async () => {
      this.logger.info('Starting container');
      const startTime = Date.now();

      let container: TContainer;
      try {
        container = await this.startContainer();
        this._container = container;
      } catch (error) {
        logError(this.logger, asError(error), { phase: 'start' });
        throw error;
      }

      try {
        await this.waitForStart();
      } catch (error) {
        logError(this.logger, asError(error), { phase: 'waitForStart' });
        try {
          await this.stop();
        } catch (stopError) {
          logError(this.logger, asError(stopError), { phase: 'cleanup' });
        }
        throw error;
      }

      logTiming(this.logger, 'container.start', Date.now() - startTime, { id: container.getId() });
      return this;
    }, { 'container.image': this.config.image });
  }

  /**
   * Wait for the configured readiness patterns.
   *
   * Replays the full history so lines logged before the wait began still count.
   * Override for containers that signal readiness some other way.
   */
  protected async waitForStart(): Promise<void> {
    const patterns = this.config.waitPatterns ?? [];
    if (patterns.length === 0) {
      return;
    }

    await this.waitForLogsMatching(buildReadinessMatcher(patterns, this.config.orderedPatterns), {
      timeoutMs: this.config.startupTimeoutMs ?? getConfig().logs.waitTimeoutMs,
      tail: 'all',
    });
  }

  /**
   * Stop and cleanup the container
   */
  async stop(): Promise<void> {
    if (!this._container) {
      return;
    }

    this.logger.info('Stopping container');
    const container = this._container;
    this._container = null;
    this.source = null;

    try {
      await container.stop();
      this.logger.info('Container stopped');
    } catch (error) {
      logError(this.logger, asError(error), { phase: 'stop' });
      throw error;
    }
  }

  /**
   * Health check
   * Override in subclasses for specific health checks
   */
  async isHealthy(): Promise<boolean> {
    return this._container !== null;
  }

  /**
   * Execute command in container
   */
  async exec(command: string[]): Promise<{ output: string; exitCode: number }> {
    const { output, exitCode } = await this.container.exec(command);
    return { output, exitCode };
  }

  /**
   * Get existing container output as text
   */
  async getLogs(options: FetchLogsOptions = {}, encoding: BufferEncoding = 'utf8'): Promise<string> {
    const logs = await this.logSource.fetchLogs(options);
    return logs.toString(encoding);
  }

  /**
   * Stream raw log lines, see {@link streamLogs}
   */
  streamLogs(options: StreamLogsOptions = {}): AsyncGenerator<Buffer, void, undefined> {
    return streamLogs(this.logSource, { logger: this.logger, ...options });
  }

  /**
   * Wait for log lines matching a matcher, see {@link waitForLogsMatching}
   */
  waitForLogsMatching(matcher: LogMatcher, options: WaitForLogsOptions = {}): Promise<string> {
    return waitForLogsMatching(this.logSource, matcher, { logger: this.logger, ...options });
  }

  private getDocker(): Docker {
    this.docker ??= createDockerClient(getConfig().docker);
    return this.docker;
  }
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Container registry for managing multiple containers
 *
 * @template TContainers - Map of container names to container instances
 *
 * @example
 * ```typescript
 * const registry = createContainerRegistry<{ web: GenericContainerManager; cache: GenericContainerManager }>();
 * registry.register('web', web).register('cache', cache);
 * await registry.startAll();
 * ```
 */
export class ContainerRegistry<
  TContainers extends Record<string, IContainerInstance<ManagedContainer>> = Record<string, IContainerInstance>,
> {
  private containers = new Map<keyof TContainers, IContainerInstance<ManagedContainer>>();

  /**
   * Register a container
   */
  register<K extends keyof TContainers>(name: K, container: TContainers[K]): this {
    if (this.containers.has(name)) {
      throw new Error(`Container '${String(name)}' already registered`);
    }

    this.containers.set(name, container);
    return this;
  }

  /**
   * Get a container by name
   */
  get<K extends keyof TContainers>(name: K): TContainers[K] {
    const container = this.containers.get(name);
    if (!container) {
      throw new Error(`Container '${String(name)}' not found`);
    }
    return container as TContainers[K];
  }

  /**
   * Check if container exists
   */
  has(name: keyof TContainers): boolean {
    return this.containers.has(name);
  }

  /**
   * Start all registered containers
   */
  async startAll(): Promise<void> {
    await Promise.all(Array.from(this.containers.values()).map((container) => container.start()));
  }

  /**
   * Stop all registered containers
   */
  async stopAll(): Promise<void> {
    await Promise.all(Array.from(this.containers.values()).map((container) => container.stop()));
    this.containers.clear();
  }

  /**
   * Get all container names
   */
  getNames(): Array<keyof TContainers> {
    return Array.from(this.containers.keys());
  }

  /**
   * Get number of registered containers
   */
  get size(): number {
    return this.containers.size;
  }
}

/**
 * Helper to create a container registry with type inference
 */
export function createContainerRegistry<
  TContainers extends Record<string, IContainerInstance<ManagedContainer>>,
>(): ContainerRegistry<TContainers> {
  return new ContainerRegistry<TContainers>();
}
