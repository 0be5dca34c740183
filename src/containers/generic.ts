/**
 * @fileoverview Container manager for any Docker image
 * @module containers/generic
 */

import { GenericContainer, type StartedTestContainer } from 'testcontainers';

import { ContainerManager, type ContainerConfig, type ContainerManagerDependencies } from './base';

/**
 * Generic container configuration
 */
export interface GenericConfig {
  /** Container command to run */
  command?: string[];
  /** Volumes to mount */
  volumes?: Array<{ source: string; target: string }>;
  /** Health check command */
  healthCheckCommand?: string[];
}

/**
 * Container manager for any image, ready once its `waitPatterns` are logged
 *
 * @example
 * ```typescript
 * const web = new GenericContainerManager({
 *   image: 'nginx:alpine',
 *   ports: [80],
 *   waitPatterns: [/start worker processes/],
 *   startupTimeoutMs: 30_000,
 * });
 *
 * await web.start();
 * const url = web.getUrl(80);
 * ```
 */
export class GenericContainerManager extends ContainerManager<StartedTestContainer, GenericConfig> {
  /**
   * Start generic container
   */
  protected async startContainer(): Promise<StartedTestContainer> {
    let container = new GenericContainer(this.config.image);

    if (this.config.ports && this.config.ports.length > 0) {
      container = container.withExposedPorts(...this.config.ports);
    }

    if (this.config.env) {
      container = container.withEnvironment(this.config.env);
    }

    if (this.config.config?.command) {
      container = container.withCommand(this.config.config.command);
    }

    if (this.config.config?.volumes) {
      container = container.withBindMounts(
        this.config.config.volumes.map((volume) => ({ source: volume.source, target: volume.target }))
      );
    }

    return await container.start();
  }

  /**
   * Get specific port mapping
   */
  getPort(containerPort: number): number {
    return this.container.getMappedPort(containerPort);
  }

  /**
   * Get URL for a specific port
   */
  getUrl(containerPort: number, protocol: string = 'http'): string {
    return `${protocol}://${this.container.getHost()}:${this.getPort(containerPort)}`;
  }

  /**
   * Health check using configured command
   */
  override async isHealthy(): Promise<boolean> {
    if (!this.config.config?.healthCheckCommand) {
      return await super.isHealthy();
    }

    const result = await this.exec(this.config.config.healthCheckCommand);
    return result.exitCode === 0;
  }
}

/**
 * Factory function for creating generic containers
 */
export function createGenericContainer(
  config: ContainerConfig<GenericConfig>,
  dependencies?: ContainerManagerDependencies
): GenericContainerManager {
  return new GenericContainerManager(config, dependencies);
}
