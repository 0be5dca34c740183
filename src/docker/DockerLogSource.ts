/**
 * @fileoverview ContainerLogSource backed by the Docker Engine API
 * @module docker/DockerLogSource
 */

import { Readable } from 'node:stream';

import Docker from 'dockerode';

import type { DockerConfig } from '../core/config/schema';
import { demultiplexToBuffer } from '../stream/frames';
import type { ContainerLogSource, FetchLogsOptions, OutputSelection } from '../stream/types';

/**
 * Create a dockerode client from configuration
 */
export function createDockerClient(config: DockerConfig = {}): Docker {
  return config.socketPath ? new Docker({ socketPath: config.socketPath }) : new Docker();
}

/**
 * Reads logs of one container through dockerode.
 *
 * Non-TTY containers only: TTY output is not multiplexed.
 *
 * @example
 * ```typescript
 * const source = DockerLogSource.fromId(createDockerClient(), started.getId());
 * await waitForLogsMatching(source, new RegexMatcher(/ready/));
 * ```
 */
export class DockerLogSource implements ContainerLogSource {
  constructor(private readonly container: Docker.Container) {}

  static fromId(docker: Docker, containerId: string): DockerLogSource {
    return new DockerLogSource(docker.getContainer(containerId));
  }

  async fetchLogs(options: FetchLogsOptions = {}): Promise<Buffer> {
    const { tail = 'all' } = options;
    const raw = await this.container.logs({
      follow: false,
      stdout: options.stdout ?? true,
      stderr: options.stderr ?? true,
      timestamps: options.timestamps ?? false,
      ...(tail === 'all' ? {} : { tail }),
      ...(options.since === undefined ? {} : { since: options.since }),
    });
    return demultiplexToBuffer(raw);
  }

  async openLogStream(options: OutputSelection = {}): Promise<Readable> {
    const stream = await this.container.logs({
      follow: true,
      tail: 0,
      stdout: options.stdout ?? true,
      stderr: options.stderr ?? true,
      timestamps: options.timestamps ?? false,
    });
    return stream instanceof Readable ? stream : new Readable().wrap(stream);
  }
}
