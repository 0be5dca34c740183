/**
 * @fileoverview Log source collaborator contract and stream options
 * @module stream/types
 */

import type { Readable } from 'node:stream';
import type { Logger } from 'pino';

import type { Deadline } from './deadline';

/**
 * How much historical output to include: a line count or everything
 */
export type TailOption = number | 'all';

/**
 * Which output streams to read
 */
export interface OutputSelection {
  /** Include stdout (default true) */
  stdout?: boolean;
  /** Include stderr (default true) */
  stderr?: boolean;
  /** Prefix each line with the engine's timestamp */
  timestamps?: boolean;
}

/**
 * Options for a non-streaming log fetch
 */
export interface FetchLogsOptions extends OutputSelection {
  tail?: TailOption;
  /** Only output after this UNIX timestamp (seconds) */
  since?: number;
}

/**
 * Anything that can hand out a container's output.
 *
 * Implementations must expose the raw multiplexed live stream directly; the
 * stream layer owns and destroys whatever `openLogStream` returns.
 */
export interface ContainerLogSource {
  /**
   * Fetch existing output as plain (demultiplexed) bytes
   */
  fetchLogs(options?: FetchLogsOptions): Promise<Buffer>;

  /**
   * Open a raw multiplexed stream of output produced from now on
   */
  openLogStream(options?: OutputSelection): Promise<Readable>;
}

/**
 * Options for {@link streamLogs}
 */
export interface StreamLogsOptions extends OutputSelection {
  /** Overall budget in milliseconds (default 10000); ignored when `deadline` is given */
  timeoutMs?: number;
  /** Deadline shared with an enclosing operation */
  deadline?: Deadline;
  /** Replay this much history before live output (default 0: live only) */
  tail?: TailOption;
  /** Optional logger for stream lifecycle events */
  logger?: Logger;
}
