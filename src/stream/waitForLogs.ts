/**
 * @fileoverview Wait until a matcher is satisfied by a container's log output
 * @module stream/waitForLogs
 */

import type { Logger } from 'pino';

import { getConfig } from '../core/config';
import { getLogger } from '../core/instrumentation/logger';
import { getTracer, withTracing } from '../core/instrumentation/tracing';
import { Deadline } from './deadline';
import { LogTimeoutError, LogsNotFoundError } from './errors';
import { streamLogs } from './LogStream';
import type { LogMatcher } from './matchers';
import type { ContainerLogSource, OutputSelection, TailOption } from './types';

/**
 * Options for {@link waitForLogsMatching}
 */
export interface WaitForLogsOptions extends OutputSelection {
  /** Overall budget in milliseconds (default from `DOCKSIDE_WAIT_TIMEOUT_MS`) */
  timeoutMs?: number;
  /** Encoding used to decode each line (default from `DOCKSIDE_LOG_ENCODING`) */
  encoding?: BufferEncoding;
  /** History to replay before live output (default 0) */
  tail?: TailOption;
  /** Recent lines attached to failure messages (default from `DOCKSIDE_TAIL_LINES`) */
  diagnosticTailLines?: number;
  logger?: Logger;
}

/**
 * Fetch recent output for an error message. Never throws: a failure here
 * must not replace the error being reported.
 */
async function lastFewLogLines(
  source: ContainerLogSource,
  selection: OutputSelection,
  maxLines: number,
  encoding: BufferEncoding,
  logger: Logger
): Promise<string> {
  try {
    const logs = await source.fetchLogs({ ...selection, tail: maxLines });
    return logs.toString(encoding);
  } catch (error) {
    logger.warn({ err: error }, 'Failed to fetch recent log lines for diagnostics');
    return `<unavailable: ${error instanceof Error ? error.message : String(error)}>`;
  }
}

/**
 * Wait for matching log line(s) by streaming a container's stdout and/or
 * stderr.
 *
 * Each line is decoded and stripped of trailing whitespace before it is
 * passed to the matcher. Returns the line on which the matcher reported a
 * full match; nothing after it is consumed.
 *
 * @throws {LogTimeoutError} The timeout passed before a match
 * @throws {LogsNotFoundError} The output ended (the container stopped)
 *   without a match
 *
 * @example
 * ```typescript
 * const line = await waitForLogsMatching(
 *   source,
 *   UnorderedMatcher.byRegex(/ready to accept connections/, /listening on port/),
 *   { timeoutMs: 30_000 }
 * );
 * ```
 */
export async function waitForLogsMatching(
  source: ContainerLogSource,
  matcher: LogMatcher,
  options: WaitForLogsOptions = {}
): Promise<string> {
  const defaults = getConfig().logs;
  const timeoutMs = options.timeoutMs ?? defaults.waitTimeoutMs;
  const encoding = options.encoding ?? defaults.encoding;
  const tailLines = options.diagnosticTailLines ?? defaults.diagnosticTailLines;
  const logger = options.logger ?? getLogger();
  const selection: OutputSelection = {
    stdout: options.stdout ?? true,
    stderr: options.stderr ?? true,
    timestamps: options.timestamps ?? false,
  };

  return withTracing(
    getTracer(),
    'logs.waitForMatch',
    async (span) => {
      const deadline = Deadline.after(timeoutMs);
      let seen = 0;

      try {
        for await (const raw of streamLogs(source, { ...selection, tail: options.tail ?? 0, deadline, logger })) {
          seen++;
          const line = raw.toString(encoding).trimEnd();
          if (matcher.match(line)) {
            span.setAttribute('logs.lines_seen', seen);
            logger.debug({ matcher: String(matcher), linesSeen: seen }, 'Log match found');
            return line;
          }
        }
      } catch (error) {
        if (!(error instanceof LogTimeoutError)) {
          throw error;
        }
        const lastLines = await lastFewLogLines(source, selection, tailLines, encoding, logger);
        throw new LogTimeoutError(
          [`Timeout (${timeoutMs}ms) waiting for logs matching ${String(matcher)}.`, 'Last few log lines:', lastLines].join(
            '\n'
          ),
          { timeoutMs, matcher: String(matcher), linesSeen: seen, lastLines }
        );
      }

      const lastLines = await lastFewLogLines(source, selection, tailLines, encoding, logger);
      throw new LogsNotFoundError(
        [`Logs matching ${String(matcher)} not found.`, 'Last few log lines:', lastLines].join('\n'),
        { matcher: String(matcher), linesSeen: seen, lastLines }
      );
    },
    { 'logs.timeout_ms': timeoutMs }
  );
}
