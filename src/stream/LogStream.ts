/**
 * @fileoverview Lazy, deadline-bounded stream of container log lines
 * @module stream/LogStream
 */

import { ByteReader } from './ByteReader';
import { Deadline } from './deadline';
import { StreamClosedError } from './errors';
import { readFrame, type Frame } from './frames';
import type { ContainerLogSource, OutputSelection, StreamLogsOptions } from './types';

export const DEFAULT_TIMEOUT_MS = 10_000;

const NEWLINE = 0x0a;

/**
 * Reassembles newline-terminated lines from arbitrarily split chunks.
 *
 * Lines keep their trailing `\n` so they compare byte-for-byte with a later
 * tail request.
 */
export class LineSplitter {
  private carry: Buffer = Buffer.alloc(0);

  push(chunk: Buffer): Buffer[] {
    const data = this.carry.length > 0 ? Buffer.concat([this.carry, chunk]) : chunk;
    const lines: Buffer[] = [];
    let start = 0;

    for (let end = data.indexOf(NEWLINE); end !== -1; end = data.indexOf(NEWLINE, start)) {
      lines.push(data.subarray(start, end + 1));
      start = end + 1;
    }

    this.carry = data.subarray(start);
    return lines;
  }

  /**
   * Return an unterminated final line, if any
   */
  flush(): Buffer | null {
    if (this.carry.length === 0) {
      return null;
    }
    const rest = this.carry;
    this.carry = Buffer.alloc(0);
    return rest;
  }
}

/**
 * Split a complete blob into lines, terminators included
 */
export function splitLines(blob: Buffer): Buffer[] {
  const splitter = new LineSplitter();
  const lines = splitter.push(blob);
  const rest = splitter.flush();
  return rest ? [...lines, rest] : lines;
}

/**
 * Stream raw log lines from a container until its output closes or the
 * deadline passes.
 *
 * With `tail` other than 0, existing output is fetched first and yielded
 * before live output. The history fetch is issued right before the live
 * stream is opened; lines written between the two calls can still be missed
 * or duplicated, since the engine offers no sequence numbers to reconcile them.
 *
 * The generator cannot be restarted: after a `TimeoutError` a new call with a
 * fresh deadline is needed. The live stream is destroyed exactly once when the
 * generator finishes, throws, or is abandoned.
 *
 * @throws {LogTimeoutError} When the deadline passes before the stream closes
 *
 * @example
 * ```typescript
 * for await (const line of streamLogs(source, { timeoutMs: 5000, tail: 'all' })) {
 *   process.stdout.write(line);
 * }
 * ```
 */
export async function* streamLogs(
  source: ContainerLogSource,
  options: StreamLogsOptions = {}
): AsyncGenerator<Buffer, void, undefined> {
  const { tail = 0, logger } = options;
  const deadline = options.deadline ?? Deadline.after(options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
  const selection: OutputSelection = {
    stdout: options.stdout ?? true,
    stderr: options.stderr ?? true,
    timestamps: options.timestamps ?? false,
  };

  const history = tail === 0 ? [] : splitLines(await source.fetchLogs({ ...selection, tail }));
  const reader = new ByteReader(await source.openLogStream(selection));
  logger?.debug({ tail, historyLines: history.length }, 'Log stream opened');

  let frames = 0;
  try {
    yield* history;

    const splitter = new LineSplitter();
    for (;;) {
      let frame: Frame;
      try {
        frame = await readFrame(reader, deadline);
      } catch (error) {
        if (error instanceof StreamClosedError) {
          break;
        }
        throw error;
      }

      frames++;
      yield* splitter.push(frame.payload);
    }

    const rest = splitter.flush();
    if (rest) {
      yield rest;
    }
  } finally {
    reader.release();
    logger?.debug({ frames }, 'Log stream closed');
  }
}
