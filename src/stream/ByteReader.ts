/**
 * @fileoverview Deadline-bounded exact-length reads over a Node.js readable stream
 * @module stream/ByteReader
 */

import type { Readable } from 'node:stream';

import type { Deadline } from './deadline';
import { LogTimeoutError, StreamClosedError } from './errors';

/**
 * Outcome of a single bounded wait for more data
 */
export type WaitOutcome =
  | { kind: 'readable' }
  | { kind: 'closed' }
  | { kind: 'timed-out' }
  | { kind: 'failed'; error: Error };

/**
 * Reads exact byte counts from a paused `Readable`, giving up once a
 * {@link Deadline} passes.
 *
 * Every wait for more data races the stream's events against a watchdog timer
 * armed with the remaining budget. The wait settles with a {@link WaitOutcome}
 * rather than a shared flag, and all listeners and the timer are removed on
 * every outcome.
 *
 * One reader owns its stream for the duration of one streaming operation.
 * Bytes read past a requested length are kept for the next call. A stream
 * error raised while no read is pending surfaces from the next read.
 *
 * @example
 * ```typescript
 * const reader = new ByteReader(socket);
 * try {
 *   const header = await reader.readExactly(8, Deadline.after(5000));
 * } finally {
 *   reader.release();
 * }
 * ```
 */
export class ByteReader {
  private chunks: Buffer[] = [];
  private buffered = 0;
  private closed = false;
  private released = false;
  private readonly ignoreError = (): void => {};

  constructor(private readonly source: Readable) {
    // Errors between reads are kept in `source.errored` and raised by the next read.
    source.on('error', this.ignoreError);
  }

  /**
   * Read exactly `length` bytes.
   *
   * @throws {StreamClosedError} The stream ended before `length` bytes arrived
   * @throws {LogTimeoutError} The deadline passed first
   */
  async readExactly(length: number, deadline: Deadline): Promise<Buffer> {
    while (this.buffered < length) {
      this.pull();
      if (this.buffered >= length) {
        break;
      }

      if (this.source.errored) {
        throw this.source.errored;
      }
      // A stream that has finished wins over a deadline that expired at the same time.
      if (this.isClosed()) {
        throw new StreamClosedError(this.buffered, length);
      }
      if (deadline.hasExpired()) {
        throw new LogTimeoutError('Timeout waiting for container logs.', {
          timeoutMs: deadline.timeoutMs,
        });
      }

      const outcome = await this.waitForData(deadline);
      switch (outcome.kind) {
        case 'closed':
          this.closed = true;
          break;
        case 'failed':
          throw outcome.error;
        case 'readable':
        case 'timed-out':
          // Re-checked at the top of the loop; a timer that fires early just waits again.
          break;
      }
    }

    return this.take(length);
  }

  /**
   * Number of bytes received but not yet handed out
   */
  get pending(): number {
    return this.buffered;
  }

  /**
   * Destroy the underlying stream. Safe to call more than once.
   */
  release(): void {
    if (this.released) {
      return;
    }
    this.released = true;
    this.chunks = [];
    this.buffered = 0;
    if (!this.source.destroyed) {
      this.source.destroy();
    }
    // A pending 'error' event is emitted before 'close', so detach only after it.
    this.source.once('close', () => this.source.off('error', this.ignoreError));
  }

  /**
   * Move everything the stream has buffered into our own chunk list
   */
  private pull(): void {
    for (;;) {
      const chunk: unknown = this.source.read();
      if (chunk === null || chunk === undefined) {
        return;
      }
      const bytes = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      if (bytes.length > 0) {
        this.chunks.push(bytes);
        this.buffered += bytes.length;
      }
    }
  }

  private take(length: number): Buffer {
    if (length === 0) {
      return Buffer.alloc(0);
    }

    const joined = this.chunks.length === 1 && this.chunks[0] ? this.chunks[0] : Buffer.concat(this.chunks);
    const result = joined.subarray(0, length);
    const rest = joined.subarray(length);

    this.chunks = rest.length > 0 ? [rest] : [];
    this.buffered = rest.length;
    return result;
  }

  private isClosed(): boolean {
    return this.closed || this.released || this.source.readableEnded || this.source.destroyed;
  }

  private waitForData(deadline: Deadline): Promise<WaitOutcome> {
    const source = this.source;

    if (source.errored) {
      return Promise.resolve({ kind: 'failed', error: source.errored });
    }

    return new Promise<WaitOutcome>((resolve) => {
      const settle = (outcome: WaitOutcome): void => {
        clearTimeout(watchdog);
        source.off('readable', onReadable);
        source.off('end', onClosed);
        source.off('close', onClosed);
        source.off('error', onError);
        resolve(outcome);
      };

      const onReadable = (): void => settle({ kind: 'readable' });
      const onClosed = (): void => settle({ kind: 'closed' });
      const onError = (error: Error): void => settle({ kind: 'failed', error });

      const watchdog = setTimeout(() => {
        settle(source.readableEnded || source.destroyed ? { kind: 'closed' } : { kind: 'timed-out' });
      }, deadline.remaining());

      source.on('readable', onReadable);
      source.once('end', onClosed);
      source.once('close', onClosed);
      source.once('error', onError);
    });
  }
}
