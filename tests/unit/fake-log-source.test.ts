/**
 * @fileoverview Checks that the fake log source behaves like the Docker API
 * @module tests/unit/fake-log-source
 */

import { performance } from 'node:perf_hooks';

import { afterEach, describe, it, expect } from 'vitest';

import { streamLogs } from '../../src/stream/LogStream';
import { FakeLogSource, type FakeLogItem } from '../fakes/FakeLogSource';
import { collectLines } from '../setup';

describe('unit: FakeLogSource', () => {
  const sources: FakeLogSource[] = [];

  const mkSource = (items: FakeLogItem[]): FakeLogSource => {
    const source = new FakeLogSource(items, { closeDelayMs: 10 });
    sources.push(source);
    return source;
  };

  const tail = async (source: FakeLogSource, lines: number | 'all'): Promise<string> =>
    (await source.fetchLogs({ tail: lines })).toString();

  afterEach(() => {
    while (sources.length > 0) {
      sources.pop()?.cleanup();
    }
  });

  it('has nothing to tail before anything was streamed', async () => {
    const source = mkSource([]);

    expect(await collectLines(streamLogs(source))).toEqual([]);
    expect(await tail(source, 1)).toBe('');
  });

  it('only tails lines that have been streamed', async () => {
    const source = mkSource([
      [0, 'hello\n'],
      [0, 'goodbye\n'],
    ]);

    expect(await tail(source, 2)).toBe('');
    expect(await collectLines(streamLogs(source))).toEqual(['hello\n', 'goodbye\n']);
    expect(await tail(source, 2)).toBe('hello\ngoodbye\n');
  });

  it('tails the last N lines, or everything', async () => {
    const source = mkSource([
      [0, 'hello\n'],
      [0, 'goodbye\n'],
    ]);
    await collectLines(streamLogs(source));

    expect(await tail(source, 0)).toBe('');
    expect(await tail(source, 1)).toBe('goodbye\n');
    expect(await tail(source, 2)).toBe('hello\ngoodbye\n');
    expect(await tail(source, 3)).toBe('hello\ngoodbye\n');
    expect(await tail(source, 'all')).toBe('hello\ngoodbye\n');
    expect((await source.fetchLogs()).toString()).toBe('hello\ngoodbye\n');
  });

  it('emits items at their intervals and does not stream them again', async () => {
    const source = mkSource([
      [50, 'hello\n'],
      [100, 'goodbye\n'],
    ]);

    const t0 = performance.now();
    expect(await collectLines(streamLogs(source))).toEqual(['hello\n', 'goodbye\n']);
    const t1 = performance.now();
    expect(await collectLines(streamLogs(source))).toEqual([]);
    const t2 = performance.now();

    expect(t1 - t0).toBeGreaterThanOrEqual(140);
    expect(t2 - t1).toBeLessThan(140);
  });
});
