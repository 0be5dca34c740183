/**
 * @fileoverview Test setup and global utilities
 * @module tests/setup
 */

import pino, { type Logger } from 'pino';

/**
 * Helper to create a silent test logger
 */
export function createTestLogger(): Logger {
  return pino({ level: 'silent' });
}

/**
 * Drain a line stream into decoded strings
 */
export async function collectLines(lines: AsyncIterable<Buffer>): Promise<string[]> {
  const result: string[] = [];
  for await (const line of lines) {
    result.push(line.toString('utf8'));
  }
  return result;
}

/**
 * Drain a line stream into `into`, so lines received before a failure stay visible
 */
export async function collectInto(lines: AsyncIterable<Buffer>, into: string[]): Promise<void> {
  for await (const line of lines) {
    into.push(line.toString('utf8'));
  }
}

/**
 * Whether Docker-backed tests should run
 */
export const useTestcontainers = process.env.USE_TESTCONTAINERS === 'true';
