/**
 * @fileoverview Log streaming core exports
 * @module stream
 */

export { ByteReader, type WaitOutcome } from './ByteReader';
export { Deadline, MIN_WAIT_MS } from './deadline';
export {
  DocksideError,
  StreamClosedError,
  LogTimeoutError,
  LogsNotFoundError,
  MatcherExhaustedError,
  isTimeoutError,
} from './errors';
export {
  FRAME_HEADER_SIZE,
  StreamType,
  parseFrameHeader,
  readFrame,
  encodeFrame,
  demultiplex,
  demultiplexToBuffer,
  type Frame,
} from './frames';
export { streamLogs, splitLines, LineSplitter, DEFAULT_TIMEOUT_MS } from './LogStream';
export {
  StreamMatcher,
  EqualsMatcher,
  RegexMatcher,
  CombinationMatcher,
  OrderedMatcher,
  UnorderedMatcher,
  toMatcher,
  type LogMatcher,
  type CombinationState,
} from './matchers';
export { waitForLogsMatching, type WaitForLogsOptions } from './waitForLogs';
export type {
  ContainerLogSource,
  FetchLogsOptions,
  OutputSelection,
  StreamLogsOptions,
  TailOption,
} from './types';
