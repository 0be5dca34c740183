/**
 * @fileoverview Docker multiplexed stream framing
 * @module stream/frames
 *
 * Non-TTY container output is multiplexed into frames:
 *   1 byte  - stream type (0=stdin, 1=stdout, 2=stderr)
 *   3 bytes - padding (0x00 0x00 0x00)
 *   4 bytes - payload length (big-endian uint32)
 *   N bytes - payload
 */

import type { ByteReader } from './ByteReader';
import type { Deadline } from './deadline';

export const FRAME_HEADER_SIZE = 8;

/**
 * Stream a frame was written to
 */
export enum StreamType {
  Stdin = 0,
  Stdout = 1,
  Stderr = 2,
}

/**
 * One complete frame
 */
export interface Frame {
  /** Informational; stdout/stderr selection happens when the stream is opened */
  stream: number;
  payload: Buffer;
}

/**
 * Parse a frame header, returning the stream id and payload length
 */
export function parseFrameHeader(header: Buffer): { stream: number; length: number } {
  if (header.length !== FRAME_HEADER_SIZE) {
    throw new RangeError(`Frame header must be ${FRAME_HEADER_SIZE} bytes, got ${header.length}`);
  }
  return {
    stream: header.readUInt8(0),
    length: header.readUInt32BE(4),
  };
}

/**
 * Read one frame: the 8-byte header then exactly the declared payload.
 *
 * A `StreamClosedError` while reading the header is the normal end of the
 * stream and is left for the caller to handle.
 */
export async function readFrame(reader: ByteReader, deadline: Deadline): Promise<Frame> {
  const header = await reader.readExactly(FRAME_HEADER_SIZE, deadline);
  const { stream, length } = parseFrameHeader(header);
  const payload = await reader.readExactly(length, deadline);
  return { stream, payload };
}

/**
 * Build a multiplexed frame around a payload
 */
export function encodeFrame(payload: Buffer | string, stream: number = StreamType.Stdout): Buffer {
  const body = typeof payload === 'string' ? Buffer.from(payload, 'utf8') : payload;
  const header = Buffer.alloc(FRAME_HEADER_SIZE);
  header.writeUInt8(stream, 0);
  header.writeUInt32BE(body.length, 4);
  return Buffer.concat([header, body]);
}

/**
 * Split a complete multiplexed blob (a non-streaming log response) into frames.
 *
 * A truncated trailing frame is returned as raw stdout rather than dropped.
 */
export function demultiplex(buffer: Buffer): Frame[] {
  const frames: Frame[] = [];
  let offset = 0;

  while (offset < buffer.length) {
    if (offset + FRAME_HEADER_SIZE > buffer.length) {
      frames.push({ stream: StreamType.Stdout, payload: buffer.subarray(offset) });
      break;
    }

    const { stream, length } = parseFrameHeader(buffer.subarray(offset, offset + FRAME_HEADER_SIZE));
    const start = offset + FRAME_HEADER_SIZE;
    const end = start + length;

    if (end > buffer.length) {
      frames.push({ stream: StreamType.Stdout, payload: buffer.subarray(start) });
      break;
    }

    frames.push({ stream, payload: buffer.subarray(start, end) });
    offset = end;
  }

  return frames;
}

/**
 * Concatenate the payloads of a multiplexed blob
 */
export function demultiplexToBuffer(buffer: Buffer): Buffer {
  return Buffer.concat(demultiplex(buffer).map((frame) => frame.payload));
}
