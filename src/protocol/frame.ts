/**
 * Stream Frame Encoding and Decoding
 *
 * Implements the length-prefixed protocol:
 * | length (4B, signed) | payload (length bytes, only when length > 0) |
 *
 * The length is big endian. Zero marks the end of a throughput phase (and
 * its acknowledgment); -1 terminates the session.
 */

import {
  CONTROL_LENGTHS,
  DEFAULT_MAX_FRAME_LENGTH,
  LENGTH_FIELD_SIZE,
  MAX_LENGTH_FIELD,
} from './constants.js';
import type { Frame } from '../types.js';
import { PayloadTooLargeError, ProtocolError } from '../errors.js';

/**
 * Encode a frame for transmission
 *
 * A data frame with an empty payload is indistinguishable from phase-end on
 * the wire; callers decide what that means.
 */
export function encodeFrame(frame: Frame): Buffer {
  switch (frame.kind) {
    case 'phase-end':
      return lengthOnly(CONTROL_LENGTHS.PHASE_END);
    case 'terminate':
      return lengthOnly(CONTROL_LENGTHS.TERMINATE);
    case 'data': {
      const { payload } = frame;
      if (payload.length > MAX_LENGTH_FIELD) {
        throw new PayloadTooLargeError(payload.length, MAX_LENGTH_FIELD);
      }
      const buffer = Buffer.allocUnsafe(LENGTH_FIELD_SIZE + payload.length);
      buffer.writeInt32BE(payload.length, 0);
      buffer.set(payload, LENGTH_FIELD_SIZE);
      return buffer;
    }
  }
}

function lengthOnly(length: number): Buffer {
  const buffer = Buffer.alloc(LENGTH_FIELD_SIZE);
  buffer.writeInt32BE(length, 0);
  return buffer;
}

/**
 * Extract a complete frame from the receive buffer
 *
 * @param buffer - Bytes received so far
 * @param maxFrameLength - Largest payload accepted
 * @returns Frame and the unconsumed bytes, or null if more data is needed
 */
export function extractFrame(
  buffer: Buffer,
  maxFrameLength: number = DEFAULT_MAX_FRAME_LENGTH
): { frame: Frame; remaining: Buffer } | null {
  if (buffer.length < LENGTH_FIELD_SIZE) {
    return null;
  }

  const length = buffer.readInt32BE(0);

  if (length === CONTROL_LENGTHS.PHASE_END) {
    return { frame: { kind: 'phase-end' }, remaining: buffer.subarray(LENGTH_FIELD_SIZE) };
  }
  if (length === CONTROL_LENGTHS.TERMINATE) {
    return { frame: { kind: 'terminate' }, remaining: buffer.subarray(LENGTH_FIELD_SIZE) };
  }
  if (length < 0) {
    throw new ProtocolError(`Invalid frame length: ${length}`);
  }
  if (length > maxFrameLength) {
    throw new ProtocolError(`Frame of ${length} bytes exceeds the ${maxFrameLength} byte limit`);
  }

  const totalSize = LENGTH_FIELD_SIZE + length;
  if (buffer.length < totalSize) {
    return null;
  }

  // Copy so the payload does not pin the whole receive buffer
  const payload = new Uint8Array(buffer.subarray(LENGTH_FIELD_SIZE, totalSize));
  return { frame: { kind: 'data', payload }, remaining: buffer.subarray(totalSize) };
}

/**
 * Number of payload bytes a partially received frame still misses
 */
export function pendingFrameBytes(buffer: Buffer): { expected: number; received: number } | null {
  if (buffer.length === 0) {
    return null;
  }
  if (buffer.length < LENGTH_FIELD_SIZE) {
    return { expected: LENGTH_FIELD_SIZE, received: buffer.length };
  }
  const length = buffer.readInt32BE(0);
  return { expected: length, received: buffer.length - LENGTH_FIELD_SIZE };
}
