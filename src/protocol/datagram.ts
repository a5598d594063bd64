/**
 * Datagram message handling
 *
 * Each datagram is one whole message; boundaries come from the transport.
 * The termination marker travels in the clear and is checked before any
 * decryption.
 */

import { equalBytes, utf8ToBytes } from '@noble/ciphers/utils.js';
import { MAX_DATAGRAM_SIZE, TERMINATION_MARKER } from './constants.js';
import { PayloadTooLargeError } from '../errors.js';

/** Marker bytes ending a datagram session */
export const TERMINATION_MARKER_BYTES: Uint8Array = utf8ToBytes(TERMINATION_MARKER);

/**
 * Check whether a raw datagram is the termination marker
 */
export function isTerminationMarker(data: Uint8Array): boolean {
  return data.length === TERMINATION_MARKER_BYTES.length && equalBytes(data, TERMINATION_MARKER_BYTES);
}

/**
 * Reject payloads the receiver's buffer cannot hold
 */
export function assertDatagramSize(payload: Uint8Array, limit: number = MAX_DATAGRAM_SIZE): void {
  if (payload.length > limit) {
    throw new PayloadTooLargeError(payload.length, limit);
  }
}

/**
 * Clip an inbound datagram to the receive buffer size
 */
export function clipDatagram(data: Uint8Array, limit: number = MAX_DATAGRAM_SIZE): Uint8Array {
  return data.length > limit ? data.subarray(0, limit) : data;
}
