/**
 * Protocol module exports
 */

export * from './constants.js';
export { encodeFrame, extractFrame, pendingFrameBytes } from './frame.js';
export {
  TERMINATION_MARKER_BYTES,
  isTerminationMarker,
  assertDatagramSize,
  clipDatagram,
} from './datagram.js';
