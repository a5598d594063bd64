/**
 * Echo Protocol Constants
 */

/** Default TCP and UDP port */
export const DEFAULT_PORT = 26881;

/** Initial key shared by both endpoints */
export const DEFAULT_SEED = 123456789n;

/** Size of the stream length prefix (signed 32-bit, big endian) */
export const LENGTH_FIELD_SIZE = 4;

/** Largest length the prefix can carry */
export const MAX_LENGTH_FIELD = 0x7fffffff;

/** Length values reserved for control frames */
export const CONTROL_LENGTHS = {
  PHASE_END: 0,
  TERMINATE: -1,
} as const;

/** Default cap on inbound stream frame payloads (16 MiB) */
export const DEFAULT_MAX_FRAME_LENGTH = 16 * 1024 * 1024;

/** Datagram receive buffer size */
export const MAX_DATAGRAM_SIZE = 1024;

/** Unencrypted datagram that ends a session */
export const TERMINATION_MARKER = 'END_OF_MESSAGES';

/** Default timeouts in milliseconds */
export const DEFAULT_TIMEOUTS = {
  CONNECT: 5000,
  READ: 10000,
  /** How long a graceful close may take before the socket is destroyed */
  CLOSE_GRACE: 1000,
} as const;

/** Filler bytes for throughput payloads */
export const FILL_BYTES = {
  stream: 0x00,
  datagram: 0x78, // 'x'
} as const;
