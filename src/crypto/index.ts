/**
 * Keystream module exports
 */

export { KeyStream, advanceKey, transform } from './keystream.js';
