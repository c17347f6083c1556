/**
 * Storage layer
 *
 * @module storage
 */

export { atomicWriteText, fileSize } from './atomic.js';
