/**
 * Short-term memory: statements containing "my" are queued and can be
 * brought back up when a later turn matches no keyword.
 */

export * from './queue.js';
export * from './adapt.js';
