/**
 * parley - rule-driven conversational response engine.
 */

export * from './engine/index.js';
export * from './memory/index.js';
export * from './script/index.js';
