/**
 * Rule store: the rule set model, the external script format, the built-in
 * fallback, and the compiled form the engine matches against.
 */

export * from './types.js';
export * from './schema.js';
export * from './builtin.js';
export * from './loader.js';
export * from './compile.js';
