export * from './engine.js';
export * from './events.js';
export * from './random.js';
export * from './normalizer.js';
export * from './resolver.js';
export * from './decomposer.js';
export * from './finalizer.js';
