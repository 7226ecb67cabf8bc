/**
 * Main type exports for the inference engine
 */

export * from './inference.js';
export * from './regression.js';
export * from './plot.js';
