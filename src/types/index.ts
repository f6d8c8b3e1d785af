/**
 * Type Exports
 */

export * from './node.js';
export * from './edge.js';
export * from './experience.js';
export * from './route.js';
export * from './results.js';
