export * from './id-generator.js';
export * from './time.js';
export * from './logger.js';
export * from './keywords.js';
export * from './validation.js';
