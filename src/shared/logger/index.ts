export * from './logger.js';
export * from './init-logger.js';
