// Main exports for the timeseries-compressor package

// Compressor core
export * from './compressor/index.js';

// Configuration file loading
export { loadConfig, loadConfigFile, parseDuration } from './config/loader.js';
export type { ConfigFile, LoadConfigOptions } from './config/loader.js';

// Utils
export { logger } from './utils/logger.js';
export { createSemaphore } from './utils/concurrency.js';
export type { Semaphore } from './utils/concurrency.js';
export * from './utils/errors.js';
