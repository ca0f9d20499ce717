export { createLogger, logCheck, CHECK_LEVEL } from './logger.js';
export type { AppLogger } from './logger.js';
