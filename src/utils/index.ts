export { logger, createLogger } from './logger.js';
