export { loadConfig, parseEndpoint, type StoreConfig, type StoreConfigInput } from './config.js';
export { logger, createLogger } from './logger.js';
export { generateId, dateToTimestamp, timestampToDate } from './helpers.js';
export { sanitizeCollectionName } from './sanitize.js';
