export { logger, configureLogger } from './logger.js';
export * from './errors.js';
export { toJsonValue, type JsonValue } from './json.js';
