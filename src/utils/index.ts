export { delay, abortableDelay } from './delay.js';
export { createLogger, createSilentLogger, type LoggerOptions } from './logger.js';
export { ConcurrencyLimiter, mapWithLimiter } from './concurrency.js';
export {
  MAX_PORTS_PER_HOST,
  isValidIp,
  isValidHostname,
  isValidPort,
  parsePorts,
  parseHostPort,
  sanitizeHostname,
  parseHostList,
  buildTargets,
  uniqueTargets,
  assertValidTargets,
  formatHostKey,
} from './targets.js';
export { formatResponseTime, truncate, elapsedSince } from './format.js';
