export {
  createLogger,
  getLogger,
  setLogger,
  isLevelEnabled,
  type Logger,
  type LoggerOptions,
} from './logger.js';
