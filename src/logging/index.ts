export { createLogger, type FactoryLogEvent, type FactoryLogger, type LogLevel } from './logger.js';
