export * from './schema/index.js';
export * from './engine/spatial/index.js';
export { MapFormatError, PreconditionError } from './engine/errors.js';
export {
    createLogger,
    createTimer,
    logger,
    resetLogLevel,
    setLogLevel,
    type LogFields,
    type LogLevel,
    type Logger
} from './utils/logger.js';
