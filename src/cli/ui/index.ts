export { Logger, logger, type LoggerOptions } from './logger.js';
export { Spinner, specialistLabel } from './spinner.js';
