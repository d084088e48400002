export { createConsoleLogger, noopLogger } from './console-logger.js';
