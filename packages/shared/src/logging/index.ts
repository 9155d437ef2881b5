/**
 * Logging and error handling
 */

export * from './types';
export { ConsoleLogger } from './console-logger';
export {
  registerErrorHandler,
  unregisterErrorHandler,
  handleError,
  type ErrorHandlerOptions,
} from './error-handler';
