/**
 * Shared type exports for the budget tools server
 */

export {
  BaseError,
  ConfigurationError,
  AuthenticationError,
  NotFoundError,
  IOFailureError,
  InvalidRowError,
  RequestTimeoutError,
  RequestCancelledError,
  ValidationError,
  YNABRequestError,
} from '../utils/errors.js';

export {
  ErrorHandler,
  YNABErrorCode,
  type ErrorResponse,
  withToolErrorHandling,
} from '../server/errorHandler.js';

export {
  RequestLogger,
  globalRequestLogger,
  type LogEntry,
  type Logger,
  type LoggerConfig,
  type LogLevel,
} from '../server/requestLogger.js';

export { RequestMiddleware, withRequestWrapper, type RequestContext } from '../server/requestMiddleware.js';

export type { MCPToolAnnotations } from './toolAnnotations.js';
