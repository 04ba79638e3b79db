import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import {
  AuthenticationError,
  ConfigurationError,
  IOFailureError,
  InvalidRowError,
  NotFoundError,
  RequestCancelledError,
  RequestTimeoutError,
  ValidationError,
  YNABRequestError,
} from '../utils/errors.js';
import { globalRequestLogger, type Logger } from './requestLogger.js';
import { responseFormatter } from './responseFormatter.js';

/**
 * HTTP statuses returned by the YNAB API that get a dedicated message
 */
export enum YNABErrorCode {
  BAD_REQUEST = 400,
  UNAUTHORIZED = 401,
  FORBIDDEN = 403,
  NOT_FOUND = 404,
  CONFLICT = 409,
  TOO_MANY_REQUESTS = 429,
  INTERNAL_SERVER_ERROR = 500,
}

export type LocalErrorCode =
  | 'VALIDATION_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'AUTHENTICATION_ERROR'
  | 'NOT_FOUND'
  | 'IO_FAILURE'
  | 'TIMEOUT'
  | 'CANCELLED'
  | 'UNKNOWN_ERROR';

export interface ErrorResponse {
  error: {
    code: YNABErrorCode | LocalErrorCode;
    message: string;
    details?: string;
    suggestions?: string[];
  };
}

const YNAB_ERROR_MESSAGES: Record<YNABErrorCode, string> = {
  [YNABErrorCode.BAD_REQUEST]: 'Invalid request parameters',
  [YNABErrorCode.UNAUTHORIZED]: 'Invalid or expired YNAB access token',
  [YNABErrorCode.FORBIDDEN]: 'Insufficient permissions to access YNAB data',
  [YNABErrorCode.NOT_FOUND]: 'The requested YNAB resource was not found',
  [YNABErrorCode.CONFLICT]: 'Conflict with existing YNAB data',
  [YNABErrorCode.TOO_MANY_REQUESTS]: 'Rate limit exceeded. Please wait before trying again',
  [YNABErrorCode.INTERNAL_SERVER_ERROR]: 'YNAB service is currently unavailable',
};

const KNOWN_STATUSES = Object.keys(YNAB_ERROR_MESSAGES).map(Number);

function isYNABErrorCode(status: number): status is YNABErrorCode {
  return KNOWN_STATUSES.includes(status);
}

export interface Formatter {
  format(value: unknown): string;
}

/**
 * The ynab client rejects with the parsed API error body rather than an Error:
 * `{ error: { id: '404.2', name: 'resource_not_found', detail: '...' } }`
 */
function extractYnabErrorBody(
  error: unknown,
): { status: number; name: string; detail: string } | undefined {
  if (typeof error !== 'object' || error === null || !('error' in error)) {
    return undefined;
  }
  const body: unknown = error.error;
  if (typeof body !== 'object' || body === null) {
    return undefined;
  }
  const id = 'id' in body && typeof body.id === 'string' ? body.id : '';
  const status = Number.parseInt(id, 10);
  if (Number.isNaN(status)) {
    return undefined;
  }
  return {
    status: status >= 500 ? YNABErrorCode.INTERNAL_SERVER_ERROR : status,
    name: 'name' in body && typeof body.name === 'string' ? body.name : 'unknown',
    detail: 'detail' in body && typeof body.detail === 'string' ? body.detail : '',
  };
}

function statusFromMessage(message: string): YNABErrorCode | undefined {
  const match = /\b(400|401|403|404|409|429|5\d\d)\b/.exec(message);
  if (!match?.[1]) return undefined;
  const status = Number(match[1]);
  if (status >= 500) return YNABErrorCode.INTERNAL_SERVER_ERROR;
  return isYNABErrorCode(status) ? status : undefined;
}

/**
 * Converts anything thrown by a tool into an MCP error result
 */
export class ErrorHandler {
  constructor(
    private readonly formatter: Formatter = responseFormatter,
    private readonly logger: Logger = globalRequestLogger,
  ) {}

  handleError(error: unknown, context: string): CallToolResult {
    const response = this.toErrorResponse(error, context);
    this.logger.warn(`Error ${context}`, {
      code: response.error.code,
      error: error instanceof Error ? error.message : String(error),
    });
    return this.toResult(response);
  }

  createValidationError(message: string, details?: string, suggestions?: string[]): CallToolResult {
    return this.toResult({
      error: {
        code: 'VALIDATION_ERROR',
        message,
        ...(details !== undefined ? { details } : {}),
        ...(suggestions !== undefined ? { suggestions } : {}),
      },
    });
  }

  toErrorResponse(error: unknown, context: string): ErrorResponse {
    if (error instanceof ValidationError) {
      return {
        error: {
          code: 'VALIDATION_ERROR',
          message: error.message,
          ...(error.details !== undefined ? { details: error.details } : {}),
          ...(error.suggestions !== undefined ? { suggestions: error.suggestions } : {}),
        },
      };
    }
    if (error instanceof InvalidRowError) {
      return { error: { code: 'VALIDATION_ERROR', message: error.message } };
    }
    if (error instanceof ConfigurationError) {
      return { error: { code: 'CONFIGURATION_ERROR', message: error.message } };
    }
    if (error instanceof AuthenticationError) {
      return { error: { code: 'AUTHENTICATION_ERROR', message: error.message } };
    }
    if (error instanceof NotFoundError) {
      return { error: { code: 'NOT_FOUND', message: error.message } };
    }
    if (error instanceof IOFailureError) {
      return {
        error: {
          code: 'IO_FAILURE',
          message: `Local storage failure while ${context}`,
          details: error.message,
        },
      };
    }
    if (error instanceof RequestTimeoutError) {
      return { error: { code: 'TIMEOUT', message: error.message } };
    }
    if (error instanceof RequestCancelledError) {
      return { error: { code: 'CANCELLED', message: error.message } };
    }
    if (error instanceof YNABRequestError) {
      return this.ynabResponse(error.status, error.message);
    }

    const body = extractYnabErrorBody(error);
    if (body) {
      return this.ynabResponse(body.status, body.detail || body.name);
    }

    if (error instanceof Error) {
      const status = statusFromMessage(error.message);
      if (status !== undefined) {
        return this.ynabResponse(status, error.message);
      }
      return {
        error: { code: 'UNKNOWN_ERROR', message: `Error ${context}`, details: error.message },
      };
    }

    return {
      error: { code: 'UNKNOWN_ERROR', message: `Error ${context}`, details: String(error) },
    };
  }

  private ynabResponse(status: number, details: string): ErrorResponse {
    if (isYNABErrorCode(status)) {
      return { error: { code: status, message: YNAB_ERROR_MESSAGES[status], details } };
    }
    return { error: { code: 'UNKNOWN_ERROR', message: `YNAB API error ${status}`, details } };
  }

  private toResult(response: ErrorResponse): CallToolResult {
    return {
      isError: true,
      content: [{ type: 'text', text: this.formatter.format(response) }],
    };
  }
}

export function createErrorHandler(formatter: Formatter = responseFormatter): ErrorHandler {
  return new ErrorHandler(formatter);
}

const defaultErrorHandler = new ErrorHandler();

/**
 * Runs a tool body, turning any thrown error into an error result
 *
 * @param toolName - used in the log record, e.g. `ynab:get_accounts`
 * @param operation - gerund phrase for messages, e.g. `listing accounts`
 */
export async function withToolErrorHandling(
  fn: () => Promise<CallToolResult>,
  toolName: string,
  operation: string,
): Promise<CallToolResult> {
  try {
    return await fn();
  } catch (error) {
    return defaultErrorHandler.handleError(error, `${operation} (${toolName})`);
  }
}
