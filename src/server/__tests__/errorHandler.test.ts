import { describe, it, expect } from 'vitest';
import { ErrorHandler, YNABErrorCode, withToolErrorHandling } from '../errorHandler.js';
import { ResponseFormatter } from '../responseFormatter.js';
import {
  IOFailureError,
  InvalidRowError,
  NotFoundError,
  RequestCancelledError,
  RequestTimeoutError,
  ValidationError,
  YNABRequestError,
} from '../../utils/errors.js';
import { createMockLogger, parseErrorResult, ynabErrorBody } from '../../__tests__/testUtils.js';

describe('ErrorHandler', () => {
  const createHandler = () => {
    const logger = createMockLogger();
    return { logger, handler: new ErrorHandler(new ResponseFormatter(), logger) };
  };

  it('reports validation errors with details and suggestions', () => {
    const { handler } = createHandler();
    const response = handler.toErrorResponse(
      new ValidationError('Bad input', 'budget_id is empty', ['Pass a budget id']),
      'listing accounts',
    );

    expect(response).toEqual({
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Bad input',
        details: 'budget_id is empty',
        suggestions: ['Pass a budget id'],
      },
    });
  });

  it('maps the YNAB error body to the status message', () => {
    const { handler } = createHandler();
    const response = handler.toErrorResponse(
      ynabErrorBody('404.2', 'resource_not_found', 'Account not found'),
      'getting account balance',
    );

    expect(response).toEqual({
      error: {
        code: YNABErrorCode.NOT_FOUND,
        message: 'The requested YNAB resource was not found',
        details: 'Account not found',
      },
    });
  });

  it('folds 5xx bodies into the service unavailable message', () => {
    const { handler } = createHandler();
    const response = handler.toErrorResponse(
      ynabErrorBody('503', 'service_unavailable', ''),
      'listing budgets',
    );

    expect(response.error.code).toBe(500);
    expect(response.error.message).toBe('YNAB service is currently unavailable');
    expect(response.error.details).toBe('service_unavailable');
  });

  it('recognizes status codes in error messages', () => {
    const { handler } = createHandler();
    const response = handler.toErrorResponse(
      new Error('Request failed with status 429'),
      'listing budgets',
    );

    expect(response.error.code).toBe(YNABErrorCode.TOO_MANY_REQUESTS);
    expect(response.error.message).toBe('Rate limit exceeded. Please wait before trying again');
  });

  it('maps YNABRequestError by status', () => {
    const { handler } = createHandler();
    const response = handler.toErrorResponse(
      new YNABRequestError(401, 'Unauthorized'),
      'listing budgets',
    );

    expect(response.error).toEqual({
      code: 401,
      message: 'Invalid or expired YNAB access token',
      details: 'YNAB API request failed: 401 Unauthorized',
    });
  });

  it('maps local failures to their codes', () => {
    const { handler } = createHandler();

    expect(handler.toErrorResponse(new NotFoundError('No budgets'), 'x').error).toEqual({
      code: 'NOT_FOUND',
      message: 'No budgets',
    });
    expect(handler.toErrorResponse(new RequestTimeoutError(100), 'x').error).toEqual({
      code: 'TIMEOUT',
      message: 'YNAB request timed out after 100ms',
    });
    expect(handler.toErrorResponse(new RequestCancelledError(), 'x').error.code).toBe('CANCELLED');
    expect(handler.toErrorResponse(new InvalidRowError(0, 2, 1), 'x').error).toEqual({
      code: 'VALIDATION_ERROR',
      message: 'Row 0 has 1 cells, expected 2',
    });
  });

  it('describes storage failures with the operation context', () => {
    const { handler } = createHandler();
    const response = handler.toErrorResponse(
      new IOFailureError('/tmp/cache.json', 'write', new Error('EACCES')),
      'caching categories',
    );

    expect(response.error).toEqual({
      code: 'IO_FAILURE',
      message: 'Local storage failure while caching categories',
      details: 'Failed to write /tmp/cache.json: EACCES',
    });
  });

  it('falls back to an unknown error carrying the original message', () => {
    const { handler } = createHandler();

    expect(handler.toErrorResponse(new Error('boom'), 'listing budgets').error).toEqual({
      code: 'UNKNOWN_ERROR',
      message: 'Error listing budgets',
      details: 'boom',
    });
    expect(handler.toErrorResponse('plain string', 'listing budgets').error.details).toBe(
      'plain string',
    );
  });

  it('returns an MCP error result and logs a warning', () => {
    const { handler, logger } = createHandler();
    const result = handler.handleError(new NotFoundError('No budgets'), 'listing budgets');

    expect(result.isError).toBe(true);
    expect(parseErrorResult(result)).toEqual({
      error: { code: 'NOT_FOUND', message: 'No budgets' },
    });
    expect(logger.warn).toHaveBeenCalledWith('Error listing budgets', {
      code: 'NOT_FOUND',
      error: 'No budgets',
    });
  });

  it('builds validation error results directly', () => {
    const { handler } = createHandler();
    const result = handler.createValidationError('Unknown tool: nope');

    expect(result.isError).toBe(true);
    expect(parseErrorResult(result)).toEqual({
      error: { code: 'VALIDATION_ERROR', message: 'Unknown tool: nope' },
    });
  });
});

describe('withToolErrorHandling', () => {
  it('passes successful results through', async () => {
    const result = await withToolErrorHandling(
      async () => ({ content: [{ type: 'text', text: 'ok' }] }),
      'ynab:get_budgets',
      'listing budgets',
    );
    expect(result).toEqual({ content: [{ type: 'text', text: 'ok' }] });
  });

  it('turns thrown errors into error results', async () => {
    const result = await withToolErrorHandling(
      async () => {
        throw new Error('boom');
      },
      'ynab:get_budgets',
      'listing budgets',
    );

    expect(result.isError).toBe(true);
    expect(parseErrorResult(result).error).toEqual({
      code: 'UNKNOWN_ERROR',
      message: 'Error listing budgets (ynab:get_budgets)',
      details: 'boom',
    });
  });
});
