/**
 * Request middleware that validates tool input and records every call
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod/v4';
import { fromZodError } from 'zod-validation-error';
import { globalRequestLogger, type RequestLogger } from './requestLogger.js';

export interface RequestContext {
  toolName: string;
  operation: string;
  parameters: Record<string, unknown>;
}

export class RequestMiddleware {
  constructor(private readonly requestLogger: RequestLogger = globalRequestLogger) {}

  async run<T>(
    context: RequestContext,
    schema: z.ZodType<T>,
    operation: (validated: T) => Promise<CallToolResult>,
  ): Promise<CallToolResult> {
    const startTime = Date.now();

    try {
      const validatedParams = this.validateInput(schema, context.parameters);
      const result = await operation(validatedParams);
      const duration = Date.now() - startTime;

      if (result.isError) {
        this.requestLogger.logError(
          context.toolName,
          context.operation,
          context.parameters,
          'Tool returned an error result',
          duration,
        );
      } else {
        this.requestLogger.logSuccess(
          context.toolName,
          context.operation,
          context.parameters,
          duration,
        );
      }
      return result;
    } catch (error) {
      const duration = Date.now() - startTime;
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      this.requestLogger.logError(
        context.toolName,
        context.operation,
        context.parameters,
        errorMessage,
        duration,
      );
      throw error;
    }
  }

  private validateInput<T>(schema: z.ZodType<T>, parameters: Record<string, unknown>): T {
    const result = schema.safeParse(parameters);
    if (!result.success) {
      throw new Error(`Validation failed: ${fromZodError(result.error).message}`);
    }
    return result.data;
  }
}

const defaultMiddleware = new RequestMiddleware();

/**
 * Curried wrapper matching the registry's `RequestWrapperFactory`:
 * `(namespace, operation, schema) => (params) => (handler) => result`.
 */
export function withRequestWrapper<T extends Record<string, unknown>>(
  namespace: string,
  operation: string,
  schema: z.ZodType<T>,
  middleware: RequestMiddleware = defaultMiddleware,
) {
  return (params: Record<string, unknown>) =>
    (handler: (validated: T) => Promise<CallToolResult>): Promise<CallToolResult> =>
      middleware.run(
        { toolName: `${namespace}:${operation}`, operation, parameters: params },
        schema,
        handler,
      );
}
