import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import { z, toJSONSchema } from 'zod/v4';
import type { MCPToolAnnotations } from '../types/toolAnnotations.js';
import { globalRequestLogger, type Logger } from './requestLogger.js';

export type RequestWrapperFactory = <T extends Record<string, unknown>>(
  namespace: string,
  operation: string,
  schema: z.ZodType<T>,
) => (
  params: Record<string, unknown>,
) => (handler: (validated: T) => Promise<CallToolResult>) => Promise<CallToolResult>;

export interface ErrorHandlerContract {
  handleError(error: unknown, context: string): CallToolResult;
  createValidationError(message: string, details?: string, suggestions?: string[]): CallToolResult;
}

export interface DefaultArgumentResolverContext {
  name: string;
  rawArguments: Record<string, unknown>;
}

export class DefaultArgumentResolutionError extends Error {
  constructor(public readonly result: CallToolResult) {
    super('Default argument resolution failed');
    this.name = 'DefaultArgumentResolutionError';
  }
}

export type DefaultArgumentResolver<TInput extends Record<string, unknown>> = (
  context: DefaultArgumentResolverContext,
) => Partial<TInput> | Promise<Partial<TInput> | undefined> | undefined;

export interface ToolMetadataOptions {
  annotations?: MCPToolAnnotations;
}

export interface ToolExecutionContext {
  name: string;
  operation: string;
  rawArguments: Record<string, unknown>;
  /** Aborted when the MCP client cancels the request */
  signal?: AbortSignal;
}

export interface ToolExecutionPayload<TInput extends Record<string, unknown>> {
  input: TInput;
  context: ToolExecutionContext;
}

export type ToolHandler<TInput extends Record<string, unknown>> = (
  payload: ToolExecutionPayload<TInput>,
) => Promise<CallToolResult>;

export interface ToolDefinition<TInput extends Record<string, unknown> = Record<string, unknown>> {
  name: string;
  description: string;
  inputSchema: z.ZodType<TInput>;
  handler: ToolHandler<TInput>;
  operation?: string;
  metadata?: ToolMetadataOptions;
  defaultArgumentResolver?: DefaultArgumentResolver<TInput>;
}

interface RegisteredTool<TInput extends Record<string, unknown>> extends ToolDefinition<TInput> {
  readonly operation: string;
}

export interface ToolExecutionOptions {
  name: string;
  arguments?: Record<string, unknown>;
  signal?: AbortSignal;
}

export interface ToolRegistryDependencies {
  withRequestWrapper: RequestWrapperFactory;
  errorHandler: ErrorHandlerContract;
  logger?: Logger;
}

const TOOL_NAMESPACE = 'ynab';

export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool<Record<string, unknown>>>();
  private readonly logger: Logger;

  constructor(private readonly deps: ToolRegistryDependencies) {
    this.logger = deps.logger ?? globalRequestLogger;
  }

  register<TInput extends Record<string, unknown>>(definition: ToolDefinition<TInput>): void {
    this.assertValidDefinition(definition);

    if (this.tools.has(definition.name)) {
      throw new Error(`Tool '${definition.name}' is already registered`);
    }

    const resolved: RegisteredTool<TInput> = {
      ...definition,
      operation: definition.operation ?? definition.name,
    };

    // Handlers are only ever invoked with input parsed by their own schema,
    // so storing them under the widened record type is sound.
    this.tools.set(definition.name, resolved as unknown as RegisteredTool<Record<string, unknown>>);
  }

  listTools(): Tool[] {
    return Array.from(this.tools.values()).map((tool) => {
      const result: Tool = {
        name: tool.name,
        description: tool.description,
        inputSchema: this.generateInputSchema(tool.inputSchema),
      };
      if (tool.metadata?.annotations) {
        result.annotations = tool.metadata.annotations;
      }
      return result;
    });
  }

  async executeTool(options: ToolExecutionOptions): Promise<CallToolResult> {
    const tool = this.tools.get(options.name);
    if (!tool) {
      return this.deps.errorHandler.createValidationError(
        `Unknown tool: ${options.name}`,
        'The requested tool is not registered with the server',
      );
    }

    let defaults: Partial<Record<string, unknown>> | undefined;

    if (tool.defaultArgumentResolver) {
      try {
        defaults = await tool.defaultArgumentResolver({
          name: tool.name,
          rawArguments: options.arguments ?? {},
        });
      } catch (error) {
        if (error instanceof DefaultArgumentResolutionError) {
          return error.result;
        }
        return this.deps.errorHandler.createValidationError(
          'Invalid parameters',
          error instanceof Error
            ? error.message
            : 'Unknown error during default argument resolution',
        );
      }
    }

    const rawArguments: Record<string, unknown> = {
      ...(defaults ?? {}),
      ...(options.arguments ?? {}),
    };

    try {
      const wrapped = this.deps.withRequestWrapper(
        TOOL_NAMESPACE,
        tool.operation,
        tool.inputSchema,
      )(rawArguments);

      return await wrapped(async (validated) => {
        try {
          const context: ToolExecutionContext = {
            name: tool.name,
            operation: tool.operation,
            rawArguments,
          };
          if (options.signal) {
            context.signal = options.signal;
          }
          return await tool.handler({ input: validated, context });
        } catch (handlerError) {
          return this.deps.errorHandler.handleError(
            handlerError,
            `executing ${tool.name} - ${tool.operation}`,
          );
        }
      });
    } catch (wrapperError) {
      return this.normalizeWrapperError(wrapperError, tool);
    }
  }

  private normalizeWrapperError(
    error: unknown,
    tool: RegisteredTool<Record<string, unknown>>,
  ): CallToolResult {
    if (error instanceof z.ZodError) {
      return this.deps.errorHandler.createValidationError(
        `Invalid parameters for ${tool.name}`,
        error.message,
      );
    }

    if (error instanceof Error && error.message.includes('Validation failed')) {
      return this.deps.errorHandler.createValidationError(
        `Invalid parameters for ${tool.name}`,
        error.message,
      );
    }

    return this.deps.errorHandler.handleError(error, `executing ${tool.name}`);
  }

  private assertValidDefinition<TInput extends Record<string, unknown>>(
    definition: ToolDefinition<TInput>,
  ): void {
    if (!definition.name) {
      throw new Error('Tool definition requires a non-empty name');
    }

    if (!definition.description) {
      throw new Error(`Tool '${definition.name}' requires a description`);
    }

    if (typeof definition.inputSchema.safeParse !== 'function') {
      throw new Error(`Tool '${definition.name}' requires a valid Zod schema`);
    }
  }

  private generateInputSchema(schema: z.ZodType): Tool['inputSchema'] {
    return this.generateJsonSchema(schema) as Tool['inputSchema'];
  }

  private generateJsonSchema(schema: z.ZodType): Record<string, unknown> {
    try {
      return { ...toJSONSchema(schema, { target: 'draft-2020-12', io: 'input' }) };
    } catch (error) {
      this.logger.warn('Failed to generate JSON schema for tool', {
        error: error instanceof Error ? error.message : String(error),
      });
      return { type: 'object', additionalProperties: true };
    }
  }
}
