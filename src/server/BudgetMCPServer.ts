import { readFileSync } from 'fs';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListResourcesRequestSchema,
  ListResourceTemplatesRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import type { CallToolResult, ReadResourceResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod/v4';
import {
  GetAccountBalanceSchema,
  GetAccountsSchema,
  handleGetAccountBalance,
  handleGetAccounts,
  type GetAccountBalanceParams,
  type GetAccountsParams,
} from '../tools/accountTools.js';
import {
  GetBudgetsSchema,
  SetPreferredBudgetIdSchema,
  handleGetBudgets,
  handleSetPreferredBudgetId,
  type GetBudgetsParams,
} from '../tools/budgetTools.js';
import {
  CacheCategoriesSchema,
  GetCategoriesSchema,
  handleCacheCategories,
  handleGetCategories,
  type CacheCategoriesParams,
  type GetCategoriesParams,
} from '../tools/categoryTools.js';
import { ToolAnnotationPresets } from '../tools/toolCategories.js';
import {
  CategorizeTransactionSchema,
  CreateTransactionSchema,
  GetTransactionsNeedingAttentionSchema,
  GetTransactionsSchema,
  handleCategorizeTransaction,
  handleCreateTransaction,
  handleGetTransactions,
  handleGetTransactionsNeedingAttention,
  type CategorizeTransactionParams,
  type CreateTransactionParams,
  type GetTransactionsNeedingAttentionParams,
  type GetTransactionsParams,
} from '../tools/transactionTools.js';
import { AuthenticationError, ConfigurationError, NotFoundError } from '../utils/errors.js';
import { CategoryCache } from './categoryCache.js';
import type { AppConfig } from './config.js';
import { createErrorHandler, YNABErrorCode, type ErrorHandler } from './errorHandler.js';
import { PreferenceStore } from './preferenceStore.js';
import { globalRequestLogger, type Logger } from './requestLogger.js';
import { withRequestWrapper } from './requestMiddleware.js';
import { ResourceManager } from './resources.js';
import { responseFormatter } from './responseFormatter.js';
import {
  DefaultArgumentResolutionError,
  ToolRegistry,
  type DefaultArgumentResolver,
  type ToolDefinition,
  type ToolExecutionPayload,
} from './toolRegistry.js';
import { YnabSessionFactory, type YnabApiFactory, type YnabSession } from './ynabSession.js';

export const SERVER_NAME = 'budget-tools-mcp';

export interface BudgetMCPServerOptions {
  /** Builds the YNAB client for each session; tests pass a stub here */
  createApi?: YnabApiFactory;
  exitOnError?: boolean;
  preferences?: PreferenceStore;
  categoryCache?: CategoryCache;
  logger?: Logger;
}

const packageJsonSchema = z.object({ version: z.string() });

/**
 * MCP server exposing YNAB budgets, accounts, transactions and categories
 */
export class BudgetMCPServer {
  private readonly server: Server;
  private readonly exitOnError: boolean;
  private readonly logger: Logger;
  private readonly sessions: YnabSessionFactory;
  private readonly preferences: PreferenceStore;
  private readonly categoryCache: CategoryCache;
  private readonly toolRegistry: ToolRegistry;
  private readonly resourceManager: ResourceManager;
  private readonly errorHandler: ErrorHandler;

  constructor(config: AppConfig, options: BudgetMCPServerOptions = {}) {
    this.exitOnError = options.exitOnError ?? true;
    this.logger = options.logger ?? globalRequestLogger;

    this.sessions = new YnabSessionFactory({
      accessToken: config.apiKey,
      timeoutMs: config.requestTimeoutMs,
      logger: this.logger,
      ...(options.createApi ? { createApi: options.createApi } : {}),
    });

    this.preferences =
      options.preferences ?? new PreferenceStore(config.preferredBudgetFile, this.logger);
    this.categoryCache =
      options.categoryCache ?? new CategoryCache(config.categoryCacheFile, this.logger);
    this.preferences.load();
    this.categoryCache.load();

    this.server = new Server(
      { name: SERVER_NAME, version: this.readPackageVersion() ?? '0.0.0' },
      { capabilities: { tools: {}, resources: {} } },
    );

    this.errorHandler = createErrorHandler(responseFormatter);

    this.toolRegistry = new ToolRegistry({
      withRequestWrapper,
      errorHandler: this.errorHandler,
      logger: this.logger,
    });

    this.resourceManager = new ResourceManager({
      sessions: this.sessions,
      preferences: this.preferences,
      categoryCache: this.categoryCache,
      responseFormatter,
      logger: this.logger,
    });

    this.setupToolRegistry();
    this.setupHandlers();
  }

  /**
   * Validates the YNAB access token by making a test API call
   */
  async validateToken(): Promise<boolean> {
    try {
      await this.sessions.use(({ api, signal }) => api.user.getUser({ signal }));
      return true;
    } catch (error) {
      const response = this.errorHandler.toErrorResponse(error, 'validating access token');
      if (response.error.code === YNABErrorCode.UNAUTHORIZED) {
        throw new AuthenticationError('Invalid or expired YNAB access token');
      }
      if (response.error.code === YNABErrorCode.FORBIDDEN) {
        throw new AuthenticationError('YNAB access token has insufficient permissions');
      }
      throw new AuthenticationError(
        `Token validation failed: ${response.error.details ?? response.error.message}`,
      );
    }
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListResourcesRequestSchema, async () => {
      return this.resourceManager.listResources();
    });

    this.server.setRequestHandler(ListResourceTemplatesRequestSchema, async () => {
      return this.resourceManager.listResourceTemplates();
    });

    this.server.setRequestHandler(ReadResourceRequestSchema, async (request, extra) => {
      return await this.handleReadResource(request.params, extra.signal);
    });

    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      return { tools: this.toolRegistry.listTools() };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
      return await this.handleCallTool(request.params, extra.signal);
    });
  }

  private setupToolRegistry(): void {
    const register = <TInput extends Record<string, unknown>>(
      definition: ToolDefinition<TInput>,
    ): void => {
      this.toolRegistry.register(definition);
    };

    // Runs the handler inside a YNAB session bound to the MCP request's signal
    const withSession =
      <TInput extends Record<string, unknown>>(
        handler: (session: YnabSession, input: TInput) => Promise<CallToolResult>,
      ) =>
      async ({ input, context }: ToolExecutionPayload<TInput>): Promise<CallToolResult> =>
        this.sessions.use((session) => handler(session, input), context.signal);

    const resolveBudgetId = <
      TInput extends { budget_id: string },
    >(): DefaultArgumentResolver<TInput> => {
      return ({ rawArguments }) => {
        const provided = rawArguments['budget_id'];
        if (typeof provided === 'string' && provided.length > 0) {
          return undefined;
        }
        const preferred = this.preferences.get();
        if (preferred) {
          const defaults: Partial<TInput> = {};
          return Object.assign(defaults, { budget_id: preferred });
        }
        throw new DefaultArgumentResolutionError(
          this.errorHandler.createValidationError(
            'No budget ID provided and no preferred budget is set',
            'Pass budget_id or store one with set_preferred_budget_id',
            ['Use get_budgets to list available budget IDs'],
          ),
        );
      };
    };

    register({
      name: 'get_budgets',
      description: 'List every budget on the YNAB account as markdown',
      inputSchema: GetBudgetsSchema,
      handler: withSession<GetBudgetsParams>(({ api, signal }) =>
        handleGetBudgets(api, this.preferences, signal),
      ),
      metadata: {
        annotations: { ...ToolAnnotationPresets.READ_ONLY_EXTERNAL, title: 'YNAB: Get Budgets' },
      },
    });

    register({
      name: 'set_preferred_budget_id',
      description: 'Store the budget used when other tools are called without budget_id',
      inputSchema: SetPreferredBudgetIdSchema,
      handler: async ({ input, context }) =>
        handleSetPreferredBudgetId(this.preferences, input, context.signal),
      metadata: {
        annotations: {
          ...ToolAnnotationPresets.WRITE_LOCAL,
          title: 'YNAB: Set Preferred Budget',
        },
      },
    });

    register({
      name: 'get_accounts',
      description: 'Summarize open accounts grouped by type with asset, liability and net worth totals',
      inputSchema: GetAccountsSchema,
      handler: withSession<GetAccountsParams>(({ api, signal }, input) =>
        handleGetAccounts(api, input, signal),
      ),
      defaultArgumentResolver: resolveBudgetId<GetAccountsParams>(),
      metadata: {
        annotations: { ...ToolAnnotationPresets.READ_ONLY_EXTERNAL, title: 'YNAB: Get Accounts' },
      },
    });

    register({
      name: 'get_account_balance',
      description: 'Get the current balance of an account in the preferred (or first) budget',
      inputSchema: GetAccountBalanceSchema,
      handler: withSession<GetAccountBalanceParams>(({ api, signal }, input) =>
        handleGetAccountBalance(api, this.preferences, input, signal),
      ),
      metadata: {
        annotations: {
          ...ToolAnnotationPresets.READ_ONLY_EXTERNAL,
          title: 'YNAB: Get Account Balance',
        },
      },
    });

    register({
      name: 'create_transaction',
      description:
        'Create a transaction dated today; amount is in dollars and category_name is matched case-insensitively',
      inputSchema: CreateTransactionSchema,
      handler: withSession<CreateTransactionParams>(({ api, signal }, input) =>
        handleCreateTransaction(api, this.preferences, input, signal),
      ),
      metadata: {
        annotations: {
          ...ToolAnnotationPresets.WRITE_EXTERNAL_CREATE,
          title: 'YNAB: Create Transaction',
        },
      },
    });

    register({
      name: 'get_transactions',
      description: "List an account's transactions since the first day of the current month",
      inputSchema: GetTransactionsSchema,
      handler: withSession<GetTransactionsParams>(({ api, signal }, input) =>
        handleGetTransactions(api, input, signal),
      ),
      defaultArgumentResolver: resolveBudgetId<GetTransactionsParams>(),
      metadata: {
        annotations: {
          ...ToolAnnotationPresets.READ_ONLY_EXTERNAL,
          title: 'YNAB: Get Transactions',
        },
      },
    });

    register({
      name: 'get_transactions_needing_attention',
      description:
        'List recent transactions that are uncategorized, unapproved, or both (days_back defaults to 30)',
      inputSchema: GetTransactionsNeedingAttentionSchema,
      handler: withSession<GetTransactionsNeedingAttentionParams>(({ api, signal }, input) =>
        handleGetTransactionsNeedingAttention(api, input, signal),
      ),
      defaultArgumentResolver: resolveBudgetId<GetTransactionsNeedingAttentionParams>(),
      metadata: {
        annotations: {
          ...ToolAnnotationPresets.READ_ONLY_EXTERNAL,
          title: 'YNAB: Transactions Needing Attention',
        },
      },
    });

    register({
      name: 'categorize_transaction',
      description:
        'Set the category of a transaction found by its id, import_id, transfer_transaction_id or matched_transaction_id',
      inputSchema: CategorizeTransactionSchema,
      handler: withSession<CategorizeTransactionParams>(({ api, signal }, input) =>
        handleCategorizeTransaction(api, input, this.logger, signal),
      ),
      defaultArgumentResolver: resolveBudgetId<CategorizeTransactionParams>(),
      metadata: {
        annotations: {
          ...ToolAnnotationPresets.WRITE_EXTERNAL_UPDATE,
          title: 'YNAB: Categorize Transaction',
        },
      },
    });

    register({
      name: 'get_categories',
      description: 'List visible categories with budgeted, activity and balance amounts per group',
      inputSchema: GetCategoriesSchema,
      handler: withSession<GetCategoriesParams>(({ api, signal }, input) =>
        handleGetCategories(api, input, signal),
      ),
      defaultArgumentResolver: resolveBudgetId<GetCategoriesParams>(),
      metadata: {
        annotations: {
          ...ToolAnnotationPresets.READ_ONLY_EXTERNAL,
          title: 'YNAB: Get Categories',
        },
      },
    });

    register({
      name: 'cache_categories',
      description: "Save the budget's categories locally for the ynab://categories resource",
      inputSchema: CacheCategoriesSchema,
      handler: withSession<CacheCategoriesParams>(({ api, signal }, input) =>
        handleCacheCategories(api, this.categoryCache, input, signal),
      ),
      defaultArgumentResolver: resolveBudgetId<CacheCategoriesParams>(),
      metadata: {
        annotations: {
          ...ToolAnnotationPresets.WRITE_LOCAL_FROM_EXTERNAL,
          title: 'YNAB: Cache Categories',
        },
      },
    });
  }

  /**
   * Starts the MCP server with stdio transport
   */
  async run(): Promise<void> {
    try {
      await this.validateToken();

      const transport = new StdioServerTransport();
      await this.server.connect(transport);

      this.logger.info('Budget tools MCP server started', {
        tools: this.toolRegistry.listTools().length,
      });
    } catch (error) {
      if (error instanceof AuthenticationError || error instanceof ConfigurationError) {
        this.logger.error('Server startup failed', { error: error.message });
        if (this.exitOnError) {
          process.exit(1);
        }
      }
      throw error;
    }
  }

  handleListTools(): { tools: Tool[] } {
    return { tools: this.toolRegistry.listTools() };
  }

  async handleCallTool(
    params: { name: string; arguments?: Record<string, unknown> | undefined },
    signal?: AbortSignal,
  ): Promise<CallToolResult> {
    return await this.toolRegistry.executeTool({
      name: params.name,
      arguments: params.arguments ?? {},
      ...(signal ? { signal } : {}),
    });
  }

  async handleReadResource(
    params: { uri: string },
    signal?: AbortSignal,
  ): Promise<ReadResourceResult> {
    const { uri } = params;
    try {
      return await this.resourceManager.readResource(uri, signal);
    } catch (error) {
      const response = this.errorHandler.toErrorResponse(error, `reading resource ${uri}`);
      this.logger.warn('Resource read failed', { uri, code: response.error.code });
      const code = error instanceof NotFoundError ? ErrorCode.InvalidParams : ErrorCode.InternalError;
      throw new McpError(code, response.error.message, response.error);
    }
  }

  getPreferences(): PreferenceStore {
    return this.preferences;
  }

  getCategoryCache(): CategoryCache {
    return this.categoryCache;
  }

  private readPackageVersion(): string | undefined {
    try {
      const raw: unknown = JSON.parse(
        readFileSync(new URL('../../package.json', import.meta.url), 'utf8'),
      );
      const parsed = packageJsonSchema.safeParse(raw);
      return parsed.success ? parsed.data.version : undefined;
    } catch (error) {
      this.logger.debug('Could not read package version', {
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }
}
