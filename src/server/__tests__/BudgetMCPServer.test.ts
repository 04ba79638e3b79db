import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFileSync } from 'fs';
import { join } from 'path';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { BudgetMCPServer } from '../BudgetMCPServer.js';
import type { AppConfig } from '../config.js';
import { AuthenticationError } from '../../utils/errors.js';
import {
  account,
  category,
  createMockLogger,
  createMockYnabAPI,
  createTempDir,
  parseErrorResult,
  textOf,
  ynabErrorBody,
} from '../../__tests__/testUtils.js';

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('BudgetMCPServer', () => {
  let cleanup: () => void;
  let config: AppConfig;
  let api: ReturnType<typeof createMockYnabAPI>;

  const createServer = (overrides: Partial<AppConfig> = {}) =>
    new BudgetMCPServer(
      { ...config, ...overrides },
      { createApi: () => api.ynabAPI, exitOnError: false, logger: createMockLogger() },
    );

  beforeEach(() => {
    const temp = createTempDir();
    cleanup = temp.cleanup;
    config = {
      apiKey: 'test-secret',
      logLevel: 'fatal',
      requestTimeoutMs: 1_000,
      configDir: temp.dir,
      preferredBudgetFile: join(temp.dir, 'preferred_budget_id.txt'),
      categoryCacheFile: join(temp.dir, 'budget_category_cache.json'),
    };
    api = createMockYnabAPI();
  });

  afterEach(() => {
    cleanup();
  });

  it('registers every tool with an input schema', () => {
    const { tools } = createServer().handleListTools();

    expect(tools.map((tool) => tool.name)).toEqual([
      'get_budgets',
      'set_preferred_budget_id',
      'get_accounts',
      'get_account_balance',
      'create_transaction',
      'get_transactions',
      'get_transactions_needing_attention',
      'categorize_transaction',
      'get_categories',
      'cache_categories',
    ]);
    for (const tool of tools) {
      expect(tool.inputSchema.type).toBe('object');
      expect(tool.annotations?.title).toMatch(/^YNAB: /);
    }
  });

  it('asks for a budget id when none is given or stored', async () => {
    const result = await createServer().handleCallTool({ name: 'get_accounts', arguments: {} });

    expect(result.isError).toBe(true);
    expect(parseErrorResult(result).error).toEqual({
      code: 'VALIDATION_ERROR',
      message: 'No budget ID provided and no preferred budget is set',
      details: 'Pass budget_id or store one with set_preferred_budget_id',
      suggestions: ['Use get_budgets to list available budget IDs'],
    });
    expect(api.mocks.accounts.getAccounts).not.toHaveBeenCalled();
  });

  it('falls back to the preferred budget and persists it across restarts', async () => {
    const server = createServer();
    const saved = await server.handleCallTool({
      name: 'set_preferred_budget_id',
      arguments: { budget_id: 'b1' },
    });
    expect(textOf(saved)).toBe('Preferred budget ID set to b1');

    api.mocks.accounts.getAccounts.mockResolvedValue({
      data: { accounts: [account({ balance: 1000 })] },
    });
    const restarted = createServer();
    expect(restarted.getPreferences().get()).toBe('b1');

    const result = await restarted.handleCallTool({ name: 'get_accounts', arguments: {} });

    expect(result.isError).toBeUndefined();
    expect(api.mocks.accounts.getAccounts).toHaveBeenCalledWith('b1', undefined, {
      signal: expect.any(AbortSignal),
    });
  });

  it('prefers an explicit budget id over the stored one', async () => {
    const server = createServer();
    server.getPreferences().set('b1');
    api.mocks.accounts.getAccounts.mockResolvedValue({ data: { accounts: [] } });

    await server.handleCallTool({ name: 'get_accounts', arguments: { budget_id: 'b2' } });

    expect(api.mocks.accounts.getAccounts).toHaveBeenCalledWith('b2', undefined, {
      signal: expect.any(AbortSignal),
    });
  });

  it('rejects an unknown filter type', async () => {
    const result = await createServer().handleCallTool({
      name: 'get_transactions_needing_attention',
      arguments: { budget_id: 'b1', filter_type: 'flagged' },
    });

    const { error } = parseErrorResult(result);
    expect(error.code).toBe('VALIDATION_ERROR');
    expect(error.message).toBe('Invalid parameters for get_transactions_needing_attention');
    expect(api.mocks.transactions.getTransactions).not.toHaveBeenCalled();
  });

  it('reports unknown tools', async () => {
    const result = await createServer().handleCallTool({ name: 'delete_everything' });

    expect(parseErrorResult(result).error).toEqual({
      code: 'VALIDATION_ERROR',
      message: 'Unknown tool: delete_everything',
      details: 'The requested tool is not registered with the server',
    });
  });

  it('times out YNAB calls that never settle', async () => {
    api.mocks.budgets.getBudgets.mockReturnValue(new Promise(() => {}));

    const result = await createServer({ requestTimeoutMs: 20 }).handleCallTool({
      name: 'get_budgets',
    });

    expect(parseErrorResult(result).error).toEqual({
      code: 'TIMEOUT',
      message: 'YNAB request timed out after 20ms',
    });
  });

  it('does not create a transaction once the call has timed out', async () => {
    api.mocks.budgets.getBudgets.mockImplementation(
      () =>
        new Promise((resolve) =>
          setTimeout(() => resolve({ data: { budgets: [{ id: 'b1', name: 'Household' }] } }), 60),
        ),
    );
    api.mocks.transactions.createTransaction.mockResolvedValue({
      data: { transaction: { id: 't-new' } },
    });

    const result = await createServer({ requestTimeoutMs: 20 }).handleCallTool({
      name: 'create_transaction',
      arguments: { account_id: 'acc-1', amount: -5, payee_name: 'Market' },
    });
    await sleep(100);

    expect(parseErrorResult(result).error.code).toBe('TIMEOUT');
    expect(api.mocks.transactions.createTransaction).not.toHaveBeenCalled();
    const [, init] = api.mocks.budgets.getBudgets.mock.calls[0] ?? [];
    expect(init).toEqual({ signal: expect.any(AbortSignal) });
    expect(init.signal.aborted).toBe(true);
  });

  it('stops scanning accounts once categorize_transaction is cancelled', async () => {
    const controller = new AbortController();
    api.mocks.accounts.getAccounts.mockResolvedValue({
      data: { accounts: [account({ id: 'acc-1' }), account({ id: 'acc-2' })] },
    });
    api.mocks.transactions.getTransactionsByAccount.mockImplementation(async () => {
      controller.abort();
      return { data: { transactions: [] } };
    });

    const result = await createServer().handleCallTool(
      {
        name: 'categorize_transaction',
        arguments: {
          budget_id: 'b1',
          transaction_id: 'import-1',
          category_id: 'c1',
          id_type: 'import_id',
        },
      },
      controller.signal,
    );
    await sleep(10);

    expect(parseErrorResult(result).error.code).toBe('CANCELLED');
    expect(api.mocks.transactions.getTransactionsByAccount).toHaveBeenCalledTimes(1);
    expect(api.mocks.transactions.updateTransaction).not.toHaveBeenCalled();
  });

  it('leaves the category cache untouched when the call was cancelled', async () => {
    const server = createServer();
    server.getCategoryCache().refresh('b1', [{ id: 'c0', name: 'Old', group: 'Bills' }]);
    const before = readFileSync(config.categoryCacheFile, 'utf8');
    api.mocks.categories.getCategories.mockResolvedValue({
      data: {
        category_groups: [{ id: 'g1', name: 'Bills', categories: [category({ id: 'c1' })] }],
      },
    });
    const controller = new AbortController();
    controller.abort();

    const result = await server.handleCallTool(
      { name: 'cache_categories', arguments: { budget_id: 'b1' } },
      controller.signal,
    );
    await sleep(10);

    expect(parseErrorResult(result).error.code).toBe('CANCELLED');
    expect(api.mocks.categories.getCategories).toHaveBeenCalledTimes(1);
    expect(readFileSync(config.categoryCacheFile, 'utf8')).toBe(before);
    expect(server.getCategoryCache().get('b1')).toEqual([{ id: 'c0', name: 'Old', group: 'Bills' }]);
  });

  describe('validateToken', () => {
    it('accepts a working token', async () => {
      api.mocks.user.getUser.mockResolvedValue({ data: { user: { id: 'u1' } } });
      await expect(createServer().validateToken()).resolves.toBe(true);
    });

    it('maps 401 to an authentication error', async () => {
      api.mocks.user.getUser.mockRejectedValue(
        ynabErrorBody('401', 'not_authorized', 'Unauthorized'),
      );
      const validation = createServer().validateToken();

      await expect(validation).rejects.toThrow(AuthenticationError);
      await expect(validation).rejects.toThrow('Invalid or expired YNAB access token');
    });

    it('maps 403 to an insufficient permissions error', async () => {
      api.mocks.user.getUser.mockRejectedValue(ynabErrorBody('403.1', 'forbidden', 'Forbidden'));

      await expect(createServer().validateToken()).rejects.toThrow(
        'YNAB access token has insufficient permissions',
      );
    });
  });

  describe('resources', () => {
    it('surfaces unknown resources as invalid params', async () => {
      const read = createServer().handleReadResource({ uri: 'ynab://nowhere' });

      await expect(read).rejects.toBeInstanceOf(McpError);
      await expect(read).rejects.toMatchObject({ code: ErrorCode.InvalidParams });
    });

    it('surfaces malformed resource ids as invalid params', async () => {
      await expect(
        createServer().handleReadResource({ uri: 'ynab://categories/%E0' }),
      ).rejects.toMatchObject({ code: ErrorCode.InvalidParams });
    });

    it('surfaces YNAB failures as internal errors', async () => {
      api.mocks.budgets.getBudgets.mockRejectedValue(
        ynabErrorBody('500', 'internal_server_error', 'Upstream failure'),
      );

      await expect(
        createServer().handleReadResource({ uri: 'ynab://budgets' }),
      ).rejects.toMatchObject({ code: ErrorCode.InternalError });
    });
  });
});
