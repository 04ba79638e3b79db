import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { ResourceManager, RESOURCE_URIS } from '../resources.js';
import { CategoryCache } from '../categoryCache.js';
import { PreferenceStore } from '../preferenceStore.js';
import { ResponseFormatter } from '../responseFormatter.js';
import { YnabSessionFactory } from '../ynabSession.js';
import { startOfMonth } from '../../utils/dates.js';
import { NotFoundError } from '../../utils/errors.js';
import {
  account,
  createMockLogger,
  createMockYnabAPI,
  createTempDir,
  transaction,
  ynabErrorBody,
} from '../../__tests__/testUtils.js';

describe('ResourceManager', () => {
  let cleanup: () => void;
  let preferences: PreferenceStore;
  let categoryCache: CategoryCache;
  let api: ReturnType<typeof createMockYnabAPI>;
  let logger: ReturnType<typeof createMockLogger>;
  let manager: ResourceManager;

  beforeEach(() => {
    const temp = createTempDir();
    cleanup = temp.cleanup;
    logger = createMockLogger();
    preferences = new PreferenceStore(join(temp.dir, 'preferred_budget_id.txt'), logger);
    categoryCache = new CategoryCache(join(temp.dir, 'budget_category_cache.json'), logger);
    api = createMockYnabAPI();
    manager = new ResourceManager({
      sessions: new YnabSessionFactory({
        accessToken: 'test-secret',
        timeoutMs: 1_000,
        createApi: () => api.ynabAPI,
        logger,
      }),
      preferences,
      categoryCache,
      responseFormatter: new ResponseFormatter({ defaultMinify: true }),
      logger,
    });
  });

  afterEach(() => {
    cleanup();
  });

  const readJson = async (uri: string): Promise<unknown> => {
    const result = await manager.readResource(uri);
    const [content] = result.contents;
    if (!content || !('text' in content)) {
      throw new Error('Expected a text resource');
    }
    expect(content.uri).toBe(uri);
    expect(content.mimeType).toBe('application/json');
    return JSON.parse(content.text);
  };

  it('lists the fixed resources and the category template', () => {
    expect(manager.listResources().resources.map((resource) => resource.uri)).toEqual([
      'ynab://budgets',
      'ynab://preferences/budget_id',
      'ynab://accounts',
    ]);
    expect(
      manager.listResourceTemplates().resourceTemplates.map((template) => template.uriTemplate),
    ).toEqual(['ynab://categories/{budget_id}', 'ynab://transactions/{account_id}']);
  });

  it('reads the budget list', async () => {
    api.mocks.budgets.getBudgets.mockResolvedValue({
      data: { budgets: [{ id: 'b1', name: 'Household', last_modified_on: '2024-03-01T00:00:00Z' }] },
    });

    expect(await readJson(RESOURCE_URIS.budgets)).toEqual([
      { id: 'b1', name: 'Household', last_modified_on: '2024-03-01T00:00:00Z' },
    ]);
  });

  it('reads the preferred budget id, null when unset', async () => {
    expect(await readJson(RESOURCE_URIS.preferredBudget)).toEqual({ budget_id: null });

    preferences.set('b7');
    expect(await readJson(RESOURCE_URIS.preferredBudget)).toEqual({ budget_id: 'b7' });
  });

  it('summarizes accounts across budgets and skips budgets that fail', async () => {
    api.mocks.budgets.getBudgets.mockResolvedValue({
      data: {
        budgets: [
          { id: 'b1', name: 'Household' },
          { id: 'b2', name: 'Broken' },
        ],
      },
    });
    api.mocks.accounts.getAccounts.mockImplementation(async (budgetId: string) => {
      if (budgetId === 'b2') throw new Error('boom');
      return { data: { accounts: [account({ id: 'acc-1', balance: 100000 })] } };
    });

    expect(await readJson(RESOURCE_URIS.accounts)).toEqual({
      accounts: [
        {
          account_type: 'checking',
          type: 'Checking Accounts',
          accounts: [{ id: 'acc-1', name: 'Checking', balance: '$100.00', balance_raw: 100 }],
          total: '$100.00',
          total_raw: 100,
        },
      ],
      summary: { total_assets: '$100.00', total_liabilities: '$0.00', net_worth: '$100.00' },
    });
    expect(logger.warn).toHaveBeenCalledWith('Skipping budget whose accounts could not be listed', {
      budgetId: 'b2',
      error: 'boom',
    });
  });

  it('reads cached categories for a budget', async () => {
    categoryCache.refresh('b1', [{ id: 'c1', name: 'Rent', group: 'Bills' }]);

    expect(await readJson('ynab://categories/b1')).toEqual({
      budget_id: 'b1',
      categories: [{ id: 'c1', name: 'Rent', group: 'Bills' }],
    });
    expect(await readJson('ynab://categories/unknown')).toEqual({
      budget_id: 'unknown',
      categories: [],
    });
  });

  it('reads account transactions from the first budget that has them', async () => {
    api.mocks.budgets.getBudgets.mockResolvedValue({
      data: {
        budgets: [
          { id: 'b1', name: 'Locked' },
          { id: 'b2', name: 'Empty' },
          { id: 'b3', name: 'Household' },
          { id: 'b4', name: 'Spare' },
        ],
      },
    });
    api.mocks.transactions.getTransactionsByAccount.mockImplementation(
      async (budgetId: string) => {
        if (budgetId === 'b1') throw ynabErrorBody('404.2', 'resource_not_found', 'Not found');
        if (budgetId === 'b2') return { data: { transactions: [] } };
        return {
          data: {
            transactions: [
              transaction({ id: 't1', amount: -4500 }),
              transaction({ id: 't2', deleted: true }),
            ],
          },
        };
      },
    );

    const body = await readJson('ynab://transactions/acc-1');

    expect(body).toEqual([
      expect.objectContaining({ id: 't1', account_id: 'acc-1', amount: -4.5 }),
    ]);
    expect(
      api.mocks.transactions.getTransactionsByAccount.mock.calls.map((call) => call[0]),
    ).toEqual(['b1', 'b2', 'b3']);
    expect(api.mocks.transactions.getTransactionsByAccount).toHaveBeenCalledWith(
      'b3',
      'acc-1',
      startOfMonth(),
      undefined,
      undefined,
      { signal: expect.any(AbortSignal) },
    );
  });

  it('returns an empty list when no budget holds the account', async () => {
    api.mocks.budgets.getBudgets.mockResolvedValue({
      data: { budgets: [{ id: 'b1', name: 'Household' }] },
    });
    api.mocks.transactions.getTransactionsByAccount.mockRejectedValue(
      ynabErrorBody('404.2', 'resource_not_found', 'Not found'),
    );

    expect(await readJson('ynab://transactions/missing')).toEqual([]);
  });

  it('treats malformed escapes in a resource id as unknown resources', async () => {
    await expect(manager.readResource('ynab://categories/%E0')).rejects.toThrow(NotFoundError);
    await expect(manager.readResource('ynab://transactions/%E0%A4%A')).rejects.toThrow(
      'Unknown resource: ynab://transactions/%E0%A4%A',
    );
  });

  it('rejects unknown resources', async () => {
    await expect(manager.readResource('ynab://payees')).rejects.toThrow(NotFoundError);
    await expect(manager.readResource('ynab://payees')).rejects.toThrow(
      'Unknown resource: ynab://payees',
    );
  });
});
