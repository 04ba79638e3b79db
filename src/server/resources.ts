import type {
  ListResourcesResult,
  ListResourceTemplatesResult,
  ReadResourceResult,
} from '@modelcontextprotocol/sdk/types.js';
import { fetchAccountsAcrossBudgets } from '../tools/accountTools.js';
import { fetchBudgets } from '../tools/budgetTools.js';
import { fetchAccountTransactionsAcrossBudgets } from '../tools/transactionTools.js';
import { startOfMonth } from '../utils/dates.js';
import { milliunitsToAmount } from '../utils/money.js';
import { groupAndSummarize } from '../utils/accountGrouping.js';
import { NotFoundError } from '../utils/errors.js';
import type { CategoryCache } from './categoryCache.js';
import type { PreferenceStore } from './preferenceStore.js';
import { globalRequestLogger, type Logger } from './requestLogger.js';
import type { ResponseFormatter } from './responseFormatter.js';
import type { YnabSessionFactory } from './ynabSession.js';

export const RESOURCE_URIS = {
  budgets: 'ynab://budgets',
  preferredBudget: 'ynab://preferences/budget_id',
  accounts: 'ynab://accounts',
} as const;

const CATEGORY_URI_PATTERN = /^ynab:\/\/categories\/([^/]+)$/;
const TRANSACTION_URI_PATTERN = /^ynab:\/\/transactions\/([^/]+)$/;

function decodeSegment(uri: string, segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new NotFoundError(`Unknown resource: ${uri}`);
  }
}

export interface ResourceManagerDependencies {
  sessions: YnabSessionFactory;
  preferences: PreferenceStore;
  categoryCache: CategoryCache;
  responseFormatter: ResponseFormatter;
  logger?: Logger;
}

/**
 * Serves the read-only `ynab://` resources
 */
export class ResourceManager {
  private readonly logger: Logger;

  constructor(private readonly deps: ResourceManagerDependencies) {
    this.logger = deps.logger ?? globalRequestLogger;
  }

  listResources(): ListResourcesResult {
    return {
      resources: [
        {
          uri: RESOURCE_URIS.budgets,
          name: 'YNAB Budgets',
          description: 'Every budget on the YNAB account',
          mimeType: 'application/json',
        },
        {
          uri: RESOURCE_URIS.preferredBudget,
          name: 'Preferred Budget ID',
          description: 'Budget used when a tool call omits budget_id',
          mimeType: 'application/json',
        },
        {
          uri: RESOURCE_URIS.accounts,
          name: 'YNAB Accounts',
          description: 'Open accounts across every budget, grouped by type with totals',
          mimeType: 'application/json',
        },
      ],
    };
  }

  listResourceTemplates(): ListResourceTemplatesResult {
    return {
      resourceTemplates: [
        {
          uriTemplate: 'ynab://categories/{budget_id}',
          name: 'Cached Categories',
          description: 'Category summaries saved by cache_categories for a budget',
          mimeType: 'application/json',
        },
        {
          uriTemplate: 'ynab://transactions/{account_id}',
          name: 'Account Transactions',
          description:
            "The account's transactions since the first day of the current month, from whichever budget holds it",
          mimeType: 'application/json',
        },
      ],
    };
  }

  async readResource(uri: string, signal?: AbortSignal): Promise<ReadResourceResult> {
    const value = await this.resolve(uri, signal);
    return {
      contents: [
        {
          uri,
          mimeType: 'application/json',
          text: this.deps.responseFormatter.format(value),
        },
      ],
    };
  }

  private async resolve(uri: string, signal?: AbortSignal): Promise<unknown> {
    switch (uri) {
      case RESOURCE_URIS.budgets:
        return await this.deps.sessions.use(
          ({ api, signal: sessionSignal }) => fetchBudgets(api, sessionSignal),
          signal,
        );
      case RESOURCE_URIS.preferredBudget:
        return { budget_id: this.deps.preferences.get() ?? null };
      case RESOURCE_URIS.accounts:
        return await this.deps.sessions.use(
          async ({ api, signal: sessionSignal }) =>
            groupAndSummarize(await fetchAccountsAcrossBudgets(api, this.logger, sessionSignal)),
          signal,
        );
      default: {
        const budgetSegment = CATEGORY_URI_PATTERN.exec(uri)?.[1];
        if (budgetSegment) {
          const id = decodeSegment(uri, budgetSegment);
          return { budget_id: id, categories: this.deps.categoryCache.get(id) };
        }
        const accountSegment = TRANSACTION_URI_PATTERN.exec(uri)?.[1];
        if (accountSegment) {
          const accountId = decodeSegment(uri, accountSegment);
          const transactions = await this.deps.sessions.use(
            ({ api, signal: sessionSignal }) =>
              fetchAccountTransactionsAcrossBudgets(
                api,
                accountId,
                startOfMonth(),
                this.logger,
                sessionSignal,
              ),
            signal,
          );
          return transactions.map((transaction) => ({
            ...transaction,
            amount: milliunitsToAmount(transaction.amount),
          }));
        }
        throw new NotFoundError(`Unknown resource: ${uri}`);
      }
    }
  }
}
