import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type * as ynab from 'ynab';
import { z } from 'zod/v4';
import { withToolErrorHandling } from '../types/index.js';
import { responseFormatter } from '../server/responseFormatter.js';
import type { PreferenceStore } from '../server/preferenceStore.js';
import { globalRequestLogger, type Logger } from '../server/requestLogger.js';
import {
  decodeAccount,
  decodeAccounts,
  type AccountRecord,
} from '../server/responseDecoder.js';
import { groupAndSummarize, renderAccountSummary } from '../utils/accountGrouping.js';
import { milliunitsToAmount } from '../utils/money.js';
import { fetchBudgets, resolveActiveBudgetId } from './budgetTools.js';

/**
 * Schema for ynab:get_accounts tool parameters
 */
export const GetAccountsSchema = z
  .object({
    budget_id: z.string().min(1, 'Budget ID is required'),
  })
  .strict();

export type GetAccountsParams = z.infer<typeof GetAccountsSchema>;

/**
 * Schema for ynab:get_account_balance tool parameters
 */
export const GetAccountBalanceSchema = z
  .object({
    account_id: z.string().min(1, 'Account ID is required'),
  })
  .strict();

export type GetAccountBalanceParams = z.infer<typeof GetAccountBalanceSchema>;

export async function fetchAccounts(
  ynabAPI: ynab.API,
  budgetId: string,
  signal?: AbortSignal,
): Promise<AccountRecord[]> {
  const response = await ynabAPI.accounts.getAccounts(budgetId, undefined, { signal });
  return decodeAccounts(response.data.accounts);
}

/**
 * Accounts from every budget on the account, in budget order. A budget whose
 * accounts cannot be listed is logged and skipped.
 */
export async function fetchAccountsAcrossBudgets(
  ynabAPI: ynab.API,
  logger: Logger = globalRequestLogger,
  signal?: AbortSignal,
): Promise<AccountRecord[]> {
  const budgets = await fetchBudgets(ynabAPI, signal);
  const accounts: AccountRecord[] = [];
  for (const budget of budgets) {
    signal?.throwIfAborted();
    try {
      accounts.push(...(await fetchAccounts(ynabAPI, budget.id, signal)));
    } catch (error) {
      signal?.throwIfAborted();
      logger.warn('Skipping budget whose accounts could not be listed', {
        budgetId: budget.id,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
  return accounts;
}

/**
 * Handles the ynab:get_accounts tool call
 * Renders open accounts grouped by type with asset, liability and net worth totals
 */
export async function handleGetAccounts(
  ynabAPI: ynab.API,
  params: GetAccountsParams,
  signal?: AbortSignal,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => {
      const accounts = await fetchAccounts(ynabAPI, params.budget_id, signal);
      const summary = groupAndSummarize(accounts);
      return {
        content: [{ type: 'text', text: renderAccountSummary(summary) }],
      };
    },
    'ynab:get_accounts',
    'listing accounts',
  );
}

/**
 * Handles the ynab:get_account_balance tool call
 * Returns the account's current balance as a decimal amount
 */
export async function handleGetAccountBalance(
  ynabAPI: ynab.API,
  preferences: PreferenceStore,
  params: GetAccountBalanceParams,
  signal?: AbortSignal,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => {
      const budgetId = await resolveActiveBudgetId(ynabAPI, preferences, signal);
      const response = await ynabAPI.accounts.getAccountById(budgetId, params.account_id, {
        signal,
      });
      const account = decodeAccount(response.data.account);

      return {
        content: [
          {
            type: 'text',
            text: responseFormatter.format({
              account_id: account.id,
              balance: milliunitsToAmount(account.balance),
            }),
          },
        ],
      };
    },
    'ynab:get_account_balance',
    'getting account balance',
  );
}
