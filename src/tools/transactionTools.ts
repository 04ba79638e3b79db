import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import * as ynab from 'ynab';
import { z } from 'zod/v4';
import { withToolErrorHandling } from '../types/index.js';
import type { PreferenceStore } from '../server/preferenceStore.js';
import { globalRequestLogger, type Logger } from '../server/requestLogger.js';
import { responseFormatter } from '../server/responseFormatter.js';
import {
  decodeTransaction,
  decodeTransactions,
  type TransactionRecord,
} from '../server/responseDecoder.js';
import { daysAgo, startOfMonth, toIsoDate } from '../utils/dates.js';
import { renderTable } from '../utils/markdownTable.js';
import { amountToMilliunits, formatMilliunits, milliunitsToAmount } from '../utils/money.js';
import { fetchAccounts } from './accountTools.js';
import { fetchBudgets, resolveActiveBudgetId } from './budgetTools.js';
import { fetchCategoryGroups } from './categoryTools.js';

export const ATTENTION_FILTERS = ['uncategorized', 'unapproved', 'both'] as const;
export type AttentionFilter = (typeof ATTENTION_FILTERS)[number];

export const TRANSACTION_ID_TYPES = [
  'id',
  'import_id',
  'transfer_transaction_id',
  'matched_transaction_id',
] as const;
export type TransactionIdType = (typeof TRANSACTION_ID_TYPES)[number];

export const DEFAULT_DAYS_BACK = 30;

/**
 * Schema for ynab:create_transaction tool parameters
 */
export const CreateTransactionSchema = z
  .object({
    account_id: z.string().min(1, 'Account ID is required'),
    amount: z.number().finite(),
    payee_name: z.string().min(1, 'Payee name is required'),
    category_name: z.string().optional(),
    memo: z.string().optional(),
  })
  .strict();

export type CreateTransactionParams = z.infer<typeof CreateTransactionSchema>;

/**
 * Schema for ynab:get_transactions tool parameters
 */
export const GetTransactionsSchema = z
  .object({
    budget_id: z.string().min(1, 'Budget ID is required'),
    account_id: z.string().min(1, 'Account ID is required'),
  })
  .strict();

export type GetTransactionsParams = z.infer<typeof GetTransactionsSchema>;

/**
 * Schema for ynab:get_transactions_needing_attention tool parameters
 */
export const GetTransactionsNeedingAttentionSchema = z
  .object({
    budget_id: z.string().min(1, 'Budget ID is required'),
    filter_type: z.enum(ATTENTION_FILTERS),
    days_back: z.number().int().min(1).default(DEFAULT_DAYS_BACK),
  })
  .strict();

export type GetTransactionsNeedingAttentionParams = z.infer<
  typeof GetTransactionsNeedingAttentionSchema
>;

/**
 * Schema for ynab:categorize_transaction tool parameters
 */
export const CategorizeTransactionSchema = z
  .object({
    budget_id: z.string().min(1, 'Budget ID is required'),
    transaction_id: z.string().min(1, 'Transaction ID is required'),
    category_id: z.string().min(1, 'Category ID is required'),
    id_type: z.enum(TRANSACTION_ID_TYPES).default('id'),
  })
  .strict();

export type CategorizeTransactionParams = z.infer<typeof CategorizeTransactionSchema>;

const API_TYPE_FILTERS = {
  uncategorized: ynab.GetTransactionsTypeEnum.Uncategorized,
  unapproved: ynab.GetTransactionsTypeEnum.Unapproved,
} as const;

const needsCategory = (transaction: TransactionRecord): boolean =>
  !transaction.category_id && !transaction.transfer_account_id;

const needsApproval = (transaction: TransactionRecord): boolean => !transaction.approved;

/**
 * Reasons a transaction shows up under the given filter; empty when it does not.
 */
export function attentionReasons(
  transaction: TransactionRecord,
  filter: AttentionFilter,
): string[] {
  if (transaction.deleted) return [];
  const reasons: string[] = [];
  if (filter !== 'unapproved' && needsCategory(transaction)) reasons.push('category');
  if (filter !== 'uncategorized' && needsApproval(transaction)) reasons.push('approval');
  return reasons;
}

export function renderTransactionTable(transactions: readonly TransactionRecord[]): string {
  return renderTable(
    ['Date', 'Payee', 'Category', 'Memo', 'Amount'],
    transactions.map((transaction) => [
      transaction.date,
      transaction.payee_name ?? '',
      transaction.category_name ?? '',
      transaction.memo ?? '',
      formatMilliunits(transaction.amount),
    ]),
    ['left', 'left', 'left', 'left', 'right'],
  );
}

export function renderAttentionTable(
  flagged: readonly { transaction: TransactionRecord; reasons: readonly string[] }[],
): string {
  return renderTable(
    ['ID', 'Date', 'Account', 'Payee', 'Amount', 'Category', 'Memo', 'Needs'],
    flagged.map(({ transaction, reasons }) => [
      transaction.id,
      transaction.date,
      transaction.account_name ?? '',
      transaction.payee_name ?? '',
      formatMilliunits(transaction.amount),
      transaction.category_name ?? '',
      transaction.memo ?? '',
      reasons.join(', '),
    ]),
    ['left', 'left', 'left', 'left', 'right', 'left', 'left', 'left'],
  );
}

async function findCategoryIdByName(
  ynabAPI: ynab.API,
  budgetId: string,
  categoryName: string,
  signal?: AbortSignal,
): Promise<string | undefined> {
  const wanted = categoryName.toLowerCase();
  const groups = await fetchCategoryGroups(ynabAPI, budgetId, signal);
  for (const group of groups) {
    const match = group.categories.find((category) => category.name.toLowerCase() === wanted);
    if (match) return match.id;
  }
  return undefined;
}

/**
 * Non-deleted transactions of one account dated on or after `since`
 */
export async function fetchAccountTransactionsSince(
  ynabAPI: ynab.API,
  budgetId: string,
  accountId: string,
  since: string,
  signal?: AbortSignal,
): Promise<TransactionRecord[]> {
  const response = await ynabAPI.transactions.getTransactionsByAccount(
    budgetId,
    accountId,
    since,
    undefined,
    undefined,
    { signal },
  );
  return decodeTransactions(response.data.transactions).filter(
    (transaction) => !transaction.deleted,
  );
}

/**
 * Finds the budget holding the account by listing its transactions in each
 * budget in turn. Budgets that reject the listing are skipped; the first
 * budget that yields transactions wins.
 */
export async function fetchAccountTransactionsAcrossBudgets(
  ynabAPI: ynab.API,
  accountId: string,
  since: string,
  logger: Logger = globalRequestLogger,
  signal?: AbortSignal,
): Promise<TransactionRecord[]> {
  const budgets = await fetchBudgets(ynabAPI, signal);
  for (const budget of budgets) {
    signal?.throwIfAborted();
    let transactions: TransactionRecord[];
    try {
      transactions = await fetchAccountTransactionsSince(
        ynabAPI,
        budget.id,
        accountId,
        since,
        signal,
      );
    } catch (error) {
      signal?.throwIfAborted();
      logger.debug('Account not listed in budget', {
        budgetId: budget.id,
        accountId,
        error: error instanceof Error ? error.message : String(error),
      });
      continue;
    }
    if (transactions.length > 0) return transactions;
  }
  return [];
}

/**
 * Walks the budget's accounts one at a time looking for a transaction whose
 * alternate id matches. Accounts whose transactions cannot be listed are skipped.
 */
export async function findTransactionByAlternateId(
  ynabAPI: ynab.API,
  budgetId: string,
  idType: Exclude<TransactionIdType, 'id'>,
  value: string,
  logger: Logger = globalRequestLogger,
  signal?: AbortSignal,
): Promise<TransactionRecord | undefined> {
  const accounts = await fetchAccounts(ynabAPI, budgetId, signal);
  for (const account of accounts) {
    signal?.throwIfAborted();
    let transactions: TransactionRecord[];
    try {
      const response = await ynabAPI.transactions.getTransactionsByAccount(
        budgetId,
        account.id,
        undefined,
        undefined,
        undefined,
        { signal },
      );
      transactions = decodeTransactions(response.data.transactions);
    } catch (error) {
      signal?.throwIfAborted();
      logger.warn('Skipping account while searching for transaction', {
        accountId: account.id,
        error: error instanceof Error ? error.message : String(error),
      });
      continue;
    }
    const match = transactions.find((transaction) => transaction[idType] === value);
    if (match) return match;
  }
  return undefined;
}

/**
 * Handles the ynab:create_transaction tool call
 * Creates a transaction dated today in the active budget
 */
export async function handleCreateTransaction(
  ynabAPI: ynab.API,
  preferences: PreferenceStore,
  params: CreateTransactionParams,
  signal?: AbortSignal,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => {
      const budgetId = await resolveActiveBudgetId(ynabAPI, preferences, signal);
      const amount = amountToMilliunits(params.amount);
      const categoryId = params.category_name
        ? await findCategoryIdByName(ynabAPI, budgetId, params.category_name, signal)
        : undefined;

      signal?.throwIfAborted();
      const response = await ynabAPI.transactions.createTransaction(
        budgetId,
        {
          transaction: {
            account_id: params.account_id,
            date: toIsoDate(new Date()),
            amount,
            payee_name: params.payee_name,
            memo: params.memo ?? null,
            category_id: categoryId ?? null,
          },
        },
        { signal },
      );
      const transaction = decodeTransaction(response.data.transaction);

      return {
        content: [
          {
            type: 'text',
            text: responseFormatter.format({
              ...transaction,
              amount: milliunitsToAmount(transaction.amount),
            }),
          },
        ],
      };
    },
    'ynab:create_transaction',
    'creating transaction',
  );
}

/**
 * Handles the ynab:get_transactions tool call
 * Lists an account's transactions since the first day of the current month
 */
export async function handleGetTransactions(
  ynabAPI: ynab.API,
  params: GetTransactionsParams,
  signal?: AbortSignal,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => {
      const since = startOfMonth();
      const transactions = await fetchAccountTransactionsSince(
        ynabAPI,
        params.budget_id,
        params.account_id,
        since,
        signal,
      );

      return {
        content: [
          {
            type: 'text',
            text: `# Transactions since ${since}\n\n${renderTransactionTable(transactions)}`,
          },
        ],
      };
    },
    'ynab:get_transactions',
    'listing transactions',
  );
}

/**
 * Handles the ynab:get_transactions_needing_attention tool call
 * Flags recent transactions that lack a category, an approval, or both
 */
export async function handleGetTransactionsNeedingAttention(
  ynabAPI: ynab.API,
  params: GetTransactionsNeedingAttentionParams,
  signal?: AbortSignal,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => {
      const since = daysAgo(params.days_back);
      const type =
        params.filter_type === 'both' ? undefined : API_TYPE_FILTERS[params.filter_type];
      const response = await ynabAPI.transactions.getTransactions(
        params.budget_id,
        since,
        type,
        undefined,
        { signal },
      );

      const flagged = decodeTransactions(response.data.transactions)
        .map((transaction) => ({
          transaction,
          reasons: attentionReasons(transaction, params.filter_type),
        }))
        .filter(({ reasons }) => reasons.length > 0);

      const text =
        flagged.length === 0
          ? `No transactions need attention in the last ${params.days_back} days.\n`
          : `# Transactions needing attention since ${since}\n\n${renderAttentionTable(flagged)}`;

      return { content: [{ type: 'text', text }] };
    },
    'ynab:get_transactions_needing_attention',
    'listing transactions needing attention',
  );
}

/**
 * Handles the ynab:categorize_transaction tool call
 * Looks the transaction up by the requested id type and sets its category
 */
export async function handleCategorizeTransaction(
  ynabAPI: ynab.API,
  params: CategorizeTransactionParams,
  logger: Logger = globalRequestLogger,
  signal?: AbortSignal,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => {
      let transactionId = params.transaction_id;

      if (params.id_type !== 'id') {
        const match = await findTransactionByAlternateId(
          ynabAPI,
          params.budget_id,
          params.id_type,
          params.transaction_id,
          logger,
          signal,
        );
        if (!match) {
          return {
            content: [
              {
                type: 'text',
                text: `Transaction not found: no transaction with ${params.id_type} ${params.transaction_id} in budget ${params.budget_id}`,
              },
            ],
          };
        }
        transactionId = match.id;
      }

      signal?.throwIfAborted();
      const response = await ynabAPI.transactions.updateTransaction(
        params.budget_id,
        transactionId,
        { transaction: { category_id: params.category_id } },
        { signal },
      );
      const updated = decodeTransaction(response.data.transaction);

      return {
        content: [
          {
            type: 'text',
            text: `Transaction ${updated.id} categorized as ${updated.category_name ?? params.category_id}`,
          },
        ],
      };
    },
    'ynab:categorize_transaction',
    'categorizing transaction',
  );
}
