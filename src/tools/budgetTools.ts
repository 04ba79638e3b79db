import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type * as ynab from 'ynab';
import { z } from 'zod/v4';
import { withToolErrorHandling } from '../types/index.js';
import type { PreferenceStore } from '../server/preferenceStore.js';
import { decodeBudgets, type BudgetRecord } from '../server/responseDecoder.js';
import { NotFoundError } from '../utils/errors.js';

/**
 * Schema for ynab:get_budgets tool parameters
 */
export const GetBudgetsSchema = z.object({}).strict();

export type GetBudgetsParams = z.infer<typeof GetBudgetsSchema>;

/**
 * Schema for ynab:set_preferred_budget_id tool parameters
 */
export const SetPreferredBudgetIdSchema = z
  .object({
    budget_id: z.string().min(1, 'Budget ID is required'),
  })
  .strict();

export type SetPreferredBudgetIdParams = z.infer<typeof SetPreferredBudgetIdSchema>;

export async function fetchBudgets(
  ynabAPI: ynab.API,
  signal?: AbortSignal,
): Promise<BudgetRecord[]> {
  const response = await ynabAPI.budgets.getBudgets(undefined, { signal });
  return decodeBudgets(response.data.budgets);
}

/**
 * Budget used by tools that take no budget id: the preferred budget when one
 * is stored, otherwise the first budget on the account.
 */
export async function resolveActiveBudgetId(
  ynabAPI: ynab.API,
  preferences: PreferenceStore,
  signal?: AbortSignal,
): Promise<string> {
  const preferred = preferences.get();
  if (preferred) {
    return preferred;
  }
  const [first] = await fetchBudgets(ynabAPI, signal);
  if (!first) {
    throw new NotFoundError('No budgets found in your YNAB account');
  }
  return first.id;
}

export function renderBudgetList(budgets: readonly BudgetRecord[], preferredId?: string): string {
  if (budgets.length === 0) {
    return 'No budgets found in your YNAB account.\n';
  }
  const lines = ['# YNAB Budgets', ''];
  for (const budget of budgets) {
    const marker = budget.id === preferredId ? ' **(preferred)**' : '';
    lines.push(`- **${budget.name}** (ID: \`${budget.id}\`)${marker}`);
  }
  return lines.join('\n') + '\n';
}

/**
 * Handles the ynab:get_budgets tool call
 * Lists every budget on the account as markdown
 */
export async function handleGetBudgets(
  ynabAPI: ynab.API,
  preferences: PreferenceStore,
  signal?: AbortSignal,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => {
      const budgets = await fetchBudgets(ynabAPI, signal);
      return {
        content: [{ type: 'text', text: renderBudgetList(budgets, preferences.get()) }],
      };
    },
    'ynab:get_budgets',
    'listing budgets',
  );
}

/**
 * Handles the ynab:set_preferred_budget_id tool call
 * Stores the budget id locally; the id is not checked against YNAB
 */
export async function handleSetPreferredBudgetId(
  preferences: PreferenceStore,
  params: SetPreferredBudgetIdParams,
  signal?: AbortSignal,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => {
      signal?.throwIfAborted();
      preferences.set(params.budget_id);
      return {
        content: [{ type: 'text', text: `Preferred budget ID set to ${params.budget_id}` }],
      };
    },
    'ynab:set_preferred_budget_id',
    'saving preferred budget',
  );
}
