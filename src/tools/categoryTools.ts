import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type * as ynab from 'ynab';
import { z } from 'zod/v4';
import { withToolErrorHandling } from '../types/index.js';
import type { CategoryCache, CategoryCacheEntry } from '../server/categoryCache.js';
import { decodeCategoryGroups, type CategoryGroupRecord } from '../server/responseDecoder.js';
import { renderTable } from '../utils/markdownTable.js';
import { formatMilliunits } from '../utils/money.js';

/**
 * Schema for ynab:get_categories tool parameters
 */
export const GetCategoriesSchema = z
  .object({
    budget_id: z.string().min(1, 'Budget ID is required'),
  })
  .strict();

export type GetCategoriesParams = z.infer<typeof GetCategoriesSchema>;

/**
 * Schema for ynab:cache_categories tool parameters
 */
export const CacheCategoriesSchema = z
  .object({
    budget_id: z.string().min(1, 'Budget ID is required'),
  })
  .strict();

export type CacheCategoriesParams = z.infer<typeof CacheCategoriesSchema>;

export async function fetchCategoryGroups(
  ynabAPI: ynab.API,
  budgetId: string,
  signal?: AbortSignal,
): Promise<CategoryGroupRecord[]> {
  const response = await ynabAPI.categories.getCategories(budgetId, undefined, { signal });
  return decodeCategoryGroups(response.data.category_groups);
}

/**
 * Flatten groups into cache entries, skipping deleted groups and categories
 */
export function toCategorySummaries(groups: readonly CategoryGroupRecord[]): CategoryCacheEntry[] {
  return groups
    .filter((group) => !group.deleted)
    .flatMap((group) =>
      group.categories
        .filter((category) => !category.deleted)
        .map((category) => ({ id: category.id, name: category.name, group: group.name })),
    );
}

export function renderCategoryGroups(groups: readonly CategoryGroupRecord[]): string {
  const sections = ['# Categories', ''];

  for (const group of groups) {
    if (group.hidden || group.deleted) continue;
    const visible = group.categories.filter((category) => !category.hidden && !category.deleted);
    if (visible.length === 0) continue;

    sections.push(`## ${group.name}`, '');
    sections.push(
      renderTable(
        ['Category', 'Budgeted', 'Activity', 'Balance', 'ID'],
        visible.map((category) => [
          category.name,
          formatMilliunits(category.budgeted),
          formatMilliunits(category.activity),
          formatMilliunits(category.balance),
          category.id,
        ]),
        ['left', 'right', 'right', 'right', 'left'],
      ),
    );
  }

  return sections.join('\n');
}

/**
 * Handles the ynab:get_categories tool call
 * Renders one markdown table per visible category group
 */
export async function handleGetCategories(
  ynabAPI: ynab.API,
  params: GetCategoriesParams,
  signal?: AbortSignal,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => {
      const groups = await fetchCategoryGroups(ynabAPI, params.budget_id, signal);
      return {
        content: [{ type: 'text', text: renderCategoryGroups(groups) }],
      };
    },
    'ynab:get_categories',
    'listing categories',
  );
}

/**
 * Handles the ynab:cache_categories tool call
 * Replaces the locally cached category list for the budget
 */
export async function handleCacheCategories(
  ynabAPI: ynab.API,
  cache: CategoryCache,
  params: CacheCategoriesParams,
  signal?: AbortSignal,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => {
      const groups = await fetchCategoryGroups(ynabAPI, params.budget_id, signal);
      const summaries = toCategorySummaries(groups);

      signal?.throwIfAborted();
      cache.refresh(params.budget_id, summaries);

      return {
        content: [
          {
            type: 'text',
            text: `Cached ${summaries.length} categories for budget ${params.budget_id}`,
          },
        ],
      };
    },
    'ynab:cache_categories',
    'caching categories',
  );
}
