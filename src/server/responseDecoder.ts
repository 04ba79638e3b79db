/**
 * Decodes YNAB SDK payloads into the canonical records used throughout the tools.
 * Everything downstream of this module works with these shapes only.
 */

import { z } from 'zod/v4';
import { fromZodError } from 'zod-validation-error';
import { ValidationError } from '../utils/errors.js';

const nullableString = z
  .string()
  .nullish()
  .transform((value) => value ?? null);

const milliunits = z.number().int();

export const BudgetRecordSchema = z.object({
  id: z.string(),
  name: z.string(),
  last_modified_on: nullableString,
});

export const AccountRecordSchema = z.object({
  id: z.string(),
  name: z.string(),
  type: z.string(),
  on_budget: z.boolean().default(true),
  balance: milliunits,
  closed: z.boolean().default(false),
  deleted: z.boolean().default(false),
});

export const TransactionRecordSchema = z.object({
  id: z.string(),
  date: z.string(),
  amount: milliunits,
  memo: nullableString,
  cleared: z.string().default('uncleared'),
  approved: z.boolean().default(false),
  account_id: z.string(),
  account_name: nullableString,
  payee_id: nullableString,
  payee_name: nullableString,
  category_id: nullableString,
  category_name: nullableString,
  transfer_account_id: nullableString,
  transfer_transaction_id: nullableString,
  matched_transaction_id: nullableString,
  import_id: nullableString,
  deleted: z.boolean().default(false),
});

export const CategoryRecordSchema = z.object({
  id: z.string(),
  category_group_id: z.string(),
  name: z.string(),
  hidden: z.boolean().default(false),
  deleted: z.boolean().default(false),
  budgeted: milliunits.default(0),
  activity: milliunits.default(0),
  balance: milliunits.default(0),
});

export const CategoryGroupRecordSchema = z.object({
  id: z.string(),
  name: z.string(),
  hidden: z.boolean().default(false),
  deleted: z.boolean().default(false),
  categories: z.array(CategoryRecordSchema).default([]),
});

export type BudgetRecord = z.infer<typeof BudgetRecordSchema>;
export type AccountRecord = z.infer<typeof AccountRecordSchema>;
export type TransactionRecord = z.infer<typeof TransactionRecordSchema>;
export type CategoryRecord = z.infer<typeof CategoryRecordSchema>;
export type CategoryGroupRecord = z.infer<typeof CategoryGroupRecordSchema>;

function decode<T>(schema: z.ZodType<T>, payload: unknown, label: string): T {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new ValidationError(
      `Unexpected YNAB response for ${label}`,
      fromZodError(result.error).message,
    );
  }
  return result.data;
}

export const decodeBudgets = (payload: unknown): BudgetRecord[] =>
  decode(z.array(BudgetRecordSchema), payload, 'budgets');

export const decodeAccounts = (payload: unknown): AccountRecord[] =>
  decode(z.array(AccountRecordSchema), payload, 'accounts');

export const decodeAccount = (payload: unknown): AccountRecord =>
  decode(AccountRecordSchema, payload, 'account');

export const decodeTransactions = (payload: unknown): TransactionRecord[] =>
  decode(z.array(TransactionRecordSchema), payload, 'transactions');

export const decodeTransaction = (payload: unknown): TransactionRecord =>
  decode(TransactionRecordSchema, payload, 'transaction');

export const decodeCategoryGroups = (payload: unknown): CategoryGroupRecord[] =>
  decode(z.array(CategoryGroupRecordSchema), payload, 'category groups');
