import type { AccountRecord } from '../server/responseDecoder.js';
import { addMilli, formatMilliunits, milliunitsToAmount, type Milli } from './money.js';
import { renderTable } from './markdownTable.js';

/**
 * Display order for account groups. Accounts of any other type are left out
 * of the summary.
 */
export const ACCOUNT_TYPE_ORDER = [
  'checking',
  'savings',
  'creditCard',
  'mortgage',
  'autoLoan',
  'studentLoan',
  'otherAsset',
  'otherLiability',
] as const;

export type DisplayedAccountType = (typeof ACCOUNT_TYPE_ORDER)[number];

export const ACCOUNT_TYPE_LABELS: Record<DisplayedAccountType, string> = {
  checking: 'Checking Accounts',
  savings: 'Savings Accounts',
  creditCard: 'Credit Cards',
  mortgage: 'Mortgages',
  autoLoan: 'Auto Loans',
  studentLoan: 'Student Loans',
  otherAsset: 'Other Assets',
  otherLiability: 'Other Liabilities',
};

const ASSET_TYPES: ReadonlySet<string> = new Set(['checking', 'savings', 'otherAsset']);

export interface FormattedAccount {
  id: string;
  name: string;
  balance: string;
  balance_raw: number;
}

export interface AccountGroup {
  account_type: DisplayedAccountType;
  type: string;
  accounts: FormattedAccount[];
  total: string;
  total_raw: number;
}

export interface AccountSummary {
  accounts: AccountGroup[];
  summary: {
    total_assets: string;
    total_liabilities: string;
    net_worth: string;
  };
}

/**
 * Groups open accounts by type in display order and rolls up assets,
 * liabilities and net worth.
 */
export function groupAndSummarize(accounts: readonly AccountRecord[]): AccountSummary {
  const buckets = new Map<string, AccountRecord[]>();
  for (const account of accounts) {
    if (account.closed || account.deleted) continue;
    const bucket = buckets.get(account.type);
    if (bucket) {
      bucket.push(account);
    } else {
      buckets.set(account.type, [account]);
    }
  }

  const groups: AccountGroup[] = [];
  let totalAssets: Milli = 0;
  let totalLiabilities: Milli = 0;

  for (const accountType of ACCOUNT_TYPE_ORDER) {
    const bucket = buckets.get(accountType);
    if (!bucket || bucket.length === 0) continue;

    // Array.prototype.sort is stable, so equal balances keep API order
    const sorted = [...bucket].sort((a, b) => Math.abs(b.balance) - Math.abs(a.balance));
    const groupTotal = sorted.reduce<Milli>((sum, account) => addMilli(sum, account.balance), 0);

    if (ASSET_TYPES.has(accountType)) {
      totalAssets = addMilli(totalAssets, groupTotal);
    } else {
      totalLiabilities = addMilli(totalLiabilities, Math.abs(groupTotal));
    }

    groups.push({
      account_type: accountType,
      type: ACCOUNT_TYPE_LABELS[accountType],
      accounts: sorted.map((account) => ({
        id: account.id,
        name: account.name,
        balance: formatMilliunits(account.balance),
        balance_raw: milliunitsToAmount(account.balance),
      })),
      total: formatMilliunits(groupTotal),
      total_raw: milliunitsToAmount(groupTotal),
    });
  }

  return {
    accounts: groups,
    summary: {
      total_assets: formatMilliunits(totalAssets),
      total_liabilities: formatMilliunits(totalLiabilities),
      net_worth: formatMilliunits(totalAssets - totalLiabilities),
    },
  };
}

export function renderAccountSummary(summary: AccountSummary): string {
  const sections = ['# Account Summary', ''];

  for (const group of summary.accounts) {
    sections.push(`## ${group.type}`, '');
    sections.push(
      renderTable(
        ['Account Name', 'Balance', 'ID'],
        group.accounts.map((account) => [account.name, account.balance, account.id]),
        ['left', 'right', 'left'],
      ),
    );
    sections.push(`**Group Total:** ${group.total}`, '');
  }

  sections.push('## Summary', '');
  sections.push(`- **Total Assets:** ${summary.summary.total_assets}`);
  sections.push(`- **Total Liabilities:** ${summary.summary.total_liabilities}`);
  sections.push(`- **Net Worth:** ${summary.summary.net_worth}`);

  return sections.join('\n') + '\n';
}
