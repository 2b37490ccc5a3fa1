import type { Category, TransactionRow } from './types.js';

export const CATEGORIES = ['dividend', 'investment'] as const satisfies readonly Category[];

const ACTION_KEYWORDS: Record<Category, string> = {
  dividend: 'DIVIDEND',
  investment: 'REINVESTMENT',
};

export function matchesCategory(row: TransactionRow, category: Category): boolean {
  const actionUpper = row.action.toUpperCase();
  if (!actionUpper.includes(ACTION_KEYWORDS[category])) {
    return false;
  }

  // Reversals show up as negative dividends; keep payouts only
  if (category === 'dividend') {
    return row.amount !== null && row.amount >= 0;
  }
  return true;
}

// Exact ticker match, ignoring case
export function matchesSymbol(row: TransactionRow, symbol: string): boolean {
  return row.symbol.toUpperCase() === symbol.trim().toUpperCase();
}

export function filterTransactions(
  rows: readonly TransactionRow[],
  category: Category,
  symbol?: string,
): TransactionRow[] {
  const symbolFilter = symbol?.trim();
  return rows.filter(row =>
    matchesCategory(row, category) && (!symbolFilter || matchesSymbol(row, symbolFilter))
  );
}
