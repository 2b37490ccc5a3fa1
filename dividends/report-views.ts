import type { Category, ReportName, ReportView, SymbolGroup, TransactionRow } from './types.js';

export const REPORT_NAMES = ['sum', 'symbols', 'details', 'print', 'all'] as const satisfies readonly ReportName[];

const VIEW_BY_REPORT: Readonly<Record<ReportName, ReportView>> = {
  sum: 'totals',
  symbols: 'symbols',
  details: 'details',
  print: 'full-dump',
  all: 'full-dump',
};

const NO_DATA_NOTICES: Readonly<Record<Category, string>> = {
  dividend: 'No dividends found.',
  investment: 'No reinvestments found.',
};

export function reportViewFor(report: ReportName): ReportView {
  return VIEW_BY_REPORT[report];
}

export function noDataNotice(category: Category): string {
  return NO_DATA_NOTICES[category];
}

// Missing amounts count as zero; rounding happens only when a total is printed
export function sumAmounts(rows: readonly TransactionRow[]): number {
  return rows.reduce((total, row) => total + (row.amount ?? 0), 0);
}

export function groupBySymbol(rows: readonly TransactionRow[]): SymbolGroup[] {
  const groups = new Map<string, TransactionRow[]>();
  for (const row of rows) {
    const group = groups.get(row.symbol);
    if (group) {
      group.push(row);
    } else {
      groups.set(row.symbol, [row]);
    }
  }

  return [...groups].map(([symbol, groupRows]) => ({
    symbol,
    rows: groupRows,
    total: sumAmounts(groupRows),
  }));
}

function displaySymbol(symbol: string): string {
  return symbol || '(none)';
}

function formatAmount(amount: number | null): string {
  return amount === null ? 'n/a' : amount.toFixed(2);
}

export function formatTotal(symbol: string, total: number): string {
  return `Total Amount for ${displaySymbol(symbol)}: $${total.toFixed(2)}`;
}

export function formatRowListing(rows: readonly TransactionRow[]): string[] {
  type Cells = readonly [string, string, string];
  const header: Cells = ['Run Date', 'Symbol', 'Amount ($)'];
  const cells = rows.map((row): Cells => [
    row.runDate,
    displaySymbol(row.symbol),
    formatAmount(row.amount),
  ]);

  const widths = header.map((title, column) =>
    Math.max(title.length, ...cells.map(cell => cell[column].length))
  );
  const line = ([date, symbol, amount]: Cells) =>
    `${date.padEnd(widths[0])} | ${symbol.padEnd(widths[1])} | ${amount.padStart(widths[2])}`;

  return [line(header), ...cells.map(line)];
}

type ViewRenderer = (rows: readonly TransactionRow[]) => string[];

const RENDERERS: Readonly<Record<ReportView, ViewRenderer>> = {
  totals: rows => groupBySymbol(rows).map(group => formatTotal(group.symbol, group.total)),

  symbols: rows => [
    'Available Symbols:',
    ...groupBySymbol(rows).map(group => displaySymbol(group.symbol)),
  ],

  details: rows => groupBySymbol(rows).flatMap(group => [
    '',
    `Symbol: ${displaySymbol(group.symbol)}`,
    ...formatRowListing(group.rows),
    formatTotal(group.symbol, group.total),
  ]),

  'full-dump': rows => formatRowListing(rows),
};

// An empty row set renders as the no-data notice whatever the view
export function renderReport(
  view: ReportView,
  rows: readonly TransactionRow[],
  category: Category,
): string[] {
  if (rows.length === 0) {
    return [noDataNotice(category)];
  }
  return RENDERERS[view](rows);
}
