export type Category = 'dividend' | 'investment';

export type ReportName = 'sum' | 'symbols' | 'details' | 'print' | 'all';

export type ReportView = 'totals' | 'symbols' | 'details' | 'full-dump';

export interface TransactionRow {
  runDate: string;
  action: string;
  // '' when the export leaves the column blank
  symbol: string;
  // null marks an empty or non-numeric amount
  amount: number | null;
  // every source column, keyed by trimmed name
  fields: Readonly<Record<string, string>>;
}

export interface LoadedTransactions {
  filePath: string;
  columns: string[];
  rows: TransactionRow[];
}

export interface SymbolGroup {
  symbol: string;
  rows: TransactionRow[];
  total: number;
}
