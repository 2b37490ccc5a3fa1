import { open, stat } from 'node:fs/promises';
import { CsvError } from 'csv-parse';
import { parse } from 'csv-parse/sync';
import { FileNotFoundError, InvalidFormatError, MissingColumnError } from './errors.js';
import type { Logger } from './logger.js';
import type { LoadedTransactions, TransactionRow } from './types.js';

// Fidelity "Accounts History" export columns:
//   Run Date, Action, Symbol, Description, Type, Price ($), Quantity,
//   Commission ($), Fees ($), Accrued Interest ($), Amount ($),
//   Cash Balance ($), Settlement Date
// Only these are interpreted; the rest are carried in `fields`.
export const COLUMNS = {
  runDate: 'Run Date',
  action: 'Action',
  symbol: 'Symbol',
  amount: 'Amount ($)',
} as const;

const REQUIRED_COLUMNS: readonly string[] = Object.values(COLUMNS);

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)(e[+-]?\d+)?$/i;

// Empty or non-numeric amounts become null instead of failing the load
export function parseAmount(raw: string | undefined): number | null {
  const cleaned = (raw ?? '').replace(/,/g, '').trim();
  if (!DECIMAL_PATTERN.test(cleaned)) {
    return null;
  }
  const value = Number(cleaned);
  return Number.isFinite(value) ? value : null;
}

async function readCsvText(filePath: string): Promise<string> {
  const info = await stat(filePath).catch(() => null);
  if (!info?.isFile()) {
    throw new FileNotFoundError(filePath);
  }

  const handle = await open(filePath, 'r');
  try {
    return await handle.readFile({ encoding: 'utf8' });
  } finally {
    await handle.close();
  }
}

function parseRecords(text: string, filePath: string): string[][] {
  if (!text.trim()) {
    throw new InvalidFormatError(filePath, 'file is empty');
  }
  try {
    const records: string[][] = parse(text, {
      bom: true,
      skip_empty_lines: true,
    });
    return records;
  } catch (error) {
    if (error instanceof CsvError) {
      throw new InvalidFormatError(filePath, error.message, { cause: error });
    }
    throw error;
  }
}

function toTransactionRow(columns: string[], record: string[]): TransactionRow {
  const fields: Record<string, string> = {};
  columns.forEach((column, index) => {
    fields[column] = record[index] ?? '';
  });

  return {
    runDate: (fields[COLUMNS.runDate] ?? '').trim(),
    action: (fields[COLUMNS.action] ?? '').trim(),
    symbol: (fields[COLUMNS.symbol] ?? '').trim(),
    amount: parseAmount(fields[COLUMNS.amount]),
    fields,
  };
}

export async function loadTransactions(
  filePath: string,
  logger?: Logger,
): Promise<LoadedTransactions> {
  logger?.debug(`Loading transactions from ${filePath}`);

  const text = await readCsvText(filePath);
  const [header, ...records] = parseRecords(text, filePath);
  if (!header) {
    throw new InvalidFormatError(filePath, 'no header row');
  }

  const columns = header.map(column => column.trim());
  const missing = REQUIRED_COLUMNS.filter(column => !columns.includes(column));
  if (missing.length > 0) {
    throw new MissingColumnError(filePath, missing);
  }

  const rows = records.map(record => toTransactionRow(columns, record));
  logger?.debug(`Loaded ${rows.length} transaction rows (${columns.length} columns)`);

  return { filePath, columns, rows };
}
