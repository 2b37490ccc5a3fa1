#!/usr/bin/env node

import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import minimist from 'minimist';
import { z } from 'zod';
import { CATEGORIES, filterTransactions } from './dividend-classifier.js';
import { DividendReportError, UsageError, exitCodeFor } from './errors.js';
import { createLogger, LOG_LEVELS, type Logger, type LogLevel } from './logger.js';
import { REPORT_NAMES, renderReport, reportViewFor } from './report-views.js';
import { loadTransactions } from './transaction-loader.js';
import type { Category, ReportName } from './types.js';

export const LOG_LEVEL_ENV = 'DIVIDEND_REPORT_LOG_LEVEL';

export interface ReportOptions {
  report: ReportName;
  category: Category;
  filePath: string;
  symbol?: string;
}

export interface CliOptions extends ReportOptions {
  logLevel: LogLevel;
}

export interface CliIo {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  env: Readonly<Record<string, string | undefined>>;
}

const upper = (value: unknown) => (typeof value === 'string' ? value.toUpperCase() : value);
const lower = (value: unknown) => (typeof value === 'string' ? value.toLowerCase() : value);

const reportSchema = z.preprocess(lower, z.enum(REPORT_NAMES));
const categorySchema = z.preprocess(lower, z.enum(CATEGORIES));
const logLevelSchema = z.preprocess(upper, z.enum(LOG_LEVELS));
const symbolSchema = z.string().trim().min(1).optional();

function parseChoice<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  label: string,
  choices: readonly string[],
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new UsageError(
      `Invalid ${label} '${String(value)}'. Expected one of: ${choices.join(', ')}`,
    );
  }
  return result.data;
}

export function showHelp(): string {
  return `
Usage: dividend-report.ts [options] [report] [category] <file_path>

Report dividend payouts or dividend reinvestments per symbol from a Fidelity transaction CSV export.

Arguments:
  report                  ${REPORT_NAMES.join(' | ')} (default: sum)
  category                ${CATEGORIES.join(' | ')} (default: dividend)
  file_path               Path to the CSV export (required)

Options:
  -s, --symbol <symbol>   Only report this ticker (exact match, case-insensitive)
  -l, --log-level <level> ${LOG_LEVELS.join(' | ')} (default: INFO, or $${LOG_LEVEL_ENV})
  -h, --help              Show this help message

Examples:
  npm run dividends -- History_for_Account.csv
  npm run dividends -- details dividend History_for_Account.csv --symbol VTI
  npm run dividends -- all investment History_for_Account.csv --log-level DEBUG
`;
}

// Positionals are read from the right: the file path alone runs the defaults.
// null means help was requested.
export function parseCliArgs(
  argv: string[],
  env: CliIo['env'] = {},
): CliOptions | null {
  const unknownFlags: string[] = [];
  const args = minimist(argv, {
    string: ['symbol', 'log-level', '_'],
    boolean: ['help'],
    alias: { h: 'help', s: 'symbol', l: 'log-level' },
    unknown: arg => {
      if (arg.startsWith('-')) {
        unknownFlags.push(arg);
        return false;
      }
      return true;
    },
  });

  if (unknownFlags.length > 0) {
    throw new UsageError(`Unknown option(s): ${unknownFlags.join(', ')}`);
  }
  if (args.help === true) {
    return null;
  }

  const positionals = z.array(z.string()).parse(args._);
  if (positionals.length === 0) {
    throw new UsageError('A CSV file path is required.');
  }
  if (positionals.length > 3) {
    throw new UsageError(`Too many arguments: ${positionals.join(' ')}`);
  }

  const [filePath, category = 'dividend', report = 'sum'] = [...positionals].reverse();

  const symbolResult = symbolSchema.safeParse(args.symbol);
  if (!symbolResult.success) {
    throw new UsageError('--symbol expects a single, non-empty ticker.');
  }

  return {
    report: parseChoice(reportSchema, report, 'report', REPORT_NAMES),
    category: parseChoice(categorySchema, category, 'category', CATEGORIES),
    filePath,
    symbol: symbolResult.data,
    logLevel: parseChoice(
      logLevelSchema,
      args['log-level'] ?? env[LOG_LEVEL_ENV] ?? 'INFO',
      'log level',
      LOG_LEVELS,
    ),
  };
}

export async function runDividendReport(
  options: ReportOptions,
  logger: Logger = createLogger('WARNING'),
): Promise<string[]> {
  const { rows } = await loadTransactions(options.filePath, logger);
  const filtered = filterTransactions(rows, options.category, options.symbol);

  logger.debug(
    `${filtered.length} of ${rows.length} rows matched ${options.category}` +
      (options.symbol ? ` for symbol ${options.symbol}` : ''),
  );

  return renderReport(reportViewFor(options.report), filtered, options.category);
}

const defaultIo: CliIo = {
  stdout: line => console.log(line),
  stderr: line => console.error(line),
  env: process.env,
};

export async function main(argv: string[], io: CliIo = defaultIo): Promise<number> {
  let options: CliOptions | null;
  try {
    options = parseCliArgs(argv, io.env);
  } catch (error) {
    createLogger('INFO', io.stderr).error(
      `Error: ${error instanceof Error ? error.message : String(error)}`,
    );
    io.stderr(showHelp());
    return exitCodeFor(error);
  }

  if (!options) {
    io.stdout(showHelp());
    return 0;
  }

  const logger = createLogger(options.logLevel, io.stderr);
  logger.info(
    `Processing file: ${options.filePath} for action: ${options.category} with report: ${options.report}`,
  );

  try {
    const lines = await runDividendReport(options, logger);
    lines.forEach(line => io.stdout(line));
    return 0;
  } catch (error) {
    if (error instanceof DividendReportError) {
      logger.error(`Error: ${error.message}`);
    } else {
      logger.error(`Unexpected error: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
    }
    return exitCodeFor(error);
  }
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) {
    return false;
  }
  try {
    return realpathSync(script) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  process.exitCode = await main(process.argv.slice(2));
}
