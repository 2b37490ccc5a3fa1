import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';
import { LOG_LEVEL_ENV, main, parseCliArgs, runDividendReport, type CliIo } from './dividend-report.js';
import { UsageError } from './errors.js';

const fixture = (name: string) => fileURLToPath(new URL(`./__fixtures__/${name}`, import.meta.url));

function captureIo(env: CliIo['env'] = {}) {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const io: CliIo = {
    stdout: line => stdout.push(line),
    stderr: line => stderr.push(line),
    env,
  };
  return { io, stdout, stderr };
}

describe('parseCliArgs', () => {
  it('defaults to the dividend totals report', () => {
    expect(parseCliArgs(['History.csv'])).toEqual({
      report: 'sum',
      category: 'dividend',
      filePath: 'History.csv',
      symbol: undefined,
      logLevel: 'INFO',
    });
  });

  it('reads positionals from the right', () => {
    expect(parseCliArgs(['investment', 'History.csv'])).toMatchObject({
      report: 'sum',
      category: 'investment',
    });
    expect(parseCliArgs(['DETAILS', 'Investment', 'History.csv', '-s', ' vti ', '-l', 'debug'])).toEqual({
      report: 'details',
      category: 'investment',
      filePath: 'History.csv',
      symbol: 'vti',
      logLevel: 'DEBUG',
    });
  });

  it('takes the log level from the environment', () => {
    expect(parseCliArgs(['History.csv'], { [LOG_LEVEL_ENV]: 'warning' })?.logLevel).toBe('WARNING');
    expect(parseCliArgs(['History.csv', '--log-level', 'ERROR'], { [LOG_LEVEL_ENV]: 'DEBUG' })?.logLevel).toBe('ERROR');
  });

  it('keeps numeric-looking file names as strings', () => {
    expect(parseCliArgs(['2025'])?.filePath).toBe('2025');
  });

  it('returns null for help', () => {
    expect(parseCliArgs(['-h'])).toBeNull();
    expect(parseCliArgs(['--help', 'History.csv'])).toBeNull();
  });

  it('rejects bad arguments', () => {
    expect(() => parseCliArgs([])).toThrow(UsageError);
    expect(() => parseCliArgs(['sum', 'dividend', 'a.csv', 'b.csv'])).toThrow(UsageError);
    expect(() => parseCliArgs(['weekly', 'dividend', 'a.csv'])).toThrow(
      "Invalid report 'weekly'. Expected one of: sum, symbols, details, print, all",
    );
    expect(() => parseCliArgs(['interest', 'a.csv'])).toThrow(
      "Invalid category 'interest'. Expected one of: dividend, investment",
    );
    expect(() => parseCliArgs(['a.csv', '--log-level', 'TRACE'])).toThrow(UsageError);
    expect(() => parseCliArgs(['a.csv', '--symbol', 'AAA', '--symbol', 'BBB'])).toThrow(UsageError);
    expect(() => parseCliArgs(['a.csv', '--verbose'])).toThrow('Unknown option(s): --verbose');
  });
});

describe('runDividendReport', () => {
  const file = fixture('scenario.csv');

  it('totals dividend payouts without reversals', async () => {
    await expect(runDividendReport({ report: 'sum', category: 'dividend', filePath: file })).resolves.toEqual([
      'Total Amount for AAA: $8.00',
    ]);
  });

  it('totals reinvestments', async () => {
    await expect(runDividendReport({ report: 'sum', category: 'investment', filePath: file })).resolves.toEqual([
      'Total Amount for BBB: $-10.00',
    ]);
  });

  it('reports no data for a symbol without dividends', async () => {
    await expect(
      runDividendReport({ report: 'sum', category: 'dividend', filePath: file, symbol: 'bbb' }),
    ).resolves.toEqual(['No dividends found.']);
  });

  it('gives the same output for the same file', async () => {
    const options = { report: 'details', category: 'dividend', filePath: file } as const;
    const first = await runDividendReport(options);
    const second = await runDividendReport(options);

    expect(second).toEqual(first);
  });

  it('handles thousands separators, blank symbols and missing amounts', async () => {
    const mixed = fixture('mixed.csv');

    await expect(runDividendReport({ report: 'sum', category: 'dividend', filePath: mixed })).resolves.toEqual([
      'Total Amount for CCC: $1200.60',
      'Total Amount for ddd: $2.25',
      'Total Amount for (none): $0.20',
      'Total Amount for CCCD: $4.00',
    ]);
    await expect(runDividendReport({ report: 'sum', category: 'investment', filePath: mixed })).resolves.toEqual([
      'Total Amount for CCC: $-1200.50',
      'Total Amount for DDD: $0.00',
    ]);
  });

  it('filters on the exact ticker', async () => {
    await expect(
      runDividendReport({ report: 'all', category: 'dividend', filePath: fixture('mixed.csv'), symbol: 'ccc' }),
    ).resolves.toEqual([
      'Run Date   | Symbol | Amount ($)',
      '03/01/2025 | CCC    |    1200.50',
      '03/04/2025 | CCC    |       0.10',
    ]);
  });

  it('lists reinvestments with missing amounts', async () => {
    await expect(
      runDividendReport({ report: 'print', category: 'investment', filePath: fixture('mixed.csv'), symbol: 'DDD' }),
    ).resolves.toEqual([
      'Run Date   | Symbol | Amount ($)',
      '03/07/2025 | DDD    |        n/a',
    ]);
  });
});

describe('main', () => {
  it('prints the report to stdout and logs to stderr', async () => {
    const file = fixture('scenario.csv');
    const { io, stdout, stderr } = captureIo();

    await expect(main([file], io)).resolves.toBe(0);
    expect(stdout).toEqual(['Total Amount for AAA: $8.00']);
    expect(stderr).toEqual([`📄 Processing file: ${file} for action: dividend with report: sum`]);
  });

  it('exits 0 with the no-data notice when nothing matches', async () => {
    const { io, stdout } = captureIo();

    await expect(main(['symbols', 'investment', fixture('no-matches.csv')], io)).resolves.toBe(0);
    expect(stdout).toEqual(['No reinvestments found.']);
  });

  it('logs nothing below the chosen level', async () => {
    const { io, stdout, stderr } = captureIo();

    await expect(main([fixture('scenario.csv'), '--log-level', 'ERROR'], io)).resolves.toBe(0);
    expect(stdout).toEqual(['Total Amount for AAA: $8.00']);
    expect(stderr).toEqual([]);
  });

  it('exits 1 when the file is missing', async () => {
    const file = fixture('missing.csv');
    const { io, stdout, stderr } = captureIo({ [LOG_LEVEL_ENV]: 'ERROR' });

    await expect(main([file], io)).resolves.toBe(1);
    expect(stdout).toEqual([]);
    expect(stderr).toEqual([`❌ Error: File not found: ${file}`]);
  });

  it('exits 1 when the file cannot be parsed', async () => {
    const file = fixture('missing-symbol-column.csv');
    const { io, stderr } = captureIo({ [LOG_LEVEL_ENV]: 'ERROR' });

    await expect(main([file], io)).resolves.toBe(1);
    expect(stderr).toEqual([`❌ Error: Invalid CSV format in ${file}: missing column(s) 'Symbol'`]);
  });

  it('exits 2 with usage on bad arguments', async () => {
    const { io, stdout, stderr } = captureIo();

    await expect(main(['weekly', 'dividend', 'a.csv'], io)).resolves.toBe(2);
    expect(stdout).toEqual([]);
    expect(stderr[0]).toBe(
      "❌ Error: Invalid report 'weekly'. Expected one of: sum, symbols, details, print, all",
    );
    expect(stderr[1]).toContain('Usage: dividend-report.ts');
  });

  it('prints help', async () => {
    const { io, stdout } = captureIo();

    await expect(main(['--help'], io)).resolves.toBe(0);
    expect(stdout).toHaveLength(1);
    expect(stdout[0]).toContain('Usage: dividend-report.ts [options] [report] [category] <file_path>');
  });
});
