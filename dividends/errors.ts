export type DividendReportErrorKind =
  | 'file-not-found'
  | 'invalid-format'
  | 'missing-column'
  | 'usage';

export class DividendReportError extends Error {
  constructor(
    readonly kind: DividendReportErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class FileNotFoundError extends DividendReportError {
  constructor(readonly filePath: string) {
    super('file-not-found', `File not found: ${filePath}`);
  }
}

export class InvalidFormatError extends DividendReportError {
  constructor(
    readonly filePath: string,
    detail: string,
    options?: { cause?: unknown; kind?: 'invalid-format' | 'missing-column' },
  ) {
    super(
      options?.kind ?? 'invalid-format',
      `Invalid CSV format in ${filePath}: ${detail}`,
      { cause: options?.cause },
    );
  }
}

export class MissingColumnError extends InvalidFormatError {
  constructor(
    filePath: string,
    readonly missingColumns: string[],
  ) {
    super(filePath, `missing column(s) ${missingColumns.map(c => `'${c}'`).join(', ')}`, {
      kind: 'missing-column',
    });
  }
}

export class UsageError extends DividendReportError {
  constructor(message: string) {
    super('usage', message);
  }
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof UsageError) {
    return 2;
  }
  return 1;
}
