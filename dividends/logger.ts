export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARNING', 'ERROR'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogSink = (line: string) => void;

export interface Logger {
  readonly level: LogLevel;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const PREFIXES: Record<LogLevel, string> = {
  DEBUG: '🔍',
  INFO: '📄',
  WARNING: '⚠️ ',
  ERROR: '❌',
};

// stderr by default so stdout only carries the report
export function createLogger(
  level: LogLevel = 'INFO',
  sink: LogSink = line => console.error(line),
): Logger {
  const threshold = LOG_LEVELS.indexOf(level);

  const write = (messageLevel: LogLevel, message: string) => {
    if (LOG_LEVELS.indexOf(messageLevel) < threshold) {
      return;
    }
    sink(`${PREFIXES[messageLevel]} ${message}`);
  };

  return {
    level,
    debug: message => write('DEBUG', message),
    info: message => write('INFO', message),
    warn: message => write('WARNING', message),
    error: message => write('ERROR', message),
  };
}
