import pc from 'picocolors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogEntry {
  time: Date;
  level: LogLevel;
  message: string;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type LogSink = (entry: LogEntry) => void;

type Colors = ReturnType<typeof pc.createColors>;

const LEVEL_TAGS: Record<LogLevel, (colors: Colors) => string> = {
  debug: (c) => c.dim('DEBUG'),
  info: (c) => c.cyan('INFO '),
  warn: (c) => c.yellow('WARN '),
  error: (c) => c.red('ERROR'),
};

export function formatLogLine(entry: LogEntry, colors: Colors = pc): string {
  return `${colors.dim(entry.time.toISOString())} ${LEVEL_TAGS[entry.level](colors)} ${entry.message}`;
}

const consoleSink: LogSink = (entry) => {
  const line = formatLogLine(entry);
  if (LEVEL_ORDER[entry.level] >= LEVEL_ORDER.warn) {
    console.error(line);
  } else {
    console.log(line);
  }
};

export function createLogger(options: { level?: LogLevel; sink?: LogSink } = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const sink = options.sink ?? consoleSink;

  const write = (level: LogLevel, message: string) => {
    if (LEVEL_ORDER[level] < threshold) return;
    sink({ time: new Date(), level, message });
  };

  return {
    debug: (message) => write('debug', message),
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
  };
}

/**
 * Log the settings a polling run starts with
 */
export function logPollStart(
  logger: Logger,
  options: { username: string; repositoryPath: string; documentFile: string; intervalMs: number }
): void {
  logger.info('═══════════════════════════════════════════════════════════');
  logger.info('  Starting Now Playing sync');
  logger.info(`  Last.fm user: ${options.username}`);
  logger.info(`  Repository:   ${options.repositoryPath}`);
  logger.info(`  Document:     ${options.documentFile}`);
  logger.info(`  Interval:     ${(options.intervalMs / 1000).toFixed(0)}s`);
  logger.info('═══════════════════════════════════════════════════════════');
}
