export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  readonly level: LogLevel;
  readonly subsystem: string;
  readonly message: string;
  readonly timestamp: number;
  readonly context?: Record<string, unknown>;
}

export type LogWriter = (entry: LogEntry) => void;
export type NowFn = () => number;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const isLogLevel = (value: string): value is LogLevel => Object.hasOwn(LEVEL_RANK, value);

const toIsoTimestamp = (timestamp: number): string => new Date(timestamp).toISOString();

export const formatLogLine = (entry: LogEntry): string =>
  `${toIsoTimestamp(entry.timestamp)} [${entry.level.toUpperCase()}][${entry.subsystem}] ${entry.message}`;

const hasContext = (entry: LogEntry): entry is LogEntry & { context: Record<string, unknown> } =>
  entry.context !== undefined && Object.keys(entry.context).length > 0;

const bindConsole = <Key extends LogLevel>(method: Key): ((...parts: unknown[]) => void) => {
  const { console } = globalThis;
  const fallback = console.log.bind(console);
  const candidate = console[method]?.bind(console);
  return (candidate ?? fallback) as (...parts: unknown[]) => void;
};

const consoleSinks: Record<LogLevel, (...parts: unknown[]) => void> = {
  debug: bindConsole('debug'),
  info: bindConsole('info'),
  warn: bindConsole('warn'),
  error: bindConsole('error'),
};

export const defaultLogWriter: LogWriter = (entry) => {
  const sink = consoleSinks[entry.level];

  if (hasContext(entry)) {
    sink(formatLogLine(entry), entry.context);
    return;
  }

  sink(formatLogLine(entry));
};

/**
 * Sends every level to stderr so stdout stays reserved for command output.
 */
export const stderrLogWriter: LogWriter = (entry) => {
  if (hasContext(entry)) {
    console.error(formatLogLine(entry), entry.context);
    return;
  }

  console.error(formatLogLine(entry));
};

export interface Logger {
  readonly debug: (message: string, context?: Record<string, unknown>) => void;
  readonly info: (message: string, context?: Record<string, unknown>) => void;
  readonly warn: (message: string, context?: Record<string, unknown>) => void;
  readonly error: (message: string, context?: Record<string, unknown>) => void;
  readonly child: (subsystem: string) => Logger;
}

export interface LoggerOptions {
  readonly writer?: LogWriter;
  readonly now?: NowFn;
  /** Entries below this level are dropped */
  readonly level?: LogLevel;
}

const sanitizeSubsystem = (subsystem: string): string => subsystem.trim() || 'unknown';

const createLoggerForLevel = (
  level: LogLevel,
  subsystem: string,
  writer: LogWriter,
  now: NowFn,
  threshold: LogLevel,
): ((message: string, context?: Record<string, unknown>) => void) => {
  if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) {
    return () => undefined;
  }

  return (message, context) => {
    const entry: LogEntry = {
      level,
      subsystem,
      message,
      context,
      timestamp: now(),
    };
    writer(entry);
  };
};

export const createLogger = (subsystem: string, options: LoggerOptions = {}): Logger => {
  const writer = options.writer ?? defaultLogWriter;
  const now = options.now ?? Date.now;
  const threshold = options.level ?? 'debug';
  const normalized = sanitizeSubsystem(subsystem);

  const debug = createLoggerForLevel('debug', normalized, writer, now, threshold);
  const info = createLoggerForLevel('info', normalized, writer, now, threshold);
  const warn = createLoggerForLevel('warn', normalized, writer, now, threshold);
  const error = createLoggerForLevel('error', normalized, writer, now, threshold);

  const child: Logger['child'] = (suffix) => {
    const combined = `${normalized}:${sanitizeSubsystem(suffix)}`;
    return createLogger(combined, { writer, now, level: threshold });
  };

  return {
    debug,
    info,
    warn,
    error,
    child,
  };
};

export const rootLogger = createLogger('breakout', { level: 'info' });
