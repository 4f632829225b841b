export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

export interface LogEntry {
  level: LogLevel;
  category: string;
  timestamp: Date;
  msg: string;
  context?: Record<string, unknown>;
}

export interface Sink {
  write(entry: LogEntry): void;
  flush(): void;
}

export interface Logger {
  trace(msg: string): void;
  trace(obj: Record<string, unknown>, msg: string): void;
  debug(msg: string): void;
  debug(obj: Record<string, unknown>, msg: string): void;
  info(msg: string): void;
  info(obj: Record<string, unknown>, msg: string): void;
  warn(msg: string): void;
  warn(obj: Record<string, unknown>, msg: string): void;
  error(msg: string): void;
  error(obj: Record<string, unknown>, msg: string): void;
}

export interface LoggerConfig {
  level?: LogLevel;
  sinks?: Sink[];
}

/**
 * Make a context object safe to hand to sinks.
 * Errors keep name, message and stack; bigints become decimal strings
 * (minor-unit amounts are bigints); repeated object references are cut as circular.
 */
function serializeContext(obj: Record<string, unknown>): Record<string, unknown> {
  const seen = new WeakSet<object>();

  const replacer = (_key: string, value: unknown): unknown => {
    if (value instanceof Error) {
      return { name: value.name, message: value.message, stack: value.stack };
    }
    if (typeof value === 'bigint') {
      return value.toString();
    }
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) return '[Circular]';
      seen.add(value);
    }
    return value;
  };

  try {
    return JSON.parse(JSON.stringify(obj, replacer)) as Record<string, unknown>;
  } catch (error) {
    return { error: '[unserializable]', reason: error instanceof Error ? error.message : String(error) };
  }
}

let activeConfig: Required<LoggerConfig> = {
  level: 'info',
  sinks: [],
};

const categoryLoggers = new Map<string, Logger>();

class CategoryLogger implements Logger {
  constructor(private readonly category: string) {}

  trace(msgOrObj: string | Record<string, unknown>, msg?: string): void {
    this.emit('trace', msgOrObj, msg);
  }

  debug(msgOrObj: string | Record<string, unknown>, msg?: string): void {
    this.emit('debug', msgOrObj, msg);
  }

  info(msgOrObj: string | Record<string, unknown>, msg?: string): void {
    this.emit('info', msgOrObj, msg);
  }

  warn(msgOrObj: string | Record<string, unknown>, msg?: string): void {
    this.emit('warn', msgOrObj, msg);
  }

  error(msgOrObj: string | Record<string, unknown>, msg?: string): void {
    this.emit('error', msgOrObj, msg);
  }

  private emit(level: LogLevel, msgOrObj: string | Record<string, unknown>, msg?: string): void {
    // Config is read per call so loggers created at module load follow later initLogger calls
    if (activeConfig.sinks.length === 0 || !isEnabled(level, activeConfig.level)) return;

    const entry: LogEntry =
      typeof msgOrObj === 'string'
        ? { level, category: this.category, timestamp: new Date(), msg: msgOrObj }
        : {
            level,
            category: this.category,
            timestamp: new Date(),
            msg: msg ?? '',
            context: serializeContext(msgOrObj),
          };

    for (const sink of activeConfig.sinks) {
      sink.write(entry);
    }
  }
}

/** True when `level` passes the `threshold` */
export function isEnabled(level: LogLevel, threshold: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

/**
 * Replace the global logger configuration. Without sinks every logger is a no-op,
 * which is the state a consuming application starts in.
 */
export function initLogger(config: LoggerConfig): void {
  activeConfig = {
    level: config.level ?? 'info',
    sinks: config.sinks ?? [],
  };
  categoryLoggers.clear();
}

export function getLogger(category: string): Logger {
  const cached = categoryLoggers.get(category);
  if (cached) return cached;

  const logger = new CategoryLogger(category);
  categoryLoggers.set(category, logger);
  return logger;
}

export function flushLoggers(): void {
  for (const sink of activeConfig.sinks) {
    sink.flush();
  }
}
