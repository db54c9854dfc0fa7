/**
 * Structured Logger
 *
 * JSON lines with run/job context. Child loggers inherit and extend context.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export interface LogContext {
  runId?: string;
  jobId?: string;
  [key: string]: unknown;
}

export interface Logger {
  info(context: LogContext, message: string): void;
  warn(context: LogContext, message: string): void;
  error(context: LogContext, message: string): void;
  debug(context: LogContext, message: string): void;
  child(context: LogContext): Logger;
}

export type LogSink = (line: string) => void;

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

// =============================================================================
// JSON LOGGER
// =============================================================================

export class JsonLogger implements Logger {
  private context: LogContext;
  private level: LogLevel;
  private sink: LogSink;

  constructor(context: LogContext = {}, level: LogLevel = 'info', sink: LogSink = defaultSink) {
    this.context = context;
    this.level = level;
    this.sink = sink;
  }

  private shouldLog(level: Exclude<LogLevel, 'silent'>): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  private log(level: Exclude<LogLevel, 'silent'>, context: LogContext, message: string): void {
    if (!this.shouldLog(level)) return;

    const entry: Record<string, unknown> = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.context,
      ...context,
    };

    const cleaned = Object.fromEntries(
      Object.entries(entry).filter(([, v]) => v !== undefined)
    );

    if (cleaned.error instanceof Error) {
      cleaned.error = {
        name: cleaned.error.name,
        message: cleaned.error.message,
        stack: cleaned.error.stack,
      };
    } else if (cleaned.error !== undefined && cleaned.error !== null) {
      cleaned.error = String(cleaned.error);
    }

    this.sink(serialize(cleaned));
  }

  info(context: LogContext, message: string): void {
    this.log('info', context, message);
  }

  warn(context: LogContext, message: string): void {
    this.log('warn', context, message);
  }

  error(context: LogContext, message: string): void {
    this.log('error', context, message);
  }

  debug(context: LogContext, message: string): void {
    this.log('debug', context, message);
  }

  child(context: LogContext): Logger {
    return new JsonLogger({ ...this.context, ...context }, this.level, this.sink);
  }
}

/**
 * JSON.stringify that never throws: repeated references become "[Circular]",
 * bigints become strings.
 */
function serialize(entry: Record<string, unknown>): string {
  const seen = new WeakSet<object>();
  try {
    return JSON.stringify(entry, (_key, value: unknown) => {
      if (typeof value === 'bigint') return value.toString();
      if (typeof value === 'object' && value !== null) {
        if (seen.has(value)) return '[Circular]';
        seen.add(value);
      }
      return value;
    });
  } catch (err) {
    // toJSON() implementations can still throw
    return JSON.stringify({
      timestamp: entry.timestamp,
      level: entry.level,
      message: entry.message,
      serializationError: err instanceof Error ? err.message : String(err),
    });
  }
}

function defaultSink(line: string): void {
  console.log(line);
}

// =============================================================================
// FACTORY
// =============================================================================

export function createLogger(options?: {
  level?: LogLevel;
  service?: string;
  sink?: LogSink;
}): Logger {
  return new JsonLogger(
    { service: options?.service ?? 'inkline' },
    options?.level ?? 'info',
    options?.sink
  );
}
