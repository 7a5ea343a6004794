/**
 * Levelled logger shared by every recorder component.
 *
 * Lines go to stderr, either as `[Component] LEVEL message {data}` or as one
 * JSON record per line when `--log-format json` is given.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';
export type LogSink = (line: string) => void;

const SEVERITY = ['debug', 'info', 'warn', 'error'] as const satisfies readonly LogLevel[];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  data?: Record<string, unknown>;
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  component?: string;
}

type Formatter = (entry: LogEntry) => string;

const formatters: Record<LogFormat, Formatter> = {
  text: ({ component, level, message, data }) =>
    `[${component}] ${level.toUpperCase().padEnd(5)} ${message}${data ? ` ${JSON.stringify(data)}` : ''}`,
  json: (entry) => JSON.stringify(entry),
};

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

function severity(level: LogLevel): number {
  return SEVERITY.indexOf(level);
}

/** Mutable state shared between a logger and the children it hands out. */
interface SinkState {
  level: LogLevel;
  format: LogFormat;
  sink: LogSink;
}

export class Logger {
  private readonly state: SinkState;
  private readonly component: string;

  constructor(options: LoggerOptions = {}) {
    this.state = {
      level: options.level ?? 'info',
      format: options.format ?? 'text',
      sink: stderrSink,
    };
    this.component = options.component ?? 'BagRecorder';
  }

  /** Logger for another component, writing through the same sink at the same level. */
  child(component: string): Logger {
    const child = new Logger({ level: this.state.level, format: this.state.format, component });
    child.state.sink = this.state.sink;
    return child;
  }

  /** Redirects output, mainly for tests. */
  setOutput(sink: LogSink): void {
    this.state.sink = sink;
  }

  getLevelName(): LogLevel {
    return this.state.level;
  }

  setLevel(level: LogLevel): void {
    this.state.level = level;
  }

  setFormat(format: LogFormat): void {
    this.state.format = format;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.emit('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.emit('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.emit('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.emit('error', message, data);
  }

  private emit(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (severity(level) < severity(this.state.level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      message,
    };
    if (data !== undefined && Object.keys(data).length > 0) entry.data = data;

    this.state.sink(formatters[this.state.format](entry));
  }
}

/** Process-wide logger; components take children of it. */
export const logger = new Logger();
