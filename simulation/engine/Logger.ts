import type { LogLevel, SimTime } from '../types/simulation';

export interface LogRecord {
  level: Exclude<LogLevel, 'silent'>;
  module: string;
  simTime: SimTime;
  message: string;
  meta?: Record<string, unknown>;
}

export interface LogWriter {
  write(record: LogRecord): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function formatLogRecord(record: LogRecord): string {
  const meta = record.meta && Object.keys(record.meta).length > 0 ? ` ${JSON.stringify(record.meta)}` : '';
  return `[t=${record.simTime.toFixed(3)}] ${record.level.toUpperCase()} [${record.module}] ${record.message}${meta}`;
}

export const consoleWriter: LogWriter = {
  write(record) {
    const line = formatLogRecord(record);
    if (record.level === 'error') {
      console.error(line);
    } else if (record.level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  },
};

export class MemoryLogWriter implements LogWriter {
  readonly records: LogRecord[] = [];

  write(record: LogRecord): void {
    this.records.push(record);
  }

  messages(level?: LogRecord['level']): string[] {
    return this.records.filter((r) => !level || r.level === level).map((r) => r.message);
  }
}

export interface LoggerState {
  level: LogLevel;
  writer: LogWriter;
  clock: () => SimTime;
  closed: boolean;
}

export interface LoggerOptions {
  level?: LogLevel;
  writer?: LogWriter;
  clock?: () => SimTime;
}

export function createLogger(module: string, options: LoggerOptions = {}): Logger {
  return new Logger(module, {
    level: options.level ?? 'info',
    writer: options.writer ?? consoleWriter,
    clock: options.clock ?? (() => 0),
    closed: false,
  });
}

// Structured logger bound to one simulation run. Children share the run's level, writer, clock and lifecycle.
export class Logger {
  constructor(
    readonly module: string,
    private readonly state: LoggerState,
  ) {}

  child(module: string): Logger {
    return new Logger(module, this.state);
  }

  setClock(clock: () => SimTime): void {
    this.state.clock = clock;
  }

  setLevel(level: LogLevel): void {
    this.state.level = level;
  }

  close(): void {
    this.state.closed = true;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log('error', message, meta);
  }

  private log(level: LogRecord['level'], message: string, meta?: Record<string, unknown>): void {
    if (this.state.closed || LEVEL_ORDER[level] < LEVEL_ORDER[this.state.level]) {
      return;
    }
    this.state.writer.write({
      level,
      module: this.module,
      simTime: this.state.clock(),
      message,
      ...(meta ? { meta } : {}),
    });
  }
}
