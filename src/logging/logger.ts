import { once } from 'events';
import { createWriteStream, type WriteStream } from 'fs';
import { ConfigurationError } from '../filesystem/errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';
export type LogData = Record<string, unknown>;

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
export const LOG_FORMATS: readonly LogFormat[] = ['text', 'json'];

export interface LoggerOptions {
  level: LogLevel;
  format: LogFormat;
  /** Omit the timestamp, as when writing to a terminal that adds its own. */
  omitTime?: boolean;
}

/** Where formatted lines go. */
export interface LogSink {
  write(line: string): void;
  close?(): Promise<void>;
}

class StreamSink implements LogSink {
  constructor(private stream: WriteStream) {
    // Nowhere left to log a failing log file but stderr.
    stream.on('error', error => {
      process.stderr.write(`log file ${String(stream.path)}: ${error.message}\n`);
    });
  }

  write(line: string): void {
    this.stream.write(line);
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.stream.end((error?: Error | null) => (error ? reject(error) : resolve()));
    });
  }
}

const stdoutSink: LogSink = {
  write(line: string): void {
    process.stdout.write(line);
  },
};

function formatValue(value: unknown): string {
  if (value instanceof Error) return JSON.stringify(value.message);
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'string') return /[\s"=]/.test(value) || value === '' ? JSON.stringify(value) : value;
  if (typeof value === 'object' && value !== null) return JSON.stringify(value);
  return String(value);
}

function jsonValue(value: unknown): unknown {
  return value instanceof Error ? value.message : value;
}

/**
 * Leveled logger writing one line per record, as `key=value` text or JSON.
 * A disabled logger accepts every call and writes nothing.
 */
export class Logger {
  private constructor(
    private readonly options: LoggerOptions,
    private readonly sink: LogSink | null,
    private readonly bindings: LogData = {}
  ) {}

  static create(options: LoggerOptions, sink: LogSink): Logger {
    return new Logger(options, sink);
  }

  /**
   * Open the log destination named in configuration: `''` disables logging,
   * `-` writes to stdout without timestamps, anything else is appended to as a file.
   * A file that cannot be opened fails here rather than on the first write.
   */
  static async fromFile(file: string, level: LogLevel, format: LogFormat): Promise<Logger> {
    if (file === '') {
      return Logger.disabled();
    }
    if (file === '-') {
      return new Logger({ level, format, omitTime: true }, stdoutSink);
    }
    const stream = createWriteStream(file, { flags: 'a', mode: 0o600 });
    try {
      await once(stream, 'open');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(`open log file: ${file}: ${reason}`, { cause: error });
    }
    return new Logger({ level, format }, new StreamSink(stream));
  }

  static disabled(): Logger {
    return new Logger({ level: 'error', format: 'text' }, null);
  }

  get enabled(): boolean {
    return this.sink !== null;
  }

  /** A logger that adds `bindings` to every record. */
  child(bindings: LogData): Logger {
    return new Logger(this.options, this.sink, { ...this.bindings, ...bindings });
  }

  debug(message: string, data?: LogData): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: LogData): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: LogData): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: LogData): void {
    this.log('error', message, data);
  }

  async close(): Promise<void> {
    await this.sink?.close?.();
  }

  private log(level: LogLevel, message: string, data?: LogData): void {
    if (!this.sink || LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.options.level)) {
      return;
    }

    const fields: LogData = { ...this.bindings, ...data };
    const time = this.options.omitTime ? undefined : new Date().toISOString();

    if (this.options.format === 'json') {
      const record: LogData = {};
      if (time) record.time = time;
      record.level = level.toUpperCase();
      record.msg = message;
      for (const [key, value] of Object.entries(fields)) {
        record[key] = jsonValue(value);
      }
      this.sink.write(`${JSON.stringify(record)}\n`);
      return;
    }

    const parts: string[] = [];
    if (time) parts.push(`time=${time}`);
    parts.push(`level=${level.toUpperCase()}`, `msg=${formatValue(message)}`);
    for (const [key, value] of Object.entries(fields)) {
      parts.push(`${key}=${formatValue(value)}`);
    }
    this.sink.write(`${parts.join(' ')}\n`);
  }
}
