export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';

type LogRecord = {
  ts: string;
  level: LogLevel;
  msg: string;
  [key: string]: unknown;
};

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  /** Destination (default: stderr, so stdout stays free for reports) */
  stream?: NodeJS.WritableStream;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    const out: Record<string, unknown> = { name: value.name, message: value.message };
    if ('code' in value) out.code = value.code;
    return out;
  }
  return value;
}

function formatFields(fields: Record<string, unknown>): string {
  return Object.entries(fields)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => {
      const value = serializeValue(v);
      return `${k}=${typeof value === 'string' ? value : JSON.stringify(value)}`;
    })
    .join(' ');
}

export class Logger {
  constructor(private readonly options: LoggerOptions = {}) {}

  private shouldLog(level: LogLevel): boolean {
    const configured = this.options.level ?? 'info';
    return LEVEL_ORDER[level] >= LEVEL_ORDER[configured];
  }

  child(fields: Record<string, unknown>): Logger {
    const parent = this;
    return new (class extends Logger {
      override log(level: LogLevel, msg: string, extra?: Record<string, unknown>): void {
        parent.log(level, msg, { ...fields, ...(extra ?? {}) });
      }
    })(this.options);
  }

  log(level: LogLevel, msg: string, extra?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;

    const { ts: _ts, level: _level, msg: _msg, ...fields } = extra ?? {};
    const record: LogRecord = {
      ts: new Date().toISOString(),
      level,
      msg,
      ...fields,
    };
    const stream = this.options.stream ?? process.stderr;

    if ((this.options.format ?? 'text') === 'json') {
      const serialized = Object.fromEntries(
        Object.entries(record).map(([k, v]) => [k, serializeValue(v)])
      );
      stream.write(`${JSON.stringify(serialized)}\n`);
      return;
    }

    const fieldPart = formatFields(fields);
    stream.write(
      `[${record.ts}] ${level.toUpperCase()} ${msg}${fieldPart ? ` ${fieldPart}` : ''}\n`
    );
  }

  debug(msg: string, extra?: Record<string, unknown>) {
    this.log('debug', msg, extra);
  }
  info(msg: string, extra?: Record<string, unknown>) {
    this.log('info', msg, extra);
  }
  warn(msg: string, extra?: Record<string, unknown>) {
    this.log('warn', msg, extra);
  }
  error(msg: string, extra?: Record<string, unknown>) {
    this.log('error', msg, extra);
  }
}
