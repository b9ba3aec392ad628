export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  /** Prefix attached to every line, e.g. the component name. */
  scope?: string;
  write?: (line: string) => void;
}

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export class Logger {
  constructor(private opts: LoggerOptions = {}) {}

  child(scope: string): Logger {
    const parent = this.opts.scope;
    return new Logger({ ...this.opts, scope: parent ? `${parent}:${scope}` : scope });
  }

  debug(message: string, data?: unknown) {
    this.log('debug', message, data);
  }
  info(message: string, data?: unknown) {
    this.log('info', message, data);
  }
  warn(message: string, data?: unknown) {
    this.log('warn', message, data);
  }
  error(message: string, data?: unknown) {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: unknown) {
    const configured = this.opts.level ?? 'info';
    if (levelRank[level] < levelRank[configured]) return;

    const timestamp = new Date().toISOString();
    const write = this.opts.write ?? ((line: string) => process.stderr.write(line));
    const scope = this.opts.scope;

    if (this.opts.json) {
      write(`${JSON.stringify({ timestamp, level, scope, message, data })}\n`);
      return;
    }

    const head = scope ? `${timestamp} ${level} [${scope}] ${message}` : `${timestamp} ${level} ${message}`;
    const line = data === undefined ? head : `${head} ${safeJson(data)}`;
    write(`${line}\n`);
  }
}

/**
 * Logger configured from `CHANGEQ_LOG_LEVEL` / `CHANGEQ_LOG_JSON`; `--verbose` maps to debug.
 */
export function createLogger(scope?: string): Logger {
  const raw = process.env.CHANGEQ_LOG_LEVEL?.trim();
  const verbose = process.env.CHANGEQ_VERBOSE === '1';
  const level: LogLevel = isLogLevel(raw) ? raw : verbose ? 'debug' : 'warn';
  return new Logger({ level, json: process.env.CHANGEQ_LOG_JSON === '1', scope });
}

function isLogLevel(v: string | undefined): v is LogLevel {
  return v === 'debug' || v === 'info' || v === 'warn' || v === 'error';
}

function safeJson(v: unknown): string {
  try {
    return JSON.stringify(v);
  } catch {
    return '"[unserializable]"';
  }
}
