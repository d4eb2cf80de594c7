import { randomUUID } from 'node:crypto';
import { ChangeEngineError } from '../errors/index.js';
import { isPlainObject } from '../utils/records.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  /** Line sink (default: stderr, so stdout stays free for command output) */
  write?: (line: string) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function serializeLogValue(value: unknown): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) return value.map(serializeLogValue);
  if (value instanceof ChangeEngineError) return value.toJSON();
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  if (value instanceof Date) return value.toISOString();
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = serializeLogValue(v);
    }
    return out;
  }
  return String(value);
}

function formatTextField(value: unknown): string {
  if (typeof value === 'string') return /\s/.test(value) ? JSON.stringify(value) : value;
  return JSON.stringify(value);
}

export class Logger {
  constructor(private readonly options: LoggerOptions = {}) {}

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.options.level ?? 'info'];
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

    const ts = new Date().toISOString();
    const { runId: rawRunId, ...fields } = extra ?? {};
    const runId = typeof rawRunId === 'string' ? rawRunId : undefined;

    const serialized: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(fields)) {
      serialized[k] = serializeLogValue(v);
    }

    const write = this.options.write ?? ((line: string) => process.stderr.write(`${line}\n`));

    if ((this.options.format ?? 'text') === 'json') {
      write(JSON.stringify({ ts, level, msg, ...(runId ? { runId } : {}), ...serialized }));
      return;
    }

    const runPart = runId ? ` run=${runId}` : '';
    const fieldPart = Object.entries(serialized)
      .filter(([, v]) => v !== undefined)
      .map(([k, v]) => ` ${k}=${formatTextField(v)}`)
      .join('');
    write(`[${ts}] ${level.toUpperCase()}${runPart} ${msg}${fieldPart}`);
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

export function createRunId(): string {
  return randomUUID();
}
