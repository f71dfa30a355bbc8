/**
 * Structured leveled logger carrying the bootstrap run id.
 */

import type { Config } from '../config.js';

const LEVELS: Record<string, number> = {
  trace: 0,
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

const REDACTED = '***REDACTED***';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
export type LogFormat = 'json' | 'text';

export interface WritableOutput {
  write(s: string): void;
}

export interface LoggerOptions {
  name?: string;
  format?: LogFormat;
  level?: LogLevel;
  redactSensitive?: boolean;
  output?: WritableOutput;
}

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LEVELS;
}

export class Logger {
  private _name: string;
  private _format: LogFormat;
  private _levelValue: number;
  private _redactSensitive: boolean;
  private _output: WritableOutput;
  private _bootstrapId: string | null = null;

  constructor(options?: LoggerOptions) {
    this._name = options?.name ?? 'bootmark';
    this._format = options?.format ?? 'json';
    this._levelValue = LEVELS[options?.level ?? 'info'] ?? 20;
    this._redactSensitive = options?.redactSensitive ?? true;
    this._output = options?.output ?? { write: (s: string) => console.error(s) };
  }

  /** Builds a logger from the `logging.*` keys of a configuration. */
  static fromConfig(config: Config, options?: LoggerOptions): Logger {
    const level = config.get('logging.level');
    const format = config.get('logging.format');
    return new Logger({
      ...options,
      level: isLogLevel(level) ? level : options?.level,
      format: format === 'json' || format === 'text' ? format : options?.format,
    });
  }

  /** A copy of this logger that stamps every entry with `bootstrapId`. */
  forRun(bootstrapId: string, name?: string): Logger {
    const logger = new Logger({
      name: name ?? this._name,
      format: this._format,
      redactSensitive: this._redactSensitive,
      output: this._output,
    });
    logger._levelValue = this._levelValue;
    logger._bootstrapId = bootstrapId;
    return logger;
  }

  isEnabled(level: LogLevel): boolean {
    return (LEVELS[level] ?? 20) >= this._levelValue;
  }

  private _emit(levelName: LogLevel, message: string, extra?: Record<string, unknown> | null): void {
    if (!this.isEnabled(levelName)) return;

    let redactedExtra: Record<string, unknown> | null = extra ?? null;
    if (extra != null && this._redactSensitive) {
      redactedExtra = {};
      for (const [k, v] of Object.entries(extra)) {
        redactedExtra[k] = k.startsWith('_secret_') ? REDACTED : v;
      }
    }

    const now = new Date();
    if (this._format === 'json') {
      const entry: Record<string, unknown> = {
        timestamp: now.toISOString(),
        level: levelName,
        message,
        bootstrap_id: this._bootstrapId,
        logger: this._name,
        extra: redactedExtra,
      };
      this._output.write(JSON.stringify(entry) + '\n');
      return;
    }

    const ts = now.toISOString().replace('T', ' ').replace(/\.\d+Z$/, '');
    const run = this._bootstrapId ?? 'none';
    let extrasStr = '';
    if (redactedExtra) {
      extrasStr = ' ' + Object.entries(redactedExtra).map(([k, v]) => `${k}=${JSON.stringify(v)}`).join(' ');
    }
    this._output.write(`${ts} [${levelName.toUpperCase()}] [run=${run}] [${this._name}] ${message}${extrasStr}\n`);
  }

  trace(message: string, extra?: Record<string, unknown>): void {
    this._emit('trace', message, extra);
  }

  debug(message: string, extra?: Record<string, unknown>): void {
    this._emit('debug', message, extra);
  }

  info(message: string, extra?: Record<string, unknown>): void {
    this._emit('info', message, extra);
  }

  warn(message: string, extra?: Record<string, unknown>): void {
    this._emit('warn', message, extra);
  }

  error(message: string, extra?: Record<string, unknown>): void {
    this._emit('error', message, extra);
  }

  fatal(message: string, extra?: Record<string, unknown>): void {
    this._emit('fatal', message, extra);
  }
}
