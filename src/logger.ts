/**
 * Structured logging for settings resolution.
 */

const LEVELS: Record<string, number> = {
  trace: 0,
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

const REDACTED = '***REDACTED***';
const SENSITIVE_KEY = /secret|password|token|access[-_]?key/i;

export const LOG_LEVEL_ENV_VAR = 'FLYTE_CONFIG_LOG_LEVEL';

export interface WritableOutput {
  write(s: string): void;
}

export interface LoggerOptions {
  name?: string;
  format?: 'json' | 'text';
  level?: string;
  redactSensitive?: boolean;
  output?: WritableOutput;
}

function redactRecord(record: object): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(record)) {
    out[k] = SENSITIVE_KEY.test(k) ? REDACTED : redactValue(v);
  }
  return out;
}

function redactValue(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(redactValue);
  if (value === null || typeof value !== 'object') return value;
  return redactRecord(value);
}

export class Logger {
  private _name: string;
  private _format: 'json' | 'text';
  private _level: string;
  private _levelValue: number;
  private _redactSensitive: boolean;
  private _output: WritableOutput;

  constructor(options?: LoggerOptions) {
    this._name = options?.name ?? 'flyte.config';
    this._format = options?.format ?? 'json';
    this._level = options?.level ?? 'info';
    this._levelValue = LEVELS[this._level] ?? 20;
    this._redactSensitive = options?.redactSensitive ?? true;
    this._output = options?.output ?? { write: (s: string) => console.error(s) };
  }

  get name(): string {
    return this._name;
  }

  get level(): string {
    return this._level;
  }

  isEnabled(levelName: string): boolean {
    return (LEVELS[levelName] ?? 20) >= this._levelValue;
  }

  private _emit(levelName: string, message: string, extra?: Record<string, unknown> | null): void {
    if (!this.isEnabled(levelName)) return;

    let safeExtra = extra ?? null;
    if (safeExtra !== null && this._redactSensitive) {
      safeExtra = redactRecord(safeExtra);
    }

    const now = new Date();
    if (this._format === 'json') {
      const entry: Record<string, unknown> = {
        timestamp: now.toISOString(),
        level: levelName,
        message,
        logger: this._name,
        extra: safeExtra,
      };
      this._output.write(JSON.stringify(entry) + '\n');
    } else {
      const ts = now.toISOString().replace('T', ' ').replace(/\.\d+Z$/, '');
      const lvl = levelName.toUpperCase();
      let extrasStr = '';
      if (safeExtra) {
        extrasStr = ' ' + Object.entries(safeExtra).map(([k, v]) => `${k}=${typeof v === 'object' ? JSON.stringify(v) : String(v)}`).join(' ');
      }
      this._output.write(`${ts} [${lvl}] [${this._name}] ${message}${extrasStr}\n`);
    }
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

let _logger: Logger | null = null;

/** Package logger, created on first use at the level named by FLYTE_CONFIG_LOG_LEVEL (default warn). */
export function getLogger(): Logger {
  if (_logger === null) {
    const requested = process.env[LOG_LEVEL_ENV_VAR]?.toLowerCase();
    _logger = new Logger({ level: requested !== undefined && requested in LEVELS ? requested : 'warn' });
  }
  return _logger;
}

/** Replaces the package logger; `null` restores the default on next use. */
export function setLogger(logger: Logger | null): void {
  _logger = logger;
}
