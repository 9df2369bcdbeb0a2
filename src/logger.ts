// src/logger.ts

import { EXCEPTION_CODES, FUNCTION_CODE_NAMES } from './constants/constants.js';
import { LogContext, LoggerInstance, LogLevel, LogRecord } from './types/modbus-types.js';

const HEADER_FIELDS: ReadonlySet<string> = new Set<string>([
  'logger',
  'unitId',
  'funcCode',
  'exceptionCode',
  'address',
  'quantity',
  'responseTime',
]);

export class Logger {
  private LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

  private currentLevel: LogLevel = 'info';
  private consoleOutput: boolean = true;

  private COLORS: Record<LogLevel | 'exception' | 'reset', string> = {
    trace: '\x1b[1;35m',
    debug: '\x1b[1;36m',
    info: '\x1b[1;32m',
    warn: '\x1b[1;33m',
    error: '\x1b[1;31m',
    exception: '\x1b[1;41m',
    reset: '\x1b[0m',
  };

  private globalContext: LogContext = {};
  private categoryLevels: Record<string, LogLevel | 'none'> = {};
  private watchCallback: ((record: LogRecord) => void) | null = null;

  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 19);
  }

  /**
   * Builds the console line: coloured header, message arguments, then any
   * context fields not already shown in the header as JSON.
   */
  private format(level: LogLevel, args: unknown[], context: LogContext = {}): string[] {
    const color: string = this.COLORS[level];
    const reset: string = this.COLORS.reset;
    const merged: LogContext = { ...this.globalContext, ...context };

    const headerParts: string[] = [`[${this.getTimestamp()}]`, `[${level.toUpperCase()}]`];
    if (merged.logger) headerParts.push(`[${merged.logger}]`);
    if (merged.unitId != null) {
      headerParts.push(`[U:${merged.unitId}]`);
    }
    if (merged.funcCode != null) {
      const funcName = FUNCTION_CODE_NAMES.get(merged.funcCode) ?? 'UNKNOWN';
      headerParts.push(`[F:0x${merged.funcCode.toString(16).padStart(2, '0')}/${funcName}]`);
    }
    if (merged.exceptionCode != null) {
      const exceptionName = EXCEPTION_CODES[merged.exceptionCode] ?? 'Unknown';
      headerParts.push(`${this.COLORS.exception}[E:${merged.exceptionCode}/${exceptionName}]${reset}${color}`);
    }
    if (merged.address != null) {
      headerParts.push(`[A:${merged.address}]`);
    }
    if (merged.quantity != null) {
      headerParts.push(`[Q:${merged.quantity}]`);
    }
    if (merged.responseTime != null) {
      headerParts.push(`[RT:${merged.responseTime}ms]`);
    }

    const formattedArgs: string[] = args.map(arg => {
      if (arg instanceof Error) {
        return `${arg.message}\n${arg.stack ?? ''}`.trim();
      }
      return String(arg);
    });

    const rest: LogContext = {};
    for (const [key, value] of Object.entries(context)) {
      if (!HEADER_FIELDS.has(key) && value !== undefined) rest[key] = value;
    }
    if (Object.keys(rest).length > 0) {
      formattedArgs.push(JSON.stringify(rest));
    }

    return [`${color}${headerParts.join('')}`, ...formattedArgs, reset];
  }

  private shouldLog(level: LogLevel, context: LogContext = {}): boolean {
    const category = context.logger;
    if (category !== undefined) {
      const categoryLevel = this.categoryLevels[category];
      if (categoryLevel === 'none') return false;
      if (categoryLevel !== undefined) {
        return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(categoryLevel);
      }
    }
    return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(this.currentLevel);
  }

  private output(level: LogLevel, args: unknown[], context: LogContext): void {
    if (!this.shouldLog(level, context)) return;

    this.watchCallback?.({ level, args, context });
    if (!this.consoleOutput) return;

    const formatted = this.format(level, args, context);
    // console.trace would print a stack for every record
    const method = level === 'trace' ? 'debug' : level;
    console[method](...formatted);
  }

  /**
   * Treats a trailing plain object as the log context.
   */
  private splitArgsAndContext(args: unknown[]): { args: unknown[]; context: LogContext } {
    if (args.length > 1) {
      const lastArg = args[args.length - 1];
      if (isLogContext(lastArg)) {
        return { args: args.slice(0, -1), context: lastArg };
      }
    }
    return { args, context: {} };
  }

  trace(...args: unknown[]): void {
    const split = this.splitArgsAndContext(args);
    this.output('trace', split.args, split.context);
  }

  debug(...args: unknown[]): void {
    const split = this.splitArgsAndContext(args);
    this.output('debug', split.args, split.context);
  }

  info(...args: unknown[]): void {
    const split = this.splitArgsAndContext(args);
    this.output('info', split.args, split.context);
  }

  warn(...args: unknown[]): void {
    const split = this.splitArgsAndContext(args);
    this.output('warn', split.args, split.context);
  }

  error(...args: unknown[]): void {
    const split = this.splitArgsAndContext(args);
    this.output('error', split.args, split.context);
  }

  setLevel(level: LogLevel): void {
    if (this.LEVELS.includes(level)) {
      this.currentLevel = level;
    } else {
      throw new Error(`Unknown log level: ${level}`);
    }
  }

  /**
   * Level for one named logger, overriding the global level; `'none'`
   * silences it.
   */
  setLevelFor(category: string, level: LogLevel | 'none'): void {
    if (level !== 'none' && !this.LEVELS.includes(level))
      throw new Error(`Unknown log level: ${level}`);
    this.categoryLevels[category] = level;
  }

  setConsoleOutput(on: boolean): void {
    this.consoleOutput = on;
  }

  addGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...this.globalContext, ...ctx };
  }

  /**
   * Receives every record that passes the level checks, printed or not.
   * Pass `null` to stop watching.
   */
  watch(callback: ((record: LogRecord) => void) | null): void {
    this.watchCallback = callback;
  }

  /**
   * Named child logger. `setLevelFor(name, ...)` sets its level.
   */
  createLogger(name: string): LoggerInstance {
    const withName = (args: unknown[]): unknown[] => {
      const split = this.splitArgsAndContext(args);
      return [...split.args, { ...split.context, logger: name }];
    };

    return {
      trace: (...args: unknown[]) => this.trace(...withName(args)),
      debug: (...args: unknown[]) => this.debug(...withName(args)),
      info: (...args: unknown[]) => this.info(...withName(args)),
      warn: (...args: unknown[]) => this.warn(...withName(args)),
      error: (...args: unknown[]) => this.error(...withName(args)),
    };
  }
}

function isLogContext(value: unknown): value is LogContext {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  if (value instanceof Error) return false;
  return Object.values(value).every(
    v =>
      v === undefined ||
      v === null ||
      typeof v === 'string' ||
      typeof v === 'number' ||
      typeof v === 'boolean'
  );
}

export const logger = new Logger();
