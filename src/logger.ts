// src/logger.ts

import { format as formatArgs } from 'node:util';
import { describeExceptionCode, describeFunctionCode } from './constants/constants.js';
import { LogContext, LoggerInstance, LogLevel, LogRecord } from './types/modbus-types.js';

type LogField = 'timestamp' | 'level' | 'logger' | 'unitId' | 'funcCode' | 'exceptionCode' | 'address' | 'quantity' | 'responseTime';

const LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

const HEADER_FIELDS: readonly string[] = [
  'logger',
  'unitId',
  'funcCode',
  'exceptionCode',
  'address',
  'quantity',
  'responseTime',
];

export function isLogLevel(value: unknown): value is LogLevel {
  return LEVELS.some(level => level === value);
}

function isContextValue(value: unknown): value is string | number | boolean | null | undefined {
  return (
    value === null ||
    value === undefined ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}

function isLogContext(value: unknown): value is LogContext {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  if (value instanceof Error || value instanceof Uint8Array) return false;
  return Object.values(value).every(isContextValue);
}

/**
 * Category logger writing to stderr. Stdout is left alone: it carries the
 * MCP stdio protocol when the gateway runs as a server.
 */
class Logger {
  private currentLevel: LogLevel = 'info';
  private enabled: boolean = true;
  private useColors: boolean = true;

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
  private logCounts: Record<LogLevel, number> = { trace: 0, debug: 0, info: 0, warn: 0, error: 0 };
  private logFormat: LogField[] = [
    'timestamp',
    'level',
    'logger',
    'unitId',
    'funcCode',
    'exceptionCode',
    'address',
    'quantity',
    'responseTime',
  ];
  private watchCallback: ((record: LogRecord) => void) | null = null;
  private sink: (line: string) => void = line => {
    process.stderr.write(`${line}\n`);
  };

  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 23);
  }

  /**
   * Formats a log line: bracketed header fields, then the message, then
   * whatever context keys are not part of the header as JSON.
   */
  format(level: LogLevel, args: unknown[], context: LogContext = {}): string {
    const color: string = this.useColors ? this.COLORS[level] : '';
    const reset: string = this.useColors ? this.COLORS.reset : '';
    const merged: LogContext = { ...this.globalContext, ...context };

    const headerParts: string[] = [];
    if (this.logFormat.includes('timestamp')) headerParts.push(`[${this.getTimestamp()}]`);
    if (this.logFormat.includes('level')) headerParts.push(`[${level.toUpperCase()}]`);
    if (this.logFormat.includes('logger') && merged.logger) {
      headerParts.push(`[${merged.logger}]`);
    }
    if (this.logFormat.includes('unitId') && merged.unitId != null) {
      headerParts.push(`[U:${merged.unitId}]`);
    }
    if (this.logFormat.includes('funcCode') && merged.funcCode != null) {
      const code = `0x${merged.funcCode.toString(16).padStart(2, '0')}`;
      headerParts.push(`[F:${code}/${describeFunctionCode(merged.funcCode)}]`);
    }
    if (this.logFormat.includes('exceptionCode') && merged.exceptionCode != null) {
      const highlight = this.useColors ? this.COLORS.exception : '';
      headerParts.push(
        `${highlight}[E:${merged.exceptionCode}/${describeExceptionCode(merged.exceptionCode)}]${reset}${color}`
      );
    }
    if (this.logFormat.includes('address') && merged.address != null) {
      headerParts.push(`[A:${merged.address}]`);
    }
    if (this.logFormat.includes('quantity') && merged.quantity != null) {
      headerParts.push(`[Q:${merged.quantity}]`);
    }
    if (this.logFormat.includes('responseTime') && merged.responseTime != null) {
      headerParts.push(`[RT:${merged.responseTime}ms]`);
    }

    const formattedArgs: string[] = args.map(arg => {
      if (arg instanceof Error) {
        return this.currentLevel === 'trace' && arg.stack ? arg.stack : `${arg.name}: ${arg.message}`;
      }
      return typeof arg === 'string' ? arg : formatArgs('%o', arg);
    });

    const extra: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(merged)) {
      if (!HEADER_FIELDS.includes(key) && value !== undefined) extra[key] = value;
    }
    if (Object.keys(extra).length > 0) {
      formattedArgs.push(JSON.stringify(extra));
    }

    return `${color}${headerParts.join('')}${reset} ${formattedArgs.join(' ')}`;
  }

  private shouldLog(level: LogLevel, context: LogContext): boolean {
    if (!this.enabled) return false;
    const category = context.logger;
    if (category) {
      const categoryLevel = this.categoryLevels[category];
      if (categoryLevel === 'none') return false;
      if (categoryLevel !== undefined) {
        return LEVELS.indexOf(level) >= LEVELS.indexOf(categoryLevel);
      }
    }
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.currentLevel);
  }

  private output(level: LogLevel, args: unknown[], context: LogContext): void {
    if (!this.shouldLog(level, context)) return;

    this.logCounts[level]++;

    if (this.watchCallback) {
      this.watchCallback({ level, args, context });
    }

    this.sink(this.format(level, args, context));
  }

  /**
   * Splits off a trailing context object, if the last argument is one.
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

  private log(level: LogLevel, args: unknown[], category?: string): void {
    const split = this.splitArgsAndContext(args);
    const context = category ? { ...split.context, logger: category } : split.context;
    this.output(level, split.args, context);
  }

  trace(...args: unknown[]): void {
    this.log('trace', args);
  }

  debug(...args: unknown[]): void {
    this.log('debug', args);
  }

  info(...args: unknown[]): void {
    this.log('info', args);
  }

  warn(...args: unknown[]): void {
    this.log('warn', args);
  }

  error(...args: unknown[]): void {
    this.log('error', args);
  }

  setLevel(level: LogLevel): void {
    if (!isLogLevel(level)) {
      throw new Error(`Unknown log level: ${String(level)}`);
    }
    this.currentLevel = level;
  }

  setLevelFor(category: string, level: LogLevel | 'none'): void {
    if (level !== 'none' && !isLogLevel(level)) {
      throw new Error(`Unknown log level: ${String(level)}`);
    }
    this.categoryLevels[category] = level;
  }

  pauseCategory(category: string): void {
    this.categoryLevels[category] = 'none';
  }

  resumeCategory(category: string): void {
    delete this.categoryLevels[category];
  }

  disable(): void {
    this.enabled = false;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  disableColors(): void {
    this.useColors = false;
  }

  setColors(value: boolean): void {
    this.useColors = value;
  }

  setGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...ctx };
  }

  setLogFormat(fields: LogField[]): void {
    this.logFormat = [...fields];
  }

  /** Redirects formatted lines, e.g. into an array under test */
  setSink(sink: (line: string) => void): void {
    this.sink = sink;
  }

  watch(callback: (record: LogRecord) => void): void {
    this.watchCallback = callback;
  }

  clearWatch(): void {
    this.watchCallback = null;
  }

  getCounts(): Record<LogLevel, number> {
    return { ...this.logCounts };
  }

  /**
   * Creates a logger instance with category.
   * @param name - Logger name
   */
  createLogger(name: string): LoggerInstance {
    if (!name) throw new Error('Logger name required');
    return {
      trace: (...args: unknown[]) => this.log('trace', args, name),
      debug: (...args: unknown[]) => this.log('debug', args, name),
      info: (...args: unknown[]) => this.log('info', args, name),
      warn: (...args: unknown[]) => this.log('warn', args, name),
      error: (...args: unknown[]) => this.log('error', args, name),
      setLevel: (lvl: LogLevel | 'none') => this.setLevelFor(name, lvl),
      pause: () => this.pauseCategory(name),
      resume: () => this.resumeCategory(name),
    };
  }
}

/** Process-wide log manager shared by every module of the gateway */
export const logManager = new Logger();

export default Logger;
