// src/logger.ts

import type { LogContext, LoggerInstance, LogLevel } from './types/emulator-types.js';

type LogField = 'timestamp' | 'level' | 'logger' | 'clientId' | 'model' | 'command';

type WatchCallback = (data: { level: LogLevel; args: unknown[]; context: LogContext }) => void;

const CONSOLE_METHODS: Record<LogLevel, 'debug' | 'info' | 'warn' | 'error'> = {
  trace: 'debug',
  debug: 'debug',
  info: 'info',
  warn: 'warn',
  error: 'error',
};

export class Logger {
  private LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

  private currentLevel: LogLevel = 'info';
  private enabled: boolean = true;
  private useColors: boolean = Boolean(process.stdout.isTTY);

  private COLORS: Record<LogLevel | 'reset', string> = {
    trace: '\x1b[1;35m',
    debug: '\x1b[1;36m',
    info: '\x1b[1;32m',
    warn: '\x1b[1;33m',
    error: '\x1b[1;31m',
    reset: '\x1b[0m',
  };

  private globalContext: LogContext = {};
  private categoryLevels: Record<string, LogLevel | 'none'> = {};
  private logCounts: Record<LogLevel, number> = { trace: 0, debug: 0, info: 0, warn: 0, error: 0 };
  private logFormat: LogField[] = ['timestamp', 'level', 'logger', 'clientId', 'model', 'command'];
  private watchCallback: WatchCallback | null = null;

  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 23);
  }

  /**
   * Formats a log record. Header fields come from the context; whatever is
   * left of the context is appended as JSON.
   */
  private format(level: LogLevel, args: unknown[], context: LogContext = {}): string {
    const color = this.useColors ? this.COLORS[level] : '';
    const reset = this.useColors ? this.COLORS.reset : '';
    const merged: LogContext = { ...this.globalContext, ...context };

    const headerParts: string[] = [];
    if (this.logFormat.includes('timestamp')) headerParts.push(`[${this.getTimestamp()}]`);
    if (this.logFormat.includes('level')) headerParts.push(`[${level.toUpperCase()}]`);
    if (this.logFormat.includes('logger') && merged.logger) headerParts.push(`[${merged.logger}]`);
    if (this.logFormat.includes('model') && merged.model) headerParts.push(`[M:${merged.model}]`);
    if (this.logFormat.includes('clientId') && merged.clientId) {
      headerParts.push(`[C:${merged.clientId}]`);
    }
    if (this.logFormat.includes('command') && merged.command != null) {
      headerParts.push(`[${JSON.stringify(merged.command)}]`);
    }

    const formattedArgs: string[] = args.map(arg => {
      if (arg instanceof Error) {
        return `${arg.message}\n${arg.stack || ''}`.trim();
      }
      return String(arg);
    });

    const contextToPrint: LogContext = { ...context };
    delete contextToPrint.logger;
    delete contextToPrint.model;
    delete contextToPrint.clientId;
    delete contextToPrint.command;
    if (Object.keys(contextToPrint).length > 0) {
      formattedArgs.push(JSON.stringify(contextToPrint));
    }

    return `${color}${headerParts.join('')}${reset} ${formattedArgs.join(' ')}`;
  }

  private shouldLog(level: LogLevel, context: LogContext = {}): boolean {
    if (!this.enabled) return false;
    const category = context.logger;
    if (category !== undefined && category in this.categoryLevels) {
      const categoryLevel = this.categoryLevels[category];
      if (categoryLevel === undefined || categoryLevel === 'none') return false;
      return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(categoryLevel);
    }
    return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(this.currentLevel);
  }

  private output(level: LogLevel, args: unknown[], context: LogContext): void {
    if (!this.shouldLog(level, context)) return;

    this.logCounts[level] += 1;
    if (this.watchCallback) {
      this.watchCallback({ level, args, context });
    }

    console[CONSOLE_METHODS[level]](this.format(level, args, context));
  }

  /**
   * Splits the trailing plain object, if any, off the arguments as the context.
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
    const context = category === undefined ? split.context : { ...split.context, logger: category };
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
    if (this.LEVELS.includes(level)) {
      this.currentLevel = level;
    } else {
      throw new Error(`Unknown log level: ${level}`);
    }
  }

  setLevelFor(category: string, level: LogLevel | 'none'): void {
    if (level !== 'none' && !this.LEVELS.includes(level))
      throw new Error(`Unknown log level: ${level}`);
    this.categoryLevels[category] = level;
  }

  pauseCategory(category: string): void {
    this.categoryLevels[category] = 'none';
  }

  resumeCategory(category: string): void {
    delete this.categoryLevels[category];
  }

  enable(): void {
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }

  /** Whether a record at `level` would be written, for the category if given */
  isLevelEnabled(level: LogLevel, category?: string): boolean {
    return this.shouldLog(level, category === undefined ? {} : { logger: category });
  }

  getLevel(): LogLevel {
    return this.currentLevel;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  disableColors(): void {
    this.useColors = false;
  }

  setGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...ctx };
  }

  setLogFormat(fields: LogField[]): void {
    this.logFormat = [...fields];
  }

  getCounts(): Record<LogLevel, number> {
    return { ...this.logCounts };
  }

  watch(callback: WatchCallback): void {
    this.watchCallback = callback;
  }

  clearWatch(): void {
    this.watchCallback = null;
  }

  /**
   * Creates a logger bound to a category.
   * @param name - Category name shown in the header
   */
  createLogger(name: string): LoggerInstance {
    if (!name) throw new Error('Logger name required');
    return {
      trace: (...args: unknown[]) => this.log('trace', args, name),
      debug: (...args: unknown[]) => this.log('debug', args, name),
      info: (...args: unknown[]) => this.log('info', args, name),
      warn: (...args: unknown[]) => this.log('warn', args, name),
      error: (...args: unknown[]) => this.log('error', args, name),
      isLevelEnabled: (lvl: LogLevel) => this.isLevelEnabled(lvl, name),
      setLevel: (lvl: LogLevel | 'none') => this.setLevelFor(name, lvl),
      pause: () => this.pauseCategory(name),
      resume: () => this.resumeCategory(name),
    };
  }
}

function isLogContext(value: unknown): value is LogContext {
  if (typeof value !== 'object' || value === null || Array.isArray(value) || value instanceof Error) {
    return false;
  }
  return Object.values(value).every(
    v => v === undefined || typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean'
  );
}

/** Process-wide logger; every module creates its category logger from it. */
const rootLogger = new Logger();

export default rootLogger;
