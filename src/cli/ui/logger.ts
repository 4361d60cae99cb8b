import chalk, { type ChalkInstance } from 'chalk';
import type { LogLevel } from '../../config/types.js';

export interface LoggerOptions {
  level: LogLevel;
  colors: boolean;
  includeTimestamp: boolean;
}

type MessageLevel = Exclude<LogLevel, 'silent'>;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const PREFIXES: Record<MessageLevel, { label: string; color: ChalkInstance; stream: 'log' | 'warn' | 'error' }> = {
  debug: { label: '[DEBUG]', color: chalk.gray, stream: 'log' },
  info: { label: '[INFO]', color: chalk.blue, stream: 'log' },
  warn: { label: '⚠', color: chalk.yellow, stream: 'warn' },
  error: { label: '✗', color: chalk.red, stream: 'error' },
};

/** Console logger shared by the CLI and the orchestration core. */
export class Logger {
  private options: LoggerOptions;

  constructor(options: Partial<LoggerOptions> = {}) {
    this.options = {
      level: options.level ?? 'info',
      colors: options.colors ?? true,
      includeTimestamp: options.includeTimestamp ?? false,
    };
  }

  debug(message: string, ...args: unknown[]): void {
    this.write('debug', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write('warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write('error', message, args);
  }

  /** Debug line tagged with a specialist name. */
  agent(name: string, message: string): void {
    this.tagged(`[${name}]`, chalk.cyan, message);
  }

  /** Debug line tagged with a tool name. */
  tool(name: string, message: string): void {
    this.tagged(`[tool:${name}]`, chalk.magenta, message);
  }

  divider(): void {
    if (!this.enabled('info')) return;
    console.log(this.paint('─'.repeat(50), chalk.gray));
  }

  blank(): void {
    if (!this.enabled('info')) return;
    console.log();
  }

  setLevel(level: LogLevel): void {
    this.options.level = level;
  }

  setColors(enabled: boolean): void {
    this.options.colors = enabled;
  }

  setIncludeTimestamp(enabled: boolean): void {
    this.options.includeTimestamp = enabled;
  }

  private write(level: MessageLevel, message: string, args: unknown[]): void {
    if (!this.enabled(level)) return;
    const { label, color, stream } = PREFIXES[level];
    console[stream](`${this.timestamp()}${this.paint(label, color)} ${message}`, ...args);
  }

  private tagged(tag: string, color: ChalkInstance, message: string): void {
    if (!this.enabled('debug')) return;
    console.log(`${this.timestamp()}${this.paint(tag, color)} ${message}`);
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.options.level];
  }

  private timestamp(): string {
    return this.options.includeTimestamp ? `[${new Date().toISOString()}] ` : '';
  }

  private paint(text: string, color: ChalkInstance): string {
    return this.options.colors ? color(text) : text;
  }
}

export const logger = new Logger();
