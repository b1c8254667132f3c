import chalk from 'chalk';
import * as fs from 'fs';
import * as path from 'path';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

/**
 * CLI logger.
 *
 * Console output always goes to stderr: stdout is reserved for compressed
 * payloads so the tool can sit in a shell pipeline.
 */
export class Logger {
  private logFilePath: string | null = null;
  private logFileInitialized = false;

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  /**
   * Resolve the log file from TS_COMPRESSOR_LOG_FILE and create its directory.
   * File logging stays disabled when the variable is unset or the directory
   * cannot be created.
   */
  private initializeLogFile(): void {
    if (this.logFileInitialized) return;
    this.logFileInitialized = true;

    const target = this.env.TS_COMPRESSOR_LOG_FILE;
    if (!target) return;

    try {
      fs.mkdirSync(path.dirname(target), { recursive: true });
      this.logFilePath = target;
    } catch {
      this.logFilePath = null;
    }
  }

  /**
   * Append one entry to the log file.
   * Format: [ISO timestamp] [LEVEL] message args
   */
  private writeToLogFile(level: LogLevel, message: string, ...args: unknown[]): void {
    this.initializeLogFile();
    if (!this.logFilePath) return;

    const argsStr = args.length > 0 ? ' ' + args.map(arg =>
      typeof arg === 'object' ? JSON.stringify(arg) : String(arg)
    ).join(' ') : '';
    const logEntry = `[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}${argsStr}\n`;

    try {
      fs.appendFileSync(this.logFilePath, logEntry);
    } catch {
      // Stop writing to a sink that failed once
      this.logFilePath = null;
    }
  }

  /**
   * Debug mode controls console output of debug entries, not file logging
   * @returns true if TS_COMPRESSOR_DEBUG is 'true' or '1'
   */
  isDebugMode(): boolean {
    return this.env.TS_COMPRESSOR_DEBUG === 'true' || this.env.TS_COMPRESSOR_DEBUG === '1';
  }

  getLogFilePath(): string | null {
    this.initializeLogFile();
    return this.logFilePath;
  }

  debug(message: string, ...args: unknown[]): void {
    this.writeToLogFile(LogLevel.DEBUG, message, ...args);

    if (this.isDebugMode()) {
      console.error(chalk.dim(`[DEBUG] ${message}`), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    this.writeToLogFile(LogLevel.INFO, message, ...args);
    console.error(chalk.cyan(message), ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.writeToLogFile(LogLevel.WARN, message, ...args);
    console.error(chalk.yellow(`⚠ ${message}`), ...args);
  }

  error(message: string, error?: unknown): void {
    let errorDetails = '';
    if (error instanceof Error) {
      errorDetails = error.message;
      if (error.stack && this.isDebugMode()) {
        errorDetails += `\n${error.stack}`;
      }
    } else if (error !== undefined) {
      errorDetails = String(error);
    }

    this.writeToLogFile(LogLevel.ERROR, message, ...(errorDetails ? [errorDetails] : []));

    console.error(chalk.red(`✗ ${message}`));
    if (errorDetails) {
      console.error(chalk.red(errorDetails));
    }
  }
}

export const logger = new Logger();
