/**
 * Logging System
 *
 * Logs to the console and to an append-only file per workflow.
 * File lines have the form `<timestamp> [<LEVEL>] <message>`.
 */

import fs from 'fs/promises';
import path from 'path';

export type LogLevel = 'info' | 'warn' | 'error' | 'success' | 'debug';

export type Workflow = 'core' | 'session-host';

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
}

export interface LoggerOptions {
  logDir?: string;
  consoleEnabled?: boolean;
  fileEnabled?: boolean;
}

export interface RunSummary {
  created: number;
  skipped: number;
  failed: number;
}

const LOG_FILES: Record<Workflow, string> = {
  core: 'core-deployment.log',
  'session-host': 'session-host.log',
};

/**
 * Format log entry for file output
 */
export function formatLogEntry(entry: LogEntry): string {
  const level = entry.level.toUpperCase();
  let line = `${entry.timestamp} [${level}] ${entry.message.replace(/\r?\n/g, ' ')}`;

  if (entry.context && Object.keys(entry.context).length > 0) {
    line += ` ${JSON.stringify(entry.context)}`;
  }

  return line;
}

export class Logger {
  private logFilePath: string;
  private logBuffer: LogEntry[] = [];
  private consoleEnabled: boolean;
  private fileEnabled: boolean;
  // Appends are chained so lines land in call order
  private writeChain: Promise<void> = Promise.resolve();

  constructor(private readonly workflow: Workflow, options: LoggerOptions = {}) {
    this.logFilePath = path.join(options.logDir ?? 'logs', LOG_FILES[workflow]);
    this.consoleEnabled = options.consoleEnabled ?? true;
    this.fileEnabled = options.fileEnabled ?? true;
  }

  /**
   * Initialize logger (create log directory). Existing log files are appended to.
   */
  async initialize(): Promise<void> {
    if (this.fileEnabled) {
      await fs.mkdir(path.dirname(this.logFilePath), { recursive: true });
    }
    this.info(`${this.workflow === 'core' ? 'Core deployment' : 'Session host'} run started`);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  success(message: string, context?: LogContext): void {
    this.log('success', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  /**
   * Core logging method
   */
  private log(level: LogLevel, message: string, context?: LogContext): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context,
    };

    this.logBuffer.push(entry);

    if (this.consoleEnabled) {
      const prefix = this.getPrefix(level);
      const write = level === 'error' ? console.error : console.log;
      write(`${prefix} ${message}`);
    }

    if (this.fileEnabled) {
      const line = formatLogEntry(entry) + '\n';
      this.writeChain = this.writeChain
        .then(() => fs.appendFile(this.logFilePath, line, 'utf-8'))
        .catch(err => {
          console.error('Failed to write to log file:', err);
        });
    }
  }

  private getPrefix(level: LogLevel): string {
    switch (level) {
      case 'info':
        return 'ℹ️ ';
      case 'warn':
        return '⚠️ ';
      case 'error':
        return '❌';
      case 'success':
        return '✅';
      case 'debug':
        return '🔍';
    }
  }

  setConsoleEnabled(enabled: boolean): void {
    this.consoleEnabled = enabled;
  }

  getLogFilePath(): string {
    return this.logFilePath;
  }

  getLogBuffer(): LogEntry[] {
    return [...this.logBuffer];
  }

  count(level: LogLevel): number {
    return this.logBuffer.filter(e => e.level === level).length;
  }

  /**
   * Resolves once every queued line has been appended
   */
  async flush(): Promise<void> {
    await this.writeChain;
  }

  /**
   * Log the run summary and wait for the file to catch up
   */
  async writeSummary(summary: RunSummary): Promise<void> {
    this.info(
      `Run summary: created=${summary.created} skipped=${summary.skipped} failed=${summary.failed} ` +
      `warnings=${this.count('warn')} errors=${this.count('error')}`
    );
    await this.flush();
  }
}

// Global logger instance
let globalLogger: Logger | null = null;

/**
 * Get global logger instance
 */
export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger('core');
  }
  return globalLogger;
}

/**
 * Initialize global logger for a workflow
 */
export async function initializeLogger(workflow: Workflow, logDir?: string): Promise<Logger> {
  globalLogger = new Logger(workflow, { logDir });
  await globalLogger.initialize();
  return globalLogger;
}
