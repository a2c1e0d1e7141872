// logger.ts - Centralized logging utility for the kiosk monitor
import * as fs from 'fs';
import * as path from 'path';
import { describeError } from './errors';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  CRITICAL = 4,
  SILENT = 5
}

export type LogData = Record<string, unknown>;

export function parseLogLevel(name: string, fallback: LogLevel = LogLevel.INFO): LogLevel {
  switch (name.trim().toUpperCase()) {
    case 'DEBUG': return LogLevel.DEBUG;
    case 'INFO': return LogLevel.INFO;
    case 'WARN':
    case 'WARNING': return LogLevel.WARN;
    case 'ERROR': return LogLevel.ERROR;
    case 'CRITICAL': return LogLevel.CRITICAL;
    case 'SILENT': return LogLevel.SILENT;
    default: return fallback;
  }
}

export class Logger {
  private logFile: string | null;
  private component: string;
  private minLevel: LogLevel;
  private maxFileSize: number = 10 * 1024 * 1024; // 10MB
  private maxFiles: number = 5;

  /**
   * @param logFile - file to append to, or null for console only
   */
  constructor(component: string, logFile: string | null, minLevel: LogLevel = LogLevel.INFO) {
    this.component = component;
    this.logFile = logFile;
    this.minLevel = minLevel;

    if (logFile) {
      const logDir = path.dirname(path.resolve(logFile));
      if (!fs.existsSync(logDir)) {
        fs.mkdirSync(logDir, { recursive: true });
      }
      this.rotateLogsIfNeeded();
    }
  }

  /** Logger for a sub-component writing to the same file at the same level. */
  public child(component: string): Logger {
    return new Logger(`${this.component}:${component}`, this.logFile, this.minLevel);
  }

  public getLogFile(): string | null {
    return this.logFile;
  }

  private rotateLogsIfNeeded(): void {
    if (!this.logFile) return;

    try {
      if (!fs.existsSync(this.logFile)) {
        return;
      }

      const stats = fs.statSync(this.logFile);

      if (stats.size >= this.maxFileSize) {
        for (let i = this.maxFiles - 1; i > 0; i--) {
          const oldFile = `${this.logFile}.${i}`;
          const newFile = `${this.logFile}.${i + 1}`;

          if (fs.existsSync(oldFile)) {
            if (i === this.maxFiles - 1) {
              fs.unlinkSync(oldFile); // Delete oldest
            } else {
              fs.renameSync(oldFile, newFile);
            }
          }
        }

        fs.renameSync(this.logFile, `${this.logFile}.1`);
      }
    } catch (error) {
      console.error('Error rotating logs:', error);
    }
  }

  private formatMessage(level: LogLevel, message: string, data?: LogData, error?: unknown): string {
    const timestamp = new Date().toISOString();
    const levelName = LogLevel[level];

    let logLine = `[${timestamp}] [${levelName}] [${this.component}] ${message}`;

    if (data && Object.keys(data).length > 0) {
      logLine += `\n  Data: ${JSON.stringify(data, null, 2)}`;
    }

    if (error !== undefined) {
      logLine += `\n  Error: ${describeError(error)}`;
      if (error instanceof Error && error.stack && level >= LogLevel.ERROR) {
        logLine += `\n  Stack: ${error.stack}`;
      }
    }

    return logLine + '\n';
  }

  private writeLog(level: LogLevel, message: string, data?: LogData, error?: unknown): void {
    if (level < this.minLevel) {
      return;
    }

    const logMessage = this.formatMessage(level, message, data, error);

    if (level >= LogLevel.WARN) {
      console.error(logMessage.trim());
    } else {
      console.log(logMessage.trim());
    }

    if (!this.logFile) return;

    try {
      fs.appendFileSync(this.logFile, logMessage);
      this.rotateLogsIfNeeded();
    } catch (err) {
      console.error('Failed to write log:', err);
    }
  }

  public debug(message: string, data?: LogData): void {
    this.writeLog(LogLevel.DEBUG, message, data);
  }

  public info(message: string, data?: LogData): void {
    this.writeLog(LogLevel.INFO, message, data);
  }

  public warn(message: string, data?: LogData, error?: unknown): void {
    this.writeLog(LogLevel.WARN, message, data, error);
  }

  public error(message: string, error?: unknown, data?: LogData): void {
    this.writeLog(LogLevel.ERROR, message, data, error);
  }

  public critical(message: string, error?: unknown, data?: LogData): void {
    this.writeLog(LogLevel.CRITICAL, message, data, error);
  }

  // Tail of the current log file for the CLI
  public getRecentLogs(lines: number = 100): string[] {
    return readLogTail(this.logFile, lines);
  }
}

export function readLogTail(logFile: string | null, lines: number): string[] {
  if (!logFile) return [];

  try {
    if (!fs.existsSync(logFile)) {
      return [];
    }

    const content = fs.readFileSync(logFile, 'utf8');
    const allLines = content.split('\n').filter(line => line.trim());

    return allLines.slice(-lines);
  } catch (error) {
    console.error('Error reading logs:', error);
    return [];
  }
}

let monitorLogger: Logger | null = null;

export function getMonitorLogger(logFile: string | null, level: LogLevel = LogLevel.INFO): Logger {
  if (!monitorLogger) {
    monitorLogger = new Logger('monitor', logFile, level);
  }
  return monitorLogger;
}

export default Logger;
