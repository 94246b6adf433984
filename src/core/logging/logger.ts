// src/core/logging/logger.ts
import { appendFileSync, mkdirSync } from 'node:fs';
import path from 'node:path';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface LoggerOptions {
  debug?: boolean;
  logFile?: string;  // every line, debug included, is appended here
}

export function formatLogTimestamp(date: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export class Logger {
  private readonly debugEnabled: boolean;
  private logFile?: string;
  private fileBroken = false;

  constructor(options: LoggerOptions = {}) {
    this.debugEnabled = options.debug ?? false;
    this.logFile = options.logFile;
    if (this.logFile) {
      mkdirSync(path.dirname(this.logFile), { recursive: true });
    }
  }

  debug(message: string): void {
    this.write('DEBUG', message, this.debugEnabled);
  }

  info(message: string): void {
    this.write('INFO', message, true);
  }

  warn(message: string): void {
    this.write('WARN', message, true);
  }

  error(message: string): void {
    this.write('ERROR', message, true);
  }

  private write(level: LogLevel, message: string, toConsole: boolean): void {
    const line = `[${formatLogTimestamp()}] [${level}] ${message}`;
    if (toConsole) {
      console.error(line);
    }
    if (this.logFile && !this.fileBroken) {
      try {
        appendFileSync(this.logFile, line + '\n');
      } catch (error) {
        // Keep the console working if the scratch dir disappears under us
        this.fileBroken = true;
        console.error(`[WARN] Log file disabled: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  }
}
