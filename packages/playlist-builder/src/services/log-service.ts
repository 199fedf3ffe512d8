/**
 * Structured Logging Service
 * Keeps a bounded buffer of entries so a build run can report its diagnostics
 */

import { EventEmitter } from 'events';
import { nanoid } from 'nanoid';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
  id: string;
  timestamp: number;
  level: LogLevel;
  service: string;
  message: string;
  data?: Record<string, unknown>;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

class LogService extends EventEmitter {
  private buffer: LogEntry[] = [];
  private maxBufferSize = 1000;
  private minLevel: LogLevel = 'info';
  private silent = false;

  /**
   * Log a message with structured data.
   * Subscribers receive every entry; the minimum level only gates the buffer
   * and the console.
   */
  log(level: LogLevel, service: string, message: string, data?: Record<string, unknown>): void {
    const entry: LogEntry = {
      id: nanoid(12),
      timestamp: Date.now(),
      level,
      service,
      message,
      data
    };

    this.emit('log', entry);

    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.minLevel)) {
      return;
    }

    // Add to circular buffer
    this.buffer.push(entry);
    if (this.buffer.length > this.maxBufferSize) {
      this.buffer.shift();
    }

    if (this.silent) return;

    const prefix = `[${service}]`;
    const logFn = level === 'error' ? console.error :
                  level === 'warn' ? console.warn : console.log;

    if (data && Object.keys(data).length > 0) {
      logFn(prefix, message, data);
    } else {
      logFn(prefix, message);
    }
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  /**
   * Stop writing to the console; entries are still buffered and emitted
   */
  setSilent(silent: boolean): void {
    this.silent = silent;
  }

  /**
   * Get recent log entries with optional filtering
   */
  getRecent(count: number = 100, filter?: { level?: LogLevel; service?: string }): LogEntry[] {
    let entries = this.buffer.slice(-Math.min(count, this.maxBufferSize));

    if (filter?.level) {
      entries = entries.filter(e => e.level === filter.level);
    }
    if (filter?.service) {
      const serviceLower = filter.service.toLowerCase();
      entries = entries.filter(e => e.service.toLowerCase().includes(serviceLower));
    }

    return entries;
  }

  /**
   * Clear all buffered logs
   */
  clear(): void {
    this.buffer = [];
    this.emit('clear');
  }
}

// Singleton instance
export const logService = new LogService();

export const log = {
  debug: (service: string, message: string, data?: Record<string, unknown>) =>
    logService.log('debug', service, message, data),

  info: (service: string, message: string, data?: Record<string, unknown>) =>
    logService.log('info', service, message, data),

  warn: (service: string, message: string, data?: Record<string, unknown>) =>
    logService.log('warn', service, message, data),

  error: (service: string, message: string, data?: Record<string, unknown>) =>
    logService.log('error', service, message, data),
};
