import { config, type LogLevel } from './config';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// 内存中保留的最近日志条数
const MAX_LOG_ENTRIES = 500;

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  tag: string;
  message: string;
  meta?: Record<string, unknown>;
}

const recentEntries: LogEntry[] = [];

function remember(entry: LogEntry): void {
  recentEntries.push(entry);
  if (recentEntries.length > MAX_LOG_ENTRIES) {
    recentEntries.shift();
  }
}

export class Logger {
  private level: number;

  constructor(private readonly tag: string = 'Agent', level: LogLevel = config.logLevel) {
    this.level = LOG_LEVELS[level];
  }

  /**
   * 创建带组件标签的 logger，共享日志级别
   */
  withTag(tag: string): Logger {
    const child = new Logger(tag);
    child.level = this.level;
    return child;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= this.level;
  }

  private format(level: LogLevel, message: string, meta?: Record<string, unknown>): string {
    const timestamp = new Date().toISOString();
    const metaStr = meta ? ' ' + JSON.stringify(meta) : '';
    return `[${timestamp}] [${level.toUpperCase()}] [${this.tag}] ${message}${metaStr}`;
  }

  private record(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    remember({ timestamp: Date.now(), level, tag: this.tag, message, meta });
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) {
      this.record('debug', message, meta);
      console.log(this.format('debug', message, meta));
    }
  }

  info(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      this.record('info', message, meta);
      console.log(this.format('info', message, meta));
    }
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('warn')) {
      this.record('warn', message, meta);
      console.warn(this.format('warn', message, meta));
    }
  }

  error(message: string, error?: Error | unknown, meta?: Record<string, unknown>): void {
    if (this.shouldLog('error')) {
      const errorMeta = error instanceof Error
        ? { ...meta, error: error.message, stack: error.stack }
        : meta;
      this.record('error', message, errorMeta);
      console.error(this.format('error', message, errorMeta));
    }
  }
}

/**
 * 最近的日志条目（可按级别过滤），用于调试导出
 */
export function getRecentLogs(level?: LogLevel): LogEntry[] {
  if (!level) return [...recentEntries];
  return recentEntries.filter(entry => entry.level === level);
}

export function getErrorLogs(): LogEntry[] {
  return getRecentLogs('error');
}

export function clearLogs(): void {
  recentEntries.length = 0;
}

export const logger = new Logger();
