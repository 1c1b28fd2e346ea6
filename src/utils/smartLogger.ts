/**
 * Smart Logger - category/level filtered console logger
 * Competition mode keeps only errors so move queries stay fast
 */

import { SLOW_DECISION_MS } from "./constants";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4,
}

export enum LogCategory {
  GENERAL = "GENERAL",
  HTTP = "HTTP",
  AI = "AI",
  PHASE = "PHASE",
  GAME_STATE = "GAME_STATE",
  PERFORMANCE = "PERFORMANCE",
}

export interface LoggerConfig {
  minLevel: LogLevel;
  enabledCategories: LogCategory[];
  isCompetitionMode: boolean;
  enableConsole: boolean;
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  none: LogLevel.NONE,
};

/**
 * Map a LOG_LEVEL string to a level; undefined for unrecognised names
 */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  if (!name) return undefined;
  return LEVEL_NAMES[name.trim().toLowerCase()];
}

export class SmartLogger {
  private static instance: SmartLogger;
  private config: LoggerConfig = {
    minLevel: LogLevel.INFO,
    enabledCategories: Object.values(LogCategory),
    isCompetitionMode: false,
    enableConsole: true,
  };

  private constructor() {}

  /**
   * Get singleton instance
   */
  public static getInstance(): SmartLogger {
    if (!SmartLogger.instance) {
      SmartLogger.instance = new SmartLogger();
    }
    return SmartLogger.instance;
  }

  public configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };

    if (this.config.isCompetitionMode) {
      // Competition mode: chỉ log ERROR
      this.config.minLevel = LogLevel.ERROR;
    }
  }

  private shouldLog(level: LogLevel, category: LogCategory): boolean {
    if (!this.config.enableConsole) {
      return false;
    }

    if (level < this.config.minLevel) {
      return false;
    }

    return this.config.enabledCategories.includes(category);
  }

  public debug(category: LogCategory, message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.DEBUG, category)) {
      console.log(`🔍 [${category}] ${message}`, ...args);
    }
  }

  public info(category: LogCategory, message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.INFO, category)) {
      console.log(`ℹ️  [${category}] ${message}`, ...args);
    }
  }

  public warn(category: LogCategory, message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.WARN, category)) {
      console.warn(`⚠️  [${category}] ${message}`, ...args);
    }
  }

  public error(category: LogCategory, message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.ERROR, category)) {
      console.error(`❌ [${category}] ${message}`, ...args);
    }
  }

  /**
   * Time a synchronous call; warns when it is slow
   */
  public performance<T>(label: string, fn: () => T): T {
    if (!this.shouldLog(LogLevel.WARN, LogCategory.PERFORMANCE)) {
      return fn();
    }

    const start = Date.now();
    const result = fn();
    const duration = Date.now() - start;

    if (duration > SLOW_DECISION_MS) {
      this.warn(LogCategory.PERFORMANCE, `${label} took ${duration}ms (slow!)`);
    } else {
      this.debug(LogCategory.PERFORMANCE, `${label} took ${duration}ms`);
    }

    return result;
  }

  public disableAll(): void {
    this.config.enableConsole = false;
  }
}

// Export singleton instance
export const logger = SmartLogger.getInstance();
