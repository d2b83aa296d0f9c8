/**
 * Structured logging for macro discovery
 * Entries are kept in memory and optionally echoed to the console with a context prefix
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogContext {
  macro?: string;
  probe?: string;
  phase?: string;
  component?: string;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  data?: Record<string, unknown>;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

export class Logger {
  private entries: LogEntry[] = [];
  private level: LogLevel = "info";
  private context: LogContext = {};
  private timers: Map<string, number> = new Map();
  private shouldLog: boolean = true;

  constructor(level: LogLevel = "info", shouldLog: boolean = true) {
    this.level = level;
    this.shouldLog = shouldLog;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Merge keys into the context of all subsequent logs
   */
  pushContext(context: Partial<LogContext>): void {
    this.context = { ...this.context, ...context };
  }

  /**
   * Drop context keys set by pushContext
   */
  popContext(keys: (keyof LogContext)[]): void {
    keys.forEach((key) => {
      delete this.context[key];
    });
  }

  clearContext(): void {
    this.context = {};
  }

  /**
   * Run fn with extra context, restoring the previous context afterwards
   */
  withContext<T>(context: Partial<LogContext>, fn: () => T): T {
    const previous = this.context;
    this.context = { ...previous, ...context };
    try {
      return fn();
    } finally {
      this.context = previous;
    }
  }

  startTimer(name: string): void {
    this.timers.set(name, Date.now());
  }

  /**
   * End a timer and log its duration
   */
  endTimer(name: string, message: string, level: LogLevel = "debug"): number {
    const start = this.timers.get(name);
    if (start === undefined) {
      this.warn(`Timer "${name}" not found`);
      return 0;
    }

    const duration = Date.now() - start;
    this.timers.delete(name);
    this.log(level, message, { duration });
    return duration;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log("error", message, data);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: Object.keys(this.context).length > 0 ? { ...this.context } : undefined,
      data: data && Object.keys(data).length > 0 ? { ...data } : undefined,
    };

    this.entries.push(entry);

    if (this.shouldLog) {
      this.consoleLog(level, this.formatLog(entry));
    }
  }

  private buildPrefix(context: LogContext | undefined): string {
    if (!context) return "";

    const parts: string[] = [];
    if (context.phase) parts.push(`[${context.phase}]`);
    if (context.component) parts.push(`<${context.component}>`);
    if (context.macro) parts.push(context.macro);
    if (context.probe) parts.push(`(${context.probe})`);

    return parts.length > 0 ? parts.join(" ") + ": " : "";
  }

  /**
   * Render an entry the way it is printed to the console
   */
  formatLog(entry: LogEntry): string {
    let result = this.buildPrefix(entry.context) + entry.message;

    if (entry.data) {
      const dataStr = this.formatData(entry.data);
      if (dataStr) {
        result += "\n  " + dataStr;
      }
    }

    return result;
  }

  private formatData(data: Record<string, unknown>): string {
    const parts: string[] = [];

    for (const [key, value] of Object.entries(data)) {
      if (key === "duration" && typeof value === "number") {
        parts.push(`${key}: ${value}ms`);
      } else if (Array.isArray(value)) {
        parts.push(`${key}: ${value.join(" ")}`);
      } else if (typeof value === "bigint") {
        parts.push(`${key}: ${value.toString()}`);
      } else if (typeof value === "object" && value !== null) {
        parts.push(`${key}: ${JSON.stringify(value)}`);
      } else {
        parts.push(`${key}: ${String(value)}`);
      }
    }

    return parts.join(", ");
  }

  private consoleLog(level: LogLevel, message: string): void {
    switch (level) {
      case "debug":
        console.debug(message);
        break;
      case "info":
        console.log(message);
        break;
      case "warn":
        console.warn(message);
        break;
      case "error":
        console.error(message);
        break;
    }
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  getEntriesForMacro(macro: string): LogEntry[] {
    return this.entries.filter((entry) => entry.context?.macro === macro);
  }

  /**
   * Entries at or above a level
   */
  getEntriesAtLevel(level: LogLevel): LogEntry[] {
    const index = LOG_LEVELS.indexOf(level);
    return this.entries.filter((entry) => LOG_LEVELS.indexOf(entry.level) >= index);
  }

  toJSON(): LogEntry[] {
    return this.getEntries();
  }

  clear(): void {
    this.entries = [];
  }

  getSummary(): {
    totalEntries: number;
    debugCount: number;
    infoCount: number;
    warnCount: number;
    errorCount: number;
  } {
    return {
      totalEntries: this.entries.length,
      debugCount: this.entries.filter((e) => e.level === "debug").length,
      infoCount: this.entries.filter((e) => e.level === "info").length,
      warnCount: this.entries.filter((e) => e.level === "warn").length,
      errorCount: this.entries.filter((e) => e.level === "error").length,
    };
  }
}

/**
 * Shared logger for the command-line front end
 */
export const globalLogger = new Logger("info", true);
