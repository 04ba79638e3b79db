/**
 * Leveled logging for the server. Records go to stderr as single-line JSON,
 * because stdout is owned by the MCP stdio transport.
 */

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

/**
 * A single tool invocation as seen by the request logger
 */
export interface LogEntry {
  timestamp: string;
  toolName: string;
  operation: string;
  parameters: Record<string, unknown>;
  success: boolean;
  error?: string;
  durationMs?: number;
}

export interface LoggerConfig {
  level: LogLevel;
  /** Number of request entries kept in memory for stats */
  maxEntries: number;
}

const SENSITIVE_KEY_PATTERN = /token|key|secret|password|authorization/i;

const DEFAULT_CONFIG: LoggerConfig = {
  level: 'info',
  maxEntries: 500,
};

export class RequestLogger implements Logger {
  private config: LoggerConfig;
  private entries: LogEntry[] = [];

  constructor(
    config: Partial<LoggerConfig> = {},
    private readonly write: (line: string) => void = (line) => console.error(line),
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.config.level);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.emit('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.emit('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.emit('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.emit('error', message, meta);
  }

  /**
   * Record a completed tool call
   */
  logSuccess(
    toolName: string,
    operation: string,
    parameters: Record<string, unknown>,
    durationMs?: number,
  ): void {
    const entry = this.record({
      timestamp: new Date().toISOString(),
      toolName,
      operation,
      parameters: this.sanitize(parameters),
      success: true,
      ...(durationMs !== undefined ? { durationMs } : {}),
    });
    this.emit('info', `${toolName} completed`, { ...entry });
  }

  /**
   * Record a failed tool call
   */
  logError(
    toolName: string,
    operation: string,
    parameters: Record<string, unknown>,
    error: string,
    durationMs?: number,
  ): void {
    const entry = this.record({
      timestamp: new Date().toISOString(),
      toolName,
      operation,
      parameters: this.sanitize(parameters),
      success: false,
      error,
      ...(durationMs !== undefined ? { durationMs } : {}),
    });
    this.emit('error', `${toolName} failed`, { ...entry });
  }

  getRecentLogs(limit = 20): LogEntry[] {
    return this.entries.slice(-limit);
  }

  getStats(): { totalRequests: number; failedRequests: number; averageDurationMs: number } {
    const durations = this.entries
      .map((entry) => entry.durationMs)
      .filter((value): value is number => value !== undefined);
    const averageDurationMs =
      durations.length === 0
        ? 0
        : Math.round(durations.reduce((sum, value) => sum + value, 0) / durations.length);
    return {
      totalRequests: this.entries.length,
      failedRequests: this.entries.filter((entry) => !entry.success).length,
      averageDurationMs,
    };
  }

  clearLogs(): void {
    this.entries = [];
  }

  private record(entry: LogEntry): LogEntry {
    this.entries.push(entry);
    if (this.entries.length > this.config.maxEntries) {
      this.entries.splice(0, this.entries.length - this.config.maxEntries);
    }
    return entry;
  }

  private sanitize(parameters: Record<string, unknown>): Record<string, unknown> {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(parameters)) {
      sanitized[key] = SENSITIVE_KEY_PATTERN.test(key) ? '[REDACTED]' : value;
    }
    return sanitized;
  }

  private emit(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!this.isLevelEnabled(level)) return;
    this.write(
      JSON.stringify({
        level,
        time: new Date().toISOString(),
        msg: message,
        ...(meta ?? {}),
      }),
    );
  }
}

export const globalRequestLogger = new RequestLogger();

export default globalRequestLogger;
