/**
 * Structured Logging Module
 *
 * JSON log lines with levels, correlation ids and an optional telemetry sink.
 * The most recent entries (up to `maxEntries`) are also kept in memory so
 * tests can assert on them.
 *
 * @tested tests/integration/recommendation-engine.integration.test.ts
 */

import { z } from 'zod';

export const LogLevel = {
  DEBUG: 'debug',
  INFO: 'info',
  WARN: 'warn',
  ERROR: 'error',
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

const LOG_LEVEL_ORDER: LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

export const LogEntrySchema = z.object({
  timestamp: z.string(),
  level: z.enum(['debug', 'info', 'warn', 'error']),
  message: z.string(),
  correlationId: z.string().optional(),
  service: z.string(),
  metadata: z.record(z.unknown()).optional(),
  error: z
    .object({
      name: z.string(),
      message: z.string(),
      stack: z.string().optional(),
    })
    .optional(),
});

export type LogEntry = z.infer<typeof LogEntrySchema>;

/**
 * Summary of one recommendation request
 */
export interface RecommendationLogEntry {
  correlationId?: string;
  strategy: string;
  topN: number;
  catalogSize: number;
  candidateCount: number;
  filterBypassed: boolean;
  resultIds: string[];
  processingTimeMs: number;
}

/**
 * Telemetry sink interface
 */
export interface TelemetryClient {
  trackTrace(message: string, severity: number, properties?: Record<string, string>): void;
  trackException(exception: Error, properties?: Record<string, string>): void;
  trackMetric(name: string, value: number, properties?: Record<string, string>): void;
}

export interface LoggerConfig {
  serviceName: string;
  minLevel: LogLevel;
  enableConsole: boolean;
  /** Entries kept in memory; the oldest are dropped first */
  maxEntries: number;
  telemetryClient?: TelemetryClient;
}

function parseLogLevel(value: string | undefined): LogLevel {
  const match = LOG_LEVEL_ORDER.find((level) => level === value);
  return match ?? LogLevel.INFO;
}

export const defaultLoggerConfig: LoggerConfig = {
  serviceName: 'service-match',
  minLevel: parseLogLevel(process.env.LOG_LEVEL),
  enableConsole: process.env.NODE_ENV !== 'test',
  maxEntries: 1000,
};

function logLevelToSeverity(level: LogLevel): number {
  return LOG_LEVEL_ORDER.indexOf(level);
}

function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_ORDER.indexOf(level) >= LOG_LEVEL_ORDER.indexOf(minLevel);
}

export class Logger {
  private config: LoggerConfig;
  private correlationId?: string;
  private logEntries: LogEntry[] = [];

  constructor(config: Partial<LoggerConfig> = {}, correlationId?: string) {
    this.config = { ...defaultLoggerConfig, ...config };
    this.correlationId = correlationId;
  }

  /**
   * Creates a logger sharing this configuration with its own correlation id
   */
  child(correlationId: string): Logger {
    return new Logger(this.config, correlationId);
  }

  /**
   * Gets all log entries (for testing)
   */
  getLogEntries(): LogEntry[] {
    return [...this.logEntries];
  }

  private log(
    level: LogLevel,
    message: string,
    metadata?: Record<string, unknown>,
    error?: Error,
    correlationId: string | undefined = this.correlationId
  ): void {
    if (!shouldLog(level, this.config.minLevel)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: this.config.serviceName,
      correlationId,
    };
    if (metadata) {
      entry.metadata = metadata;
    }
    if (error) {
      entry.error = { name: error.name, message: error.message, stack: error.stack };
    }

    this.logEntries.push(entry);
    if (this.logEntries.length > this.config.maxEntries) {
      this.logEntries.splice(0, this.logEntries.length - this.config.maxEntries);
    }

    if (this.config.enableConsole) {
      const logFn = level === LogLevel.ERROR ? console.error : console.log;
      logFn(JSON.stringify(entry));
    }

    const telemetry = this.config.telemetryClient;
    if (telemetry) {
      const properties: Record<string, string> = { service: this.config.serviceName };
      if (correlationId) {
        properties.correlationId = correlationId;
      }
      if (metadata) {
        properties.metadata = JSON.stringify(metadata);
      }

      if (error) {
        telemetry.trackException(error, properties);
      } else {
        telemetry.trackTrace(message, logLevelToSeverity(level), properties);
      }
    }
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, metadata);
  }

  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, metadata, error);
  }

  /**
   * Logs a completed recommendation request with its inputs and selected ids.
   * The entry's correlation id applies to this line only.
   */
  logRecommendation(entry: RecommendationLogEntry): void {
    this.log(
      LogLevel.INFO,
      'Recommendation request completed',
      {
        strategy: entry.strategy,
        topN: entry.topN,
        catalogSize: entry.catalogSize,
        candidateCount: entry.candidateCount,
        filterBypassed: entry.filterBypassed,
        resultIds: entry.resultIds,
        processingTimeMs: entry.processingTimeMs,
      },
      undefined,
      entry.correlationId ?? this.correlationId
    );
  }
}

export function createLogger(config: Partial<LoggerConfig> = {}): Logger {
  return new Logger(config);
}

/**
 * In-memory telemetry client for testing
 */
export class InMemoryTelemetryClient implements TelemetryClient {
  public traces: Array<{ message: string; severity: number; properties?: Record<string, string> }> = [];
  public exceptions: Array<{ exception: Error; properties?: Record<string, string> }> = [];
  public metrics: Array<{ name: string; value: number; properties?: Record<string, string> }> = [];

  trackTrace(message: string, severity: number, properties?: Record<string, string>): void {
    this.traces.push({ message, severity, properties });
  }

  trackException(exception: Error, properties?: Record<string, string>): void {
    this.exceptions.push({ exception, properties });
  }

  trackMetric(name: string, value: number, properties?: Record<string, string>): void {
    this.metrics.push({ name, value, properties });
  }
}

let globalLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = createLogger();
  }
  return globalLogger;
}
