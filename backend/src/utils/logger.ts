/**
 * Structured Logging with Winston
 * Provides consistent, parseable logs for observability
 */

import winston from 'winston';
import * as fs from 'fs';
import * as path from 'path';

// Custom format for structured logging
const structuredFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

// Console format for development
const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} [${level}]: ${message}${metaStr}`;
  })
);

const isTest = process.env.NODE_ENV === 'test';
const logDir = path.join(process.cwd(), 'logs');

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  defaultMeta: { service: 'symptom-intake' },
  transports: [
    new winston.transports.Console({
      format: process.env.NODE_ENV === 'production' ? structuredFormat : consoleFormat,
      silent: isTest,
    }),
  ],
});

// No log files from test runs
if (!isTest) {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
  logger.add(new winston.transports.File({
    filename: path.join(logDir, 'app.log'),
    format: structuredFormat,
    maxsize: 5242880, // 5MB
    maxFiles: 5,
  }));
  logger.add(new winston.transports.File({
    filename: path.join(logDir, 'error.log'),
    level: 'error',
    format: structuredFormat,
    maxsize: 5242880,
    maxFiles: 5,
  }));
}

/**
 * Latency tracking for pipeline operations
 */
export interface LatencyMetrics {
  operation: string;
  startTime: number;
  endTime?: number;
  duration?: number;
  metadata?: Record<string, unknown>;
}

interface CompletedLatency extends LatencyMetrics {
  duration: number;
}

const latencyRecords: CompletedLatency[] = [];

export function startLatencyTracking(operation: string, metadata?: Record<string, unknown>): LatencyMetrics {
  return {
    operation,
    startTime: Date.now(),
    metadata,
  };
}

/**
 * End latency tracking and log the result
 */
export function endLatencyTracking(metrics: LatencyMetrics): number {
  const endTime = Date.now();
  const duration = endTime - metrics.startTime;
  metrics.endTime = endTime;
  metrics.duration = duration;

  latencyRecords.push({ ...metrics, duration });

  // Keep only last 1000 records in memory
  if (latencyRecords.length > 1000) {
    latencyRecords.shift();
  }

  const logLevel = duration > 1000 ? 'warn' : 'debug';
  logger.log(logLevel, `${metrics.operation} completed`, {
    duration,
    ...metrics.metadata,
  });

  return duration;
}

export function getLatencyStats(operation?: string): {
  count: number;
  avgMs: number;
  minMs: number;
  maxMs: number;
  p50Ms: number;
  p95Ms: number;
} {
  const records = operation
    ? latencyRecords.filter(r => r.operation === operation)
    : latencyRecords;

  if (records.length === 0) {
    return { count: 0, avgMs: 0, minMs: 0, maxMs: 0, p50Ms: 0, p95Ms: 0 };
  }

  const durations = records.map(r => r.duration).sort((a, b) => a - b);
  const sum = durations.reduce((a, b) => a + b, 0);

  return {
    count: durations.length,
    avgMs: Math.round(sum / durations.length),
    minMs: durations[0],
    maxMs: durations[durations.length - 1],
    p50Ms: durations[Math.floor(durations.length * 0.5)],
    p95Ms: durations[Math.floor(durations.length * 0.95)],
  };
}

export function logApiRequest(req: {
  method: string;
  path: string;
  ip?: string;
}): void {
  logger.info('API Request', {
    type: 'api_request',
    method: req.method,
    path: req.path,
    ip: req.ip,
  });
}

/**
 * Log API response; level follows the status code
 */
export function logApiResponse(res: {
  method: string;
  path: string;
  statusCode: number;
  duration: number;
}): void {
  const level = res.statusCode >= 500 ? 'error' : res.statusCode >= 400 ? 'warn' : 'info';
  logger.log(level, 'API Response', {
    type: 'api_response',
    method: res.method,
    path: res.path,
    statusCode: res.statusCode,
    duration: res.duration,
  });
}

export function logAppEvent(event: string, data?: Record<string, unknown>): void {
  logger.info(event, { type: 'app_event', ...data });
}

/**
 * Log error with stack trace
 */
export function logError(message: string, error: Error, context?: Record<string, unknown>): void {
  logger.error(message, {
    type: 'error',
    errorName: error.name,
    errorMessage: error.message,
    stack: error.stack,
    ...context,
  });
}

export { logger };
