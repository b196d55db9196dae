/**
 * =============================================================================
 * LOGGER SERVICE
 * =============================================================================
 *
 * Winston logger shared by the server, the side-car and the demo client.
 *
 * Line shape: `<timestamp> [LEVEL] [callId]: message {meta}`; the call id
 * bracket is present only when the entry belongs to a call. Incoming call
 * metadata is logged by key, with credential-bearing keys redacted.
 * =============================================================================
 */

import winston from 'winston';
import { Metadata } from '@grpc/grpc-js';
import { config } from '../../config/environment';

/**
 * Header keys (lowercased substrings) whose values never reach a log line
 */
const REDACTED_KEYS = [
  'authorization',
  'cookie',
  'token',
  'secret',
  'api-key',
  'apikey',
  'password',
];

const REDACTED = '[REDACTED]';

function isRedactedKey(key: string): boolean {
  const lower = key.toLowerCase();
  return REDACTED_KEYS.some(field => lower.includes(field));
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !Buffer.isBuffer(value);
}

/**
 * Copy of `data` with redacted keys masked at any depth. gRPC Metadata is
 * flattened to its key/value map; binary values are shown by size.
 */
export function sanitizeLogData(data: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    if (isRedactedKey(key)) {
      sanitized[key] = REDACTED;
    } else if (value instanceof Metadata) {
      sanitized[key] = sanitizeLogData(describeMetadata(value));
    } else if (isPlainRecord(value)) {
      sanitized[key] = sanitizeLogData(value);
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}

function describeMetadata(metadata: Metadata): Record<string, unknown> {
  const entries: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(metadata.getMap())) {
    entries[key] = typeof value === 'string' ? value : `<${value.length} bytes>`;
  }
  return entries;
}

export function formatLogLine(info: winston.Logform.TransformableInfo): string {
  const { level, message, timestamp, stack, callId, ...meta } = info;

  let line = `${String(timestamp)} [${level.toUpperCase()}]`;
  if (typeof callId === 'string') {
    line += ` [${callId}]`;
  }
  line += `: ${String(message)}`;

  const sanitizedMeta = sanitizeLogData(meta);
  if (Object.keys(sanitizedMeta).length > 0) {
    line += ` ${JSON.stringify(sanitizedMeta)}`;
  }

  if (typeof stack === 'string') {
    line += `\n${stack}`;
  }

  return line;
}

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(formatLogLine)
);

export const logger = winston.createLogger({
  level: config.logLevel,
  format: logFormat,
  silent: config.isTest,
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        logFormat
      )
    }),

    ...(config.isProduction ? [
      new winston.transports.File({
        filename: 'logs/error.log',
        level: 'error',
        maxsize: 5242880, // 5MB
        maxFiles: 5
      }),
      new winston.transports.File({
        filename: 'logs/combined.log',
        maxsize: 5242880,
        maxFiles: 5
      })
    ] : [])
  ]
});

export const logError = (message: string, error?: unknown) => {
  if (error instanceof Error) {
    logger.error(message, { error: error.message, stack: error.stack });
  } else {
    logger.error(message, { error });
  }
};
