import pino from 'pino';
import { env } from './config.js';

/**
 * Keys whose values never reach the log output
 */
const SENSITIVE_PATTERNS = [
  'token',
  'password',
  'secret',
  'authorization',
  'credential',
  'bearer',
  'api_key',
  'apikey',
];

const REDACTED = '***REDACTED***';

/**
 * Mask credentials that end up inside free-form strings (error messages,
 * URLs) rather than under a sensitive key
 */
export function sanitizeString(str: string): string {
  let result = str.replace(/ghp_[A-Za-z0-9_]{36,}/g, 'ghp_***REDACTED***');
  result = result.replace(/gho_[A-Za-z0-9_]{36,}/g, 'gho_***REDACTED***');
  result = result.replace(/github_pat_[A-Za-z0-9_]{22,}/g, 'github_pat_***REDACTED***');
  result = result.replace(/Bearer\s+[A-Za-z0-9\-_.~+/]+=*/gi, 'Bearer ***REDACTED***');
  result = result.replace(/xox[aboprs]-[A-Za-z0-9-]+/g, 'xox*-***REDACTED***');
  return result;
}

/**
 * Deep sanitize an object, redacting sensitive values
 */
export function sanitizeObject(obj: unknown, depth = 0): unknown {
  if (depth > 10) return '[MAX_DEPTH]';
  if (obj === null || obj === undefined) return obj;
  if (typeof obj === 'string') return sanitizeString(obj);
  if (typeof obj !== 'object') return obj;

  if (Array.isArray(obj)) {
    return obj.map((item) => sanitizeObject(item, depth + 1));
  }

  // Keep name and message, sanitize the stack
  if (obj instanceof Error) {
    const sanitizedError: Record<string, unknown> = {
      name: obj.name,
      message: sanitizeString(obj.message),
    };
    if ('status' in obj) sanitizedError.status = obj.status;
    if (obj.stack) sanitizedError.stack = sanitizeString(obj.stack);
    return sanitizedError;
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    const keyLower = key.toLowerCase();
    const isSensitive = SENSITIVE_PATTERNS.some((pattern) => keyLower.includes(pattern));

    if (isSensitive && value !== null && value !== undefined) {
      result[key] = REDACTED;
    } else {
      result[key] = sanitizeObject(value, depth + 1);
    }
  }
  return result;
}

// stdout carries the MCP stdio protocol, so every log line goes to stderr (fd 2)
const baseLogger = pino({
  level: env.LOG_LEVEL ?? (env.NODE_ENV === 'production' ? 'info' : 'debug'),
  transport:
    env.NODE_ENV !== 'production'
      ? {
          target: 'pino-pretty',
          options: {
            destination: 2,
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : {
          target: 'pino/file',
          options: { destination: 2 },
        },
  base: {
    service: 'devops-gateway',
  },
  serializers: {
    err: (err: Error) => sanitizeObject(err),
    error: (err: unknown) => sanitizeObject(err),
    params: (params: unknown) => sanitizeObject(params),
  },
  redact: {
    paths: ['headers.authorization', 'headers.token', 'body.password', 'password', 'token'],
    censor: REDACTED,
  },
});

export const logger = baseLogger;

export function createLogger(component: string) {
  return baseLogger.child({ component });
}
