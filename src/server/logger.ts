import { randomUUID } from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';

type LogLevel = 'error' | 'warn' | 'info' | 'debug';

type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

const LEVELS: Record<LogLevel | 'silent', number> = {
  silent: -1,
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

function isLevelName(value: string): value is keyof typeof LEVELS {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

// Read per call so tests and CLIs can change LOG_LEVEL after import.
function threshold(): number {
  const raw = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLevelName(raw) ? LEVELS[raw] : LEVELS.info;
}

function asErrorPayload(error: unknown) {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }
  if (typeof error === 'object' && error !== null) {
    return error;
  }
  return { message: String(error) };
}

function normalizeMeta(meta?: LogMeta) {
  if (!meta) return undefined;
  const out: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    if (value === undefined) continue;
    out[key] = value instanceof Error ? asErrorPayload(value) : value;
  }
  return Object.keys(out).length ? out : undefined;
}

function baseLog(level: LogLevel, scope: string | undefined, message: string, meta?: LogMeta) {
  if (LEVELS[level] > threshold()) return;
  const timestamp = new Date().toISOString();
  const normalized = normalizeMeta(meta);
  const prefix = scope ? `[${level.toUpperCase()}] [${scope}]` : `[${level.toUpperCase()}]`;
  const line = normalized
    ? `${timestamp} ${prefix} ${message} ${JSON.stringify(normalized)}`
    : `${timestamp} ${prefix} ${message}`;

  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function createLogger(scope?: string): Logger {
  return {
    debug(message, meta) {
      baseLog('debug', scope, message, meta);
    },
    info(message, meta) {
      baseLog('info', scope, message, meta);
    },
    warn(message, meta) {
      baseLog('warn', scope, message, meta);
    },
    error(message, meta) {
      baseLog('error', scope, message, meta);
    },
  };
}

export const logger = createLogger();

export function serializeError(error: unknown) {
  return asErrorPayload(error);
}

export function getRequestId(res: Response): string | undefined {
  const id: unknown = res.locals.requestId;
  return typeof id === 'string' ? id : undefined;
}

export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const header = req.headers['x-request-id'];
  const requestId = typeof header === 'string' && header ? header : randomUUID();
  const start = process.hrtime.bigint();

  res.locals.requestId = requestId;
  res.setHeader('X-Request-Id', requestId);
  logger.info('Incoming request', {
    requestId,
    method: req.method,
    path: req.originalUrl,
    ip: req.ip,
  });

  res.on('finish', () => {
    const durationMs = Number(process.hrtime.bigint() - start) / 1_000_000;
    logger.info('Request completed', {
      requestId,
      status: res.statusCode,
      durationMs: Math.round(durationMs * 100) / 100,
    });
  });

  res.on('close', () => {
    if (!res.writableEnded) {
      const durationMs = Number(process.hrtime.bigint() - start) / 1_000_000;
      logger.warn('Request aborted by client', {
        requestId,
        method: req.method,
        path: req.originalUrl,
        durationMs: Math.round(durationMs * 100) / 100,
      });
    }
  });

  next();
}
