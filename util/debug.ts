import type { Debugger } from 'debug';
import debugModule from 'debug';

const SENSITIVE_LOG_KEYS = new Set<string>(['apiKey', 'api_key', 'authorization', 'password', 'token']);

type SerializableObject = Record<string, unknown>;

type RequestLike = {
  method?: string;
  originalUrl?: string;
  body?: unknown;
};

export interface DebugErrorContext {
  req?: RequestLike;
  error?: unknown;
}

export type DebugErrorDetail = DebugErrorContext | Error | string | null | undefined;

export interface DebugLoggerMap {
  app: Debugger;
  http: Debugger;
  rpc: Debugger;
  search: Debugger;
  errorLog: Debugger;
  error: DebugErrorFunction;
}

export interface DebugErrorFunction {
  (this: DebugLoggerMap, message: string, detail?: DebugErrorDetail): void;
  (this: DebugLoggerMap, detail: DebugErrorDetail): void;
}

export const LOG_NAMESPACE = 'ddg-search';

function sanitizeForLogging(value: unknown): unknown {
  if (value === null || typeof value !== 'object') return value;

  if (Array.isArray(value)) return value.map(item => sanitizeForLogging(item));

  const sanitized: SerializableObject = {};

  for (const [key, val] of Object.entries(value)) {
    if (SENSITIVE_LOG_KEYS.has(key)) {
      sanitized[key] = '<redacted>';
    } else {
      sanitized[key] = sanitizeForLogging(val);
    }
  }

  return sanitized;
}

const logStack = (logger: Debugger, error: unknown) => {
  logger('Stacktrace:');
  logger(error instanceof Error ? (error.stack ?? String(error)) : String(error));
};

const logDetail = (logger: Debugger, detail: DebugErrorDetail): void => {
  if (!detail) {
    return;
  }

  if (typeof detail === 'string') {
    logger(detail);
    return;
  }

  if (detail instanceof Error) {
    logStack(logger, detail);
    return;
  }

  const request = detail.req;

  if (request) {
    if (request.method || request.originalUrl)
      logger(
        `Request method: ${request.method ?? 'UNKNOWN'} - URL: ${request.originalUrl ?? 'UNKNOWN'}`
      );

    if (request.method !== 'GET' && request.body !== undefined) {
      logger('Request body:');
      if (typeof request.body === 'object') {
        logger(JSON.stringify(sanitizeForLogging(request.body), null, 2));
      } else {
        logger('<omitted>');
      }
    }
  }

  if (detail.error !== undefined) {
    logStack(logger, detail.error);
  }
};

/**
 * Enable the given namespaces once at process start. An explicit DEBUG
 * environment variable takes precedence over configured namespaces.
 */
export const configureLogging = (namespaces: string) => {
  const fromEnv = process.env.DEBUG;
  debugModule.enable(fromEnv && fromEnv.trim() ? fromEnv : namespaces);
};

const debug: DebugLoggerMap = {
  app: debugModule(`${LOG_NAMESPACE}:app`),
  http: debugModule(`${LOG_NAMESPACE}:http`),
  rpc: debugModule(`${LOG_NAMESPACE}:rpc`),
  search: debugModule(`${LOG_NAMESPACE}:search`),
  errorLog: debugModule(`${LOG_NAMESPACE}:error`),

  error(
    this: DebugLoggerMap,
    first: string | DebugErrorDetail,
    maybeDetail?: DebugErrorDetail
  ): void {
    const log = this.errorLog;

    if (typeof first === 'string') {
      log(first);
      if (maybeDetail !== undefined) {
        logDetail(log, maybeDetail);
      }
      return;
    }

    logDetail(log, first);
  },
};

export default debug;
export { sanitizeForLogging };
