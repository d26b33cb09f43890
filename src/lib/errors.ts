/**
 * Error classes for the Odoo schema explorer
 *
 * Every failure surfaced by the engine is an {@link ExplorerError} carrying a
 * stable `code` and a structured `context`, so callers can render messages
 * without parsing driver strings.
 */

export interface PostgresError extends Error {
  code?: string;
  detail?: string;
  schema?: string;
  table?: string;
  column?: string;
  constraint?: string;
}

export interface ErrorContext {
  schema?: string;
  table?: string;
  column?: string;
  path?: string;
  model?: string;
  sql?: string;
}

/**
 * Base explorer error class
 */
export class ExplorerError extends Error {
  code: string;
  context: ErrorContext;

  constructor(message: string, code: string, context: ErrorContext = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.context = context;
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Transport-level failure; recoverable by reconnecting.
 */
export class ConnectionError extends ExplorerError {
  originalError: unknown;

  constructor(message = 'Database connection error', originalError: unknown = null, context: ErrorContext = {}) {
    super(message, 'CONNECTION_ERROR', context);
    this.name = 'ConnectionError';
    this.originalError = originalError;
  }
}

/**
 * Catalog or data access denied for a schema or table.
 */
export class PermissionError extends ExplorerError {
  originalError: unknown;

  constructor(message: string, context: ErrorContext = {}, originalError: unknown = null) {
    super(message, 'PERMISSION_ERROR', context);
    this.name = 'PermissionError';
    this.originalError = originalError;
  }
}

/**
 * A filter, sort or field path does not resolve against the current schema graph.
 */
export class InvalidFilterError extends ExplorerError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, 'INVALID_FILTER', context);
    this.name = 'InvalidFilterError';
  }
}

/**
 * A field path asks for more relation hops than the planner allows.
 */
export class UnsupportedTraversalError extends ExplorerError {
  maxDepth: number;

  constructor(message: string, context: ErrorContext = {}, maxDepth = 1) {
    super(message, 'UNSUPPORTED_TRAVERSAL', context);
    this.name = 'UnsupportedTraversalError';
    this.maxDepth = maxDepth;
  }
}

export type ExecutionFailureReason = 'timeout' | 'cancelled' | 'permission' | 'failed';

/**
 * Statement execution failure
 */
export class ExecutionError extends ExplorerError {
  reason: ExecutionFailureReason;
  sqlState: string | null;
  originalError: unknown;

  constructor(
    message: string,
    reason: ExecutionFailureReason,
    context: ErrorContext = {},
    originalError: unknown = null,
    sqlState: string | null = null
  ) {
    super(message, 'EXECUTION_ERROR', context);
    this.name = 'ExecutionError';
    this.reason = reason;
    this.sqlState = sqlState;
    this.originalError = originalError;
  }
}

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EPIPE',
  'EHOSTUNREACH',
]);

const PERMISSION_MESSAGE = /permission denied for (?:table|relation|schema|view|sequence) "?([\w$.]+)"?/i;
const MISSING_RELATION_MESSAGE = /relation "([\w$.]+)" does not exist/i;
const MISSING_COLUMN_MESSAGE = /column "?([\w$.]+?)"? does not exist/i;

function readString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Work out which table/column a driver error is about. Explicit driver fields
 * win over the message, which wins over the caller's context.
 */
function resolveErrorContext(
  error: Record<string, unknown>,
  message: string,
  fallback: ErrorContext
): ErrorContext {
  const context: ErrorContext = { ...fallback };

  const schema = readString(error, 'schema');
  const table = readString(error, 'table');
  const column = readString(error, 'column');

  if (schema) context.schema = schema;
  if (table) {
    context.table = table;
  } else {
    const match = PERMISSION_MESSAGE.exec(message) ?? MISSING_RELATION_MESSAGE.exec(message);
    if (match?.[1]) {
      const parts = match[1].split('.');
      context.table = parts[parts.length - 1];
      if (parts.length > 1) context.schema = parts[0];
    }
  }
  if (column) {
    context.column = column;
  } else {
    const match = MISSING_COLUMN_MESSAGE.exec(message);
    if (match?.[1]) {
      const parts = match[1].split('.');
      context.column = parts[parts.length - 1];
    }
  }

  return context;
}

/**
 * Convert a driver (pg) error into the explorer taxonomy.
 *
 * @param driverError - Error thrown by the transport
 * @param context - What the caller was doing (table, column, statement)
 * @returns Structured explorer error
 */
export function classifyDriverError(
  driverError: unknown,
  context: ErrorContext = {}
): ExplorerError {
  if (driverError instanceof ExplorerError) {
    return driverError;
  }

  if (!driverError || typeof driverError !== 'object') {
    return new ExecutionError(String(driverError ?? 'Unknown error'), 'failed', context, driverError);
  }

  const error = driverError as Record<string, unknown>;
  const message = typeof error.message === 'string' ? error.message : 'Unknown error';
  const code = typeof error.code === 'string' ? error.code : '';
  const resolved = resolveErrorContext(error, message, context);

  if (CONNECTION_ERROR_CODES.has(code)) {
    return new ConnectionError(message, driverError, resolved);
  }

  // PostgreSQL error codes: https://www.postgresql.org/docs/current/errcodes-appendix.html
  switch (code) {
    case '08000': // connection_exception
    case '08001': // sqlclient_unable_to_establish_sqlconnection
    case '08003': // connection_does_not_exist
    case '08006': // connection_failure
    case '57P01': // admin_shutdown
    case '57P02': // crash_shutdown
    case '57P03': // cannot_connect_now
      return new ConnectionError(message, driverError, resolved);

    case '42501': // insufficient_privilege
      return new ExecutionError(
        `Permission denied: ${message}`,
        'permission',
        resolved,
        driverError,
        code
      );

    case '57014': // query_canceled
      return new ExecutionError(
        message,
        /statement timeout/i.test(message) ? 'timeout' : 'cancelled',
        resolved,
        driverError,
        code
      );

    case '42P01': // undefined_table
      return new ExecutionError(`Table does not exist: ${message}`, 'failed', resolved, driverError, code);

    case '42703': // undefined_column
      return new ExecutionError(`Column does not exist: ${message}`, 'failed', resolved, driverError, code);

    default:
      if (/Connection terminated|Client has encountered a connection error/i.test(message)) {
        return new ConnectionError(message, driverError, resolved);
      }
      return new ExecutionError(message, 'failed', resolved, driverError, code || null);
  }
}

/**
 * Turn a permission failure on a catalog query into a skip-able PermissionError.
 */
export function toPermissionError(error: ExplorerError, context: ErrorContext): PermissionError | null {
  if (error instanceof PermissionError) {
    return error;
  }
  if (error instanceof ExecutionError && error.reason === 'permission') {
    return new PermissionError(error.message, { ...error.context, ...context }, error);
  }
  return null;
}

const errors = {
  ExplorerError,
  ConnectionError,
  PermissionError,
  InvalidFilterError,
  UnsupportedTraversalError,
  ExecutionError,
  classifyDriverError,
  toPermissionError,
} as const;

export default errors;
