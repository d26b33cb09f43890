import type { ErrorContext } from './errors.js';
import { ConnectionError, ExecutionError, classifyDriverError } from './errors.js';
import { debug, describeError } from './runtime.js';
import type { DatabaseTransport, QueryHandle, TransportResult } from './transport.js';

export interface RunOptions {
  signal?: AbortSignal;
  /** Overrides the runner's default statement timeout. */
  timeoutMs?: number;
  /** What the statement reads, attached to any error it raises. */
  context?: ErrorContext;
}

export interface RunnableStatement {
  readonly sql: string;
  readonly params: readonly unknown[];
}

/**
 * Runs statements through a {@link DatabaseTransport} with the engine's
 * failure policy: errors come back classified, an abort signal reaches the
 * server as a cancel, and a connection failure gets exactly one reconnect and
 * retry before it is surfaced.
 */
export class QueryRunner {
  readonly transport: DatabaseTransport;
  readonly timeoutMs: number;

  constructor(transport: DatabaseTransport, timeoutMs: number) {
    this.transport = transport;
    this.timeoutMs = timeoutMs;
  }

  async run<TRow extends Record<string, unknown> = Record<string, unknown>>(
    statement: RunnableStatement,
    options: RunOptions = {}
  ): Promise<TransportResult<TRow>> {
    try {
      return await this.attempt<TRow>(statement, options);
    } catch (error) {
      if (!(error instanceof ConnectionError) || !this.transport.reconnect || options.signal?.aborted) {
        throw error;
      }

      debug.db(`Connection lost (${error.message}); reconnecting once`);
      try {
        await this.transport.reconnect();
      } catch (reconnectError) {
        throw classifyDriverError(reconnectError, options.context);
      }
      return this.attempt<TRow>(statement, options);
    }
  }

  private async attempt<TRow extends Record<string, unknown>>(
    statement: RunnableStatement,
    options: RunOptions
  ): Promise<TransportResult<TRow>> {
    const { signal } = options;
    const context: ErrorContext = { ...options.context, sql: statement.sql };

    if (signal?.aborted) {
      throw new ExecutionError('Query cancelled before it started', 'cancelled', context);
    }

    let handle: QueryHandle | null = null;
    let cancelRequested = false;

    const onAbort = () => {
      cancelRequested = true;
      if (handle) {
        void this.cancelQuietly(handle);
      }
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const result = await this.transport.executeQuery<TRow>(statement.sql, statement.params, {
        timeoutMs: options.timeoutMs ?? this.timeoutMs,
        onStart: started => {
          handle = started;
          if (cancelRequested) {
            void this.cancelQuietly(started);
          }
        },
      });
      if (cancelRequested) {
        throw new ExecutionError('Query cancelled', 'cancelled', context);
      }
      return result;
    } catch (error) {
      const classified = classifyDriverError(error, context);
      if (cancelRequested && classified instanceof ExecutionError && classified.reason !== 'cancelled') {
        throw new ExecutionError('Query cancelled', 'cancelled', classified.context, error, classified.sqlState);
      }
      throw classified;
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * Cancellation is best effort: the statement may already have finished.
   */
  private async cancelQuietly(handle: QueryHandle): Promise<void> {
    try {
      await this.transport.cancel(handle);
    } catch (error) {
      debug.error(`Failed to cancel backend ${handle.backendPid}: ${describeError(error)}`);
    }
  }
}

export default QueryRunner;
