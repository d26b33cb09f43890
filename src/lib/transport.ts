/**
 * Outbound database capability. The engine only issues read-only SQL through
 * this interface; how the connection is authenticated or pooled is the
 * transport's business.
 */

export interface QueryField {
  name: string;
  dataTypeID: number;
}

export interface TransportResult<TRow> {
  rows: TRow[];
  fields: QueryField[];
}

/**
 * Identifies a running statement so it can be cancelled from elsewhere.
 */
export interface QueryHandle {
  backendPid: number;
}

export interface ExecuteOptions {
  timeoutMs: number;
  /** Called once the statement is running and can be cancelled. */
  onStart?: (handle: QueryHandle) => void;
}

export interface DatabaseTransport {
  executeQuery<TRow extends Record<string, unknown> = Record<string, unknown>>(
    sql: string,
    params: readonly unknown[],
    options: ExecuteOptions
  ): Promise<TransportResult<TRow>>;
  /** Ask the server to cancel a running statement. */
  cancel(handle: QueryHandle): Promise<void>;
  /** Drop and re-establish connections after a transport failure. */
  reconnect?(): Promise<void>;
  close?(): Promise<void>;
}
