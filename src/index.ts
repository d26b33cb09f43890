import { CatalogReader } from './lib/catalog-reader.js';
import Errors from './lib/errors.js';
import type { ExplorerConfigInput } from './lib/explorer-config.js';
import {
  resolveExplorerConfig,
  resolveExplorerConfigFromEnv,
  resolvePostgresConfigFromEnv,
} from './lib/explorer-config.js';
import { ExplorerSession } from './lib/explorer-session.js';
import { asc, createOperators, desc, ops, page, parseDistinctRequest, parseQueryRequest } from './lib/filter-spec.js';
import { PgTransport } from './lib/pg-transport.js';
import type { PostgresConfig } from './lib/postgres-config.js';
import { QueryPlanner } from './lib/query-planner.js';
import { QueryRunner } from './lib/query-runner.js';
import { ResultProjector } from './lib/result-projector.js';
import { setDebugLogger } from './lib/runtime.js';
import { SchemaGraph } from './lib/schema-graph.js';
import { inferSchema } from './lib/schema-inferencer.js';
import { SessionCache } from './lib/session-cache.js';
import type { DatabaseTransport } from './lib/transport.js';

/**
 * Odoo-aware PostgreSQL schema explorer
 *
 * Reads a live Odoo database's catalog, rebuilds the ORM's logical models
 * from it and serves paged, filtered record views over those models.
 */

export interface CreateExplorerSessionOptions {
  /** Connection settings for the built-in pg transport. */
  postgres?: Partial<PostgresConfig>;
  /** Use this transport instead of opening a pg pool. */
  transport?: DatabaseTransport;
  config?: ExplorerConfigInput;
}

/**
 * Open a session. Without a `transport`, a pg pool is created from
 * `postgres` and checked with one round trip before the session is returned.
 *
 * The schema is not read until {@link ExplorerSession.refreshSchema} is called.
 */
const createExplorerSession = async (options: CreateExplorerSessionOptions = {}): Promise<ExplorerSession> => {
  const config = resolveExplorerConfig(options.config);
  if (options.transport) {
    return new ExplorerSession(options.transport, config);
  }
  const transport = await new PgTransport(options.postgres).connect();
  return new ExplorerSession(transport, config);
};

export {
  CatalogReader,
  Errors,
  ExplorerSession,
  PgTransport,
  QueryPlanner,
  QueryRunner,
  ResultProjector,
  SchemaGraph,
  SessionCache,
  asc,
  createExplorerSession,
  createOperators,
  desc,
  inferSchema,
  ops,
  page,
  parseDistinctRequest,
  parseQueryRequest,
  resolveExplorerConfig,
  resolveExplorerConfigFromEnv,
  resolvePostgresConfigFromEnv,
  setDebugLogger,
};

export {
  ConnectionError,
  ExecutionError,
  ExplorerError,
  InvalidFilterError,
  PermissionError,
  UnsupportedTraversalError,
} from './lib/errors.js';

export type { ErrorContext, ExecutionFailureReason } from './lib/errors.js';
export type { RawColumn, RawForeignKey, RawIndex, RawTable, TableRef } from './lib/catalog-types.js';
export type { ExplorerConfig, ExplorerConfigInput } from './lib/explorer-config.js';
export type {
  FetchRelatedOptions,
  ModelSummary,
  RefreshOptions,
  RequestOptions,
} from './lib/explorer-session.js';
export type {
  DistinctRequest,
  DistinctRequestInput,
  FilterOperator,
  FilterSpec,
  PageSpec,
  QueryRequest,
  QueryRequestInput,
  SortSpec,
} from './lib/filter-spec.js';
export type { PostgresConfig } from './lib/postgres-config.js';
export type { CountMode, DistinctPlan, PlannedPage, QueryPlan } from './lib/query-planner.js';
export type {
  DistinctValues,
  FieldValue,
  JsonValue,
  LazyRelation,
  RecordId,
  RelationValue,
  ResultRecord,
  ResultSet,
} from './lib/result-projector.js';
export type { ExplorerDebugLogger } from './lib/runtime.js';
export type { InferenceOptions } from './lib/schema-inferencer.js';
export type * from './lib/schema-types.js';
export type { DatabaseTransport, QueryHandle, TransportResult } from './lib/transport.js';

export default createExplorerSession;
