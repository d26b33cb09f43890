import { CatalogReader } from './catalog-reader.js';
import { tableKey } from './catalog-types.js';
import type { PermissionError } from './errors.js';
import { ExecutionError, ExplorerError, InvalidFilterError } from './errors.js';
import type { ExplorerConfig } from './explorer-config.js';
import type { FilterSpec, PageSpec, QueryRequest, SortSpec } from './filter-spec.js';
import { parseDistinctRequest, parseQueryRequest } from './filter-spec.js';
import { QueryPlanner } from './query-planner.js';
import { QueryRunner } from './query-runner.js';
import type { DistinctValues, RecordId, ResultRecord, ResultSet } from './result-projector.js';
import { ResultProjector } from './result-projector.js';
import { debug } from './runtime.js';
import { inferSchema } from './schema-inferencer.js';
import type { SchemaGraph } from './schema-graph.js';
import { findField } from './schema-graph.js';
import type { InferenceWarning, LogicalModel, ModelTrait } from './schema-types.js';
import { isRelational } from './schema-types.js';
import { SessionCache } from './session-cache.js';
import type { DatabaseTransport } from './transport.js';

export interface ModelSummary {
  name: string;
  table: string;
  fieldCount: number;
  traits: readonly ModelTrait[];
  /** Delegated parent models, root first. */
  inherits: string[];
  readable: boolean;
  comment: string | null;
}

export interface RefreshOptions {
  /** Overrides the configured schema list for this refresh. */
  schemas?: readonly string[];
  signal?: AbortSignal;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

export interface FetchRelatedOptions extends RequestOptions {
  sort?: SortSpec[];
  page?: PageSpec;
  locale?: string;
}

/**
 * One catalog introspection shared by every caller asking for the same schema
 * list. Its reads are aborted only once every caller that joined has
 * abandoned it; callers without a signal never do.
 */
class RefreshFlight {
  readonly key: string;
  readonly promise: Promise<SchemaGraph>;
  private readonly controller = new AbortController();
  private subscribers = 0;
  private abandoned = 0;
  private done = false;

  constructor(key: string, run: (signal: AbortSignal) => Promise<SchemaGraph>) {
    this.key = key;
    // Marked done before any caller sees the outcome.
    this.promise = run(this.controller.signal).finally(() => {
      this.done = true;
    });
  }

  /** Still running and not abandoned, so a new caller may join. */
  get open(): boolean {
    return !this.done && !this.controller.signal.aborted;
  }

  join(signal?: AbortSignal): Promise<SchemaGraph> {
    this.subscribers += 1;
    if (!signal) {
      return this.promise;
    }
    if (signal.aborted) {
      this.release();
      return Promise.reject(new ExecutionError('Schema refresh cancelled', 'cancelled'));
    }

    return new Promise<SchemaGraph>((resolve, reject) => {
      const onAbort = () => {
        this.release();
        reject(new ExecutionError('Schema refresh cancelled', 'cancelled'));
      };
      signal.addEventListener('abort', onAbort, { once: true });
      void this.promise.then(
        graph => {
          signal.removeEventListener('abort', onAbort);
          resolve(graph);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }

  /** Resolves once the flight is over, whatever its outcome; for sequencing only. */
  settled(): Promise<void> {
    return this.promise.then(
      () => undefined,
      () => undefined
    );
  }

  private release(): void {
    this.abandoned += 1;
    if (this.abandoned >= this.subscribers) {
      this.controller.abort();
    }
  }
}

const normalizeSchemas = (schemas: readonly string[]): string[] => [...new Set(schemas)].sort();

/**
 * Inbound surface of the engine for one database connection. Holds the
 * cached schema graph and serves model descriptions and record pages from it.
 */
export class ExplorerSession {
  readonly config: ExplorerConfig;
  readonly transport: DatabaseTransport;
  private readonly reader: CatalogReader;
  private readonly projector: ResultProjector;
  private readonly cache: SessionCache;
  private planner: QueryPlanner | null = null;
  private flight: RefreshFlight | null = null;
  private skipped: PermissionError[] = [];

  constructor(transport: DatabaseTransport, config: ExplorerConfig) {
    this.transport = transport;
    this.config = config;
    this.reader = new CatalogReader(new QueryRunner(transport, config.catalogTimeoutMs), {
      batchSize: config.catalogBatchSize,
      timeoutMs: config.catalogTimeoutMs,
    });
    this.projector = new ResultProjector(new QueryRunner(transport, config.statementTimeoutMs));
    this.cache = new SessionCache(config.resultCacheSize);
  }

  get generation(): number {
    return this.cache.generation;
  }

  get warnings(): readonly InferenceWarning[] {
    return this.cache.getGraph()?.warnings ?? [];
  }

  /** Schemas left out of the last refresh for lack of privileges. */
  get skippedSchemas(): readonly PermissionError[] {
    return this.skipped;
  }

  /**
   * Introspect the database and rebuild the schema graph. Concurrent calls for
   * the same schemas share the refresh in flight; a call for other schemas
   * runs after it. Readers keep the previous graph until the new one is
   * complete.
   *
   * @throws ExecutionError with reason `cancelled` when `signal` aborts
   */
  refreshSchema(options: RefreshOptions = {}): Promise<SchemaGraph> {
    const schemas = normalizeSchemas(options.schemas ?? this.config.schemas);
    const key = schemas.join(',');

    let flight = this.flight;
    if (!flight || flight.key !== key || !flight.open) {
      const previous = flight;
      flight = new RefreshFlight(key, async signal => {
        if (previous) {
          await previous.settled();
        }
        return this.rebuild(schemas, signal);
      });
      this.flight = flight;
    }
    return flight.join(options.signal);
  }

  private async rebuild(schemas: readonly string[], signal: AbortSignal): Promise<SchemaGraph> {
    const skipped: PermissionError[] = [];
    const started = Date.now();

    const tables = await this.reader.listTables(schemas, {
      signal,
      onSchemaSkipped: error => {
        debug.db(`Skipping schema ${error.context.schema ?? '?'}: ${error.message}`);
        skipped.push(error);
      },
    });

    const graph = inferSchema(tables, {
      defaultSchema: this.config.defaultSchema,
      labelFields: this.config.labelFields,
      translatedFields: this.config.translatedFields,
      computedFields: this.config.computedFields,
    });

    this.cache.setGraph(graph);
    this.planner = new QueryPlanner(graph, {
      defaultLocale: this.config.defaultLocale,
      rowCeiling: this.config.rowCeiling,
      defaultPageSize: this.config.defaultPageSize,
      countMode: this.config.countMode,
    });
    this.skipped = skipped;

    debug.db(
      `Schema refreshed in ${Date.now() - started}ms: ${tables.length} tables, ${graph.size} models, ` +
        `${graph.warnings.length} warnings, ${skipped.length} schemas skipped`
    );
    return graph;
  }

  private requireGraph(): { graph: SchemaGraph; planner: QueryPlanner } {
    const graph = this.cache.getGraph();
    if (!graph || !this.planner) {
      throw new ExplorerError('Schema not loaded. Call refreshSchema() first.', 'SCHEMA_NOT_LOADED');
    }
    return { graph, planner: this.planner };
  }

  private requireModel(graph: SchemaGraph, name: string): LogicalModel {
    const model = graph.get(name);
    if (!model) {
      throw new InvalidFilterError(`Unknown model '${name}'`, { model: name });
    }
    return model;
  }

  listModels(): ModelSummary[] {
    const { graph } = this.requireGraph();
    return graph.list().map(model => ({
      name: model.name,
      table: tableKey(model.table),
      fieldCount: model.fields.length,
      traits: model.traits,
      inherits: model.delegation.map(link => link.model),
      readable: model.readable,
      comment: model.comment,
    }));
  }

  /**
   * @param name - Model name (`res.partner`) or `schema.table`
   */
  describeModel(name: string): LogicalModel {
    const { graph } = this.requireGraph();
    return this.requireModel(graph, name);
  }

  /**
   * Fetch one page of a model's records.
   *
   * @throws InvalidFilterError for malformed requests or paths that do not resolve
   * @throws UnsupportedTraversalError for paths crossing more than one relation
   * @throws ExecutionError when a statement fails
   */
  async query(input: unknown, options: RequestOptions = {}): Promise<ResultSet> {
    const request = parseQueryRequest(input);
    return this.run(request, options);
  }

  private async run(request: QueryRequest, options: RequestOptions): Promise<ResultSet> {
    const { graph, planner } = this.requireGraph();
    const generation = this.cache.generation;
    const model = this.requireModel(graph, request.model);

    const plan = planner.plan(model, request.filters, request.sort, request.page, {
      locale: request.locale,
    });

    if (!request.fresh) {
      const cached = this.cache.getResult(plan.fingerprint);
      if (cached) {
        debug.db(`Result cache hit for ${model.name}`);
        return cached;
      }
    }

    const result = await this.projector.execute(plan, model, {
      signal: options.signal,
      defaultLocale: this.config.defaultLocale,
    });

    // A refresh that landed meanwhile makes this result stale for caching.
    if (this.cache.generation === generation) {
      this.cache.setResult(plan.fingerprint, result);
    }
    return result;
  }

  /**
   * List the distinct values of one field path over the filtered rows, with
   * labels for many2one values.
   *
   * @throws InvalidFilterError for malformed requests and to-many paths
   * @throws ExecutionError when a statement fails
   */
  async distinctValues(input: unknown, options: RequestOptions = {}): Promise<DistinctValues> {
    const request = parseDistinctRequest(input);
    const { graph, planner } = this.requireGraph();
    const model = this.requireModel(graph, request.model);

    const plan = planner.planDistinct(model, request.path, request.filters, {
      locale: request.locale,
      limit: request.limit,
      count: request.count,
    });
    return this.projector.executeDistinct(plan, {
      signal: options.signal,
      defaultLocale: this.config.defaultLocale,
    });
  }

  /**
   * Load the records behind a relation value of `record`.
   */
  async fetchRelated(
    record: ResultRecord,
    fieldName: string,
    options: FetchRelatedOptions = {}
  ): Promise<ResultSet> {
    const { graph } = this.requireGraph();
    const model = this.requireModel(graph, record.model);
    const field = findField(model, fieldName);
    if (!field) {
      throw new InvalidFilterError(`Field '${fieldName}' does not exist on model ${model.name}`, {
        model: model.name,
        path: fieldName,
      });
    }
    if (!isRelational(field)) {
      throw new InvalidFilterError(`Field '${fieldName}' on model ${model.name} is not a relation`, {
        model: model.name,
        path: fieldName,
      });
    }
    const target = graph.resolve(field.target);
    if (!target) {
      throw new InvalidFilterError(
        `Relation '${fieldName}' points at ${field.target.model}, which is not loaded`,
        { model: model.name, path: fieldName }
      );
    }

    let filter: FilterSpec;
    if (field.kind === 'many2one') {
      const value = record.values[fieldName];
      const id = relationId(value);
      if (id === null) {
        filter = { path: field.target.key, operator: 'in', value: [] };
      } else {
        filter = { path: field.target.key, operator: '=', value: id };
      }
    } else {
      const id = requireRecordId(record, model);
      if (field.kind === 'one2many') {
        filter = { path: field.inverseField, operator: '=', value: id };
      } else if (field.inverseField) {
        filter = { path: field.inverseField, operator: 'in', value: [id] };
      } else {
        throw new InvalidFilterError(`Relation '${fieldName}' has no inverse on ${target.name}`, {
          model: model.name,
          path: fieldName,
        });
      }
    }

    return this.run(
      {
        model: target.name,
        filters: [filter],
        sort: options.sort ?? [],
        page: options.page ?? { offset: 0 },
        locale: options.locale,
        fresh: false,
      },
      options
    );
  }

  listSchemas(options: RequestOptions = {}): Promise<string[]> {
    return this.reader.listSchemas(options.signal);
  }

  invalidate(): void {
    this.cache.invalidate();
    this.planner = null;
  }

  async close(): Promise<void> {
    this.invalidate();
    if (this.transport.close) {
      await this.transport.close();
    }
  }
}

function relationId(value: unknown): RecordId | null {
  if (value && typeof value === 'object' && 'kind' in value && value.kind === 'relation' && 'id' in value) {
    const { id } = value;
    return typeof id === 'number' || typeof id === 'string' ? id : null;
  }
  return null;
}

function requireRecordId(record: ResultRecord, model: LogicalModel): RecordId {
  if (record.id === null) {
    throw new InvalidFilterError(`Record of ${model.name} has no id to follow relations from`, {
      model: model.name,
    });
  }
  return record.id;
}

export default ExplorerSession;
