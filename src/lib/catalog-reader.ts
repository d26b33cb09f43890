import type { RawColumn, RawForeignKey, RawIndex, RawTable } from './catalog-types.js';
import { compareTables } from './catalog-types.js';
import { ExplorerError, PermissionError, toPermissionError } from './errors.js';
import type { QueryRunner } from './query-runner.js';
import { debug } from './runtime.js';

export interface CatalogReaderOptions {
  /** Tables fetched per catalog round trip. */
  batchSize: number;
  timeoutMs: number;
}

export interface ListTablesOptions {
  signal?: AbortSignal;
  /** Receives each schema that was skipped for lack of privileges. */
  onSchemaSkipped?: (error: PermissionError) => void;
}

type Oid = number | string;

interface NamespaceRow extends Record<string, unknown> {
  oid: Oid;
  usable: boolean;
}

interface ClassRow extends Record<string, unknown> {
  oid: Oid;
  name: string;
  readable: boolean;
  comment: string | null;
}

interface ColumnRow extends Record<string, unknown> {
  table_oid: Oid;
  name: string;
  data_type: string;
  not_null: boolean;
  default_value: string | null;
  ordinal: number;
}

interface ConstraintRow extends Record<string, unknown> {
  table_oid: Oid;
  name: string;
  type: string;
  columns: string[];
  referenced_schema: string | null;
  referenced_table: string | null;
  referenced_columns: string[];
}

interface IndexRow extends Record<string, unknown> {
  table_oid: Oid;
  name: string;
  method: string;
  unique: boolean;
  primary: boolean;
  columns: string[];
}

const LIST_SCHEMAS_SQL = `SELECT n.nspname AS name
FROM pg_catalog.pg_namespace n
WHERE n.nspname NOT LIKE 'pg\\_%' AND n.nspname <> 'information_schema'
ORDER BY n.nspname`;

const SCHEMA_SQL = `SELECT n.oid, pg_catalog.has_schema_privilege(n.oid, 'USAGE') AS usable
FROM pg_catalog.pg_namespace n
WHERE n.nspname = $1`;

const TABLE_PAGE_SQL = `SELECT c.oid, c.relname AS name,
  pg_catalog.has_table_privilege(c.oid, 'SELECT') AS readable,
  pg_catalog.obj_description(c.oid, 'pg_class') AS comment
FROM pg_catalog.pg_class c
WHERE c.relnamespace = $1 AND c.relkind IN ('r', 'p') AND NOT c.relispartition AND c.relname > $2
ORDER BY c.relname
LIMIT $3`;

const COLUMNS_SQL = `SELECT a.attrelid AS table_oid, a.attname AS name,
  pg_catalog.format_type(a.atttypid, a.atttypmod) AS data_type,
  a.attnotnull AS not_null,
  pg_catalog.pg_get_expr(d.adbin, d.adrelid) AS default_value,
  a.attnum AS ordinal
FROM pg_catalog.pg_attribute a
LEFT JOIN pg_catalog.pg_attrdef d ON d.adrelid = a.attrelid AND d.adnum = a.attnum
WHERE a.attrelid = ANY($1::oid[]) AND a.attnum > 0 AND NOT a.attisdropped
ORDER BY a.attrelid, a.attnum`;

const attributeNames = (keyColumn: string, relationColumn: string) =>
  `ARRAY(SELECT att.attname FROM unnest(${keyColumn}) WITH ORDINALITY AS k(attnum, ord)
    JOIN pg_catalog.pg_attribute att ON att.attrelid = ${relationColumn} AND att.attnum = k.attnum
    ORDER BY k.ord)::text[]`;

const CONSTRAINTS_SQL = `SELECT con.conrelid AS table_oid, con.conname AS name, con.contype::text AS type,
  ${attributeNames('con.conkey', 'con.conrelid')} AS columns,
  fn.nspname AS referenced_schema, fc.relname AS referenced_table,
  ${attributeNames('con.confkey', 'con.confrelid')} AS referenced_columns
FROM pg_catalog.pg_constraint con
LEFT JOIN pg_catalog.pg_class fc ON fc.oid = con.confrelid
LEFT JOIN pg_catalog.pg_namespace fn ON fn.oid = fc.relnamespace
WHERE con.conrelid = ANY($1::oid[]) AND con.contype IN ('p', 'f')
ORDER BY con.conrelid, con.conname`;

const INDEXES_SQL = `SELECT i.indrelid AS table_oid, ic.relname AS name, am.amname AS method,
  i.indisunique AS unique, i.indisprimary AS primary,
  ${attributeNames('i.indkey::int2[]', 'i.indrelid')} AS columns
FROM pg_catalog.pg_index i
JOIN pg_catalog.pg_class ic ON ic.oid = i.indexrelid
JOIN pg_catalog.pg_am am ON am.oid = ic.relam
WHERE i.indrelid = ANY($1::oid[])
ORDER BY i.indrelid, ic.relname`;

const groupByTable = <TRow extends { table_oid: Oid }>(rows: TRow[]): Map<string, TRow[]> => {
  const grouped = new Map<string, TRow[]>();
  for (const row of rows) {
    const key = String(row.table_oid);
    const list = grouped.get(key) ?? [];
    list.push(row);
    grouped.set(key, list);
  }
  return grouped;
};

const skipHandler = (options: ListTablesOptions) =>
  options.onSchemaSkipped ??
  ((error: PermissionError) => {
    debug.db(`Skipping schema ${error.context.schema ?? '?'}: ${error.message}`);
  });

/**
 * Report a permission failure on `schema` through `skip`; anything else is
 * rethrown.
 */
function skipOrRethrow(error: unknown, schema: string, skip: (error: PermissionError) => void): void {
  const permission = error instanceof ExplorerError ? toPermissionError(error, { schema }) : null;
  if (!permission) {
    throw error;
  }
  skip(permission);
}

/**
 * Read-only introspection of `pg_catalog`.
 *
 * Tables are paged per schema by name, and column, constraint and index facts
 * are fetched for one page at a time, so memory stays bounded by the batch
 * size no matter how many tables a database holds.
 */
export class CatalogReader {
  private readonly runner: QueryRunner;
  readonly batchSize: number;
  readonly timeoutMs: number;

  constructor(runner: QueryRunner, options: CatalogReaderOptions) {
    this.runner = runner;
    this.batchSize = options.batchSize;
    this.timeoutMs = options.timeoutMs;
  }

  async listSchemas(signal?: AbortSignal): Promise<string[]> {
    const result = await this.runner.run<{ name: string }>(
      { sql: LIST_SCHEMAS_SQL, params: [] },
      { signal, timeoutMs: this.timeoutMs }
    );
    return result.rows.map(row => row.name);
  }

  /**
   * Introspect every ordinary and partitioned table in the given schemas. A
   * schema denied part-way through contributes no tables at all.
   *
   * @returns Tables sorted by schema, then name
   */
  async listTables(schemaFilter: readonly string[], options: ListTablesOptions = {}): Promise<RawTable[]> {
    const skip = skipHandler(options);
    const tables: RawTable[] = [];

    for (const schema of [...new Set(schemaFilter)].sort()) {
      const schemaTables: RawTable[] = [];
      try {
        for await (const batch of this.readSchema(schema, options.signal)) {
          schemaTables.push(...batch);
        }
      } catch (error) {
        skipOrRethrow(error, schema, skip);
        continue;
      }
      tables.push(...schemaTables);
    }
    return tables.sort(compareTables);
  }

  /**
   * Stream tables one page at a time. Pages already yielded for a schema that
   * is denied later are not retracted; the skip is still reported.
   */
  async *readBatches(
    schemaFilter: readonly string[],
    options: ListTablesOptions = {}
  ): AsyncGenerator<RawTable[], void, undefined> {
    const skip = skipHandler(options);
    const schemas = [...new Set(schemaFilter)].sort();

    for (const schema of schemas) {
      try {
        yield* this.readSchema(schema, options.signal);
      } catch (error) {
        skipOrRethrow(error, schema, skip);
      }
    }
  }

  private async *readSchema(schema: string, signal?: AbortSignal): AsyncGenerator<RawTable[], void, undefined> {
    const namespace = await this.runner.run<NamespaceRow>(
      { sql: SCHEMA_SQL, params: [schema] },
      { signal, timeoutMs: this.timeoutMs, context: { schema } }
    );
    const row = namespace.rows[0];
    if (!row) {
      debug.db(`Schema ${schema} does not exist; nothing to introspect`);
      return;
    }
    if (!row.usable) {
      throw new PermissionError(`No USAGE privilege on schema ${schema}`, { schema });
    }

    let after = '';
    for (;;) {
      const page = await this.runner.run<ClassRow>(
        { sql: TABLE_PAGE_SQL, params: [row.oid, after, this.batchSize] },
        { signal, timeoutMs: this.timeoutMs, context: { schema } }
      );
      if (page.rows.length === 0) {
        return;
      }

      yield await this.describeBatch(schema, page.rows, signal);

      const last = page.rows[page.rows.length - 1];
      if (!last || page.rows.length < this.batchSize) {
        return;
      }
      after = last.name;
    }
  }

  private async describeBatch(schema: string, classes: ClassRow[], signal?: AbortSignal): Promise<RawTable[]> {
    const oids = classes.map(row => String(row.oid));
    const runOptions = { signal, timeoutMs: this.timeoutMs, context: { schema } };

    const [columns, constraints, indexes] = await Promise.all([
      this.runner.run<ColumnRow>({ sql: COLUMNS_SQL, params: [oids] }, runOptions),
      this.runner.run<ConstraintRow>({ sql: CONSTRAINTS_SQL, params: [oids] }, runOptions),
      this.runner.run<IndexRow>({ sql: INDEXES_SQL, params: [oids] }, runOptions),
    ]);

    const columnsByTable = groupByTable(columns.rows);
    const constraintsByTable = groupByTable(constraints.rows);
    const indexesByTable = groupByTable(indexes.rows);

    debug.db(`Introspected ${classes.length} tables in schema ${schema}`);

    return classes.map(table => {
      const key = String(table.oid);
      const tableConstraints = constraintsByTable.get(key) ?? [];

      const rawColumns: RawColumn[] = (columnsByTable.get(key) ?? [])
        .map(column => ({
          name: column.name,
          dataType: column.data_type,
          nullable: !column.not_null,
          defaultValue: column.default_value,
          ordinal: Number(column.ordinal),
        }))
        .sort((a, b) => a.ordinal - b.ordinal);

      const primaryKey = tableConstraints.find(constraint => constraint.type === 'p')?.columns ?? [];

      const foreignKeys: RawForeignKey[] = tableConstraints
        .filter(constraint => constraint.type === 'f' && constraint.referenced_table !== null)
        .map(constraint => ({
          name: constraint.name,
          columns: constraint.columns,
          referencedSchema: constraint.referenced_schema ?? schema,
          referencedTable: constraint.referenced_table ?? '',
          referencedColumns: constraint.referenced_columns,
        }));

      const rawIndexes: RawIndex[] = (indexesByTable.get(key) ?? []).map(index => ({
        name: index.name,
        columns: index.columns,
        unique: index.unique,
        primary: index.primary,
        method: index.method,
      }));

      return Object.freeze({
        schema,
        name: table.name,
        columns: rawColumns,
        primaryKey,
        foreignKeys,
        indexes: rawIndexes,
        readable: table.readable,
        comment: table.comment,
      });
    });
  }
}

export default CatalogReader;
