import type { ErrorContext } from './errors.js';
import { displayLabel } from './display-label.js';
import { ExecutionError } from './errors.js';
import { localeChain } from './locale.js';
import type { DistinctPlan, LabelLookup, PlannedPage, QueryPlan } from './query-planner.js';
import { labelLookupStatement, VALUE_ALIAS } from './query-planner.js';
import type { QueryRunner } from './query-runner.js';
import { debug } from './runtime.js';
import type { ColumnBackedField, LogicalModel, ScalarType } from './schema-types.js';
import type { Statement } from './sql.js';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type RecordId = number | string;

/**
 * many2one value: the target's identity plus a display label. The related
 * record itself is only loaded through `fetchRelated`.
 */
export interface RelationValue {
  readonly kind: 'relation';
  readonly model: string;
  readonly id: RecordId;
  readonly label: string;
  readonly resolved: boolean;
}

/**
 * Placeholder for a one2many or many2many field.
 */
export interface LazyRelation {
  readonly kind: 'lazy';
  readonly model: string;
  readonly field: string;
  readonly resolved: boolean;
}

export type FieldValue = JsonValue | Date | Buffer | RelationValue | LazyRelation;

export interface ResultRecord {
  readonly model: string;
  readonly id: RecordId | null;
  readonly values: Readonly<Record<string, FieldValue>>;
}

export interface ResultSet {
  readonly model: string;
  readonly records: readonly ResultRecord[];
  /** Row count for the whole filter, or null when no estimate exists. */
  readonly total: number | null;
  readonly totalIsEstimate: boolean;
  readonly truncated: boolean;
  readonly page: PlannedPage;
  readonly locale: string;
  /** Non-fatal problems, such as labels that could not be read. */
  readonly warnings: readonly string[];
}

export interface DistinctValues {
  readonly model: string;
  readonly path: string;
  /** Distinct values in ascending order, nulls last. */
  readonly values: readonly FieldValue[];
  /** `COUNT(DISTINCT ...)` over the filtered rows, when requested. */
  readonly distinctCount: number | null;
  readonly truncated: boolean;
  readonly limit: number;
  readonly locale: string;
  readonly warnings: readonly string[];
}

export interface ExecuteOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
  /** Default locale, used for label fallbacks. */
  defaultLocale?: string;
}

type Row = Record<string, unknown>;

type Labels = Map<string, Map<string, string>>;

const labelGroup = (model: string, key: string): string => `${model}|${key}`;

const isRecordId = (value: unknown): value is RecordId =>
  typeof value === 'number' || (typeof value === 'string' && value.length > 0);

/**
 * Canonical form of a decimal string, for checking that a JS number holds it
 * exactly: `"+012.500"` → `"12.5"`.
 */
const canonicalDecimal = (value: string): string => {
  let text = value.trim().replace(/^\+/, '');
  const negative = text.startsWith('-');
  if (negative) text = text.slice(1);
  text = text.replace(/^0+(?=\d)/, '');
  if (text.includes('.')) {
    text = text.replace(/0+$/, '').replace(/\.$/, '');
  }
  if (text === '' || text === '0') return '0';
  return negative ? `-${text}` : text;
};

/**
 * Numbers when JS can hold them exactly, the driver's string otherwise.
 */
const toExactNumber = (value: unknown): number | string | null => {
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') {
    const asNumber = Number(value);
    return Number.isSafeInteger(asNumber) ? asNumber : value.toString();
  }
  if (typeof value !== 'string') return null;
  const asNumber = Number(value);
  if (!Number.isFinite(asNumber)) return value;
  if (Number.isInteger(asNumber) && !Number.isSafeInteger(asNumber)) return value;
  return String(asNumber) === canonicalDecimal(value) ? asNumber : value;
};

export const toJsonValue = (value: unknown): JsonValue => {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map(toJsonValue);
  if (typeof value === 'object') {
    const result: { [key: string]: JsonValue } = {};
    for (const [key, nested] of Object.entries(value)) {
      result[key] = toJsonValue(nested);
    }
    return result;
  }
  return String(value);
};

/**
 * Convert a driver value to the type records carry for a scalar field.
 */
export function convertScalar(value: unknown, valueType: ScalarType): FieldValue {
  if (value === null || value === undefined) {
    return null;
  }

  switch (valueType) {
    case 'integer':
    case 'float':
      return typeof value === 'number' ? value : toExactNumber(value);
    case 'bigint':
    case 'numeric':
      return toExactNumber(value);
    case 'boolean':
      return typeof value === 'boolean' ? value : value === 't' || value === 'true';
    case 'date':
    case 'datetime':
      if (value instanceof Date) return value;
      return typeof value === 'string' ? new Date(value) : toJsonValue(value);
    case 'binary':
      return Buffer.isBuffer(value) ? value : toJsonValue(value);
    case 'text':
      return typeof value === 'string' ? value : String(value);
    case 'json':
    case 'other':
      return value instanceof Date ? value : toJsonValue(value);
  }
}

/**
 * Executes planned statements and maps rows back through the planning model.
 */
export class ResultProjector {
  private readonly runner: QueryRunner;

  constructor(runner: QueryRunner) {
    this.runner = runner;
  }

  /**
   * Run a plan and project its rows.
   *
   * @param plan - Output of the query planner
   * @param model - The model the plan was built from
   * @throws ExecutionError when a statement fails, with table/column when known
   */
  async execute(plan: QueryPlan, model: LogicalModel, options: ExecuteOptions = {}): Promise<ResultSet> {
    if (plan.model !== model.name) {
      throw new TypeError(`Plan for ${plan.model} cannot be projected through model ${model.name}`);
    }

    const context: ErrorContext = { model: model.name };
    const [rows, count] = await Promise.all([
      this.run(plan.rows, context, options),
      this.run(plan.count, context, options),
    ]);

    const locales = localeChain(plan.locale, options.defaultLocale ?? plan.locale);
    const warnings: string[] = [];
    const lookups = plan.labelLookups.map(lookup => ({ lookup, ids: this.collectIds(plan, rows, lookup) }));
    const labels = await this.readLabels(lookups, locales, options, warnings);

    const records = rows.map(row => this.projectRow(plan, row, labels, locales));
    const total = this.readTotal(count[0]);

    debug.db(`Projected ${records.length} ${model.name} records (total ${total ?? 'unknown'})`);

    return Object.freeze({
      model: model.name,
      records,
      total,
      totalIsEstimate: plan.countIsEstimate,
      truncated: plan.truncated,
      page: plan.page,
      locale: plan.locale,
      warnings,
    });
  }

  /**
   * Run a distinct-values plan: the value page, the optional distinct count
   * and, for many2one paths, the labels of the listed ids.
   */
  async executeDistinct(plan: DistinctPlan, options: ExecuteOptions = {}): Promise<DistinctValues> {
    const context: ErrorContext = { model: plan.model, column: plan.path };
    const [rows, count] = await Promise.all([
      this.run(plan.values, context, options),
      plan.count ? this.run(plan.count, context, options) : Promise.resolve(null),
    ]);

    const locales = localeChain(plan.locale, options.defaultLocale ?? plan.locale);
    const warnings: string[] = [];
    const ids = new Map<string, RecordId>();
    for (const row of rows) {
      const value = row[VALUE_ALIAS];
      if (isRecordId(value)) ids.set(String(value), value);
    }
    const labels = plan.labelLookup
      ? await this.readLabels([{ lookup: plan.labelLookup, ids: [...ids.values()] }], locales, options, warnings)
      : new Map<string, Map<string, string>>();

    const values = rows.map(row => projectValue(plan.field, row[VALUE_ALIAS], labels, locales));
    const distinctCount = count ? this.readTotal(count[0]) : null;

    debug.db(`Listed ${values.length} distinct values of ${plan.model}.${plan.path}`);

    return Object.freeze({
      model: plan.model,
      path: plan.path,
      values,
      distinctCount,
      truncated: plan.truncated,
      limit: plan.limit,
      locale: plan.locale,
      warnings,
    });
  }

  private async run(statement: Statement, context: ErrorContext, options: ExecuteOptions): Promise<Row[]> {
    try {
      const result = await this.runner.run(statement, {
        signal: options.signal,
        timeoutMs: options.timeoutMs,
        context,
      });
      return result.rows;
    } catch (error) {
      throw this.withTableContext(error, statement);
    }
  }

  /**
   * Name the table when the driver did not and the statement only reads one.
   */
  private withTableContext(error: unknown, statement: Statement): unknown {
    if (!(error instanceof ExecutionError) || error.context.table || statement.tables.length !== 1) {
      return error;
    }
    const [table] = statement.tables;
    if (!table) {
      return error;
    }
    return new ExecutionError(
      error.message,
      error.reason,
      { ...error.context, schema: table.schema, table: table.name },
      error.originalError,
      error.sqlState
    );
  }

  private readTotal(row: Row | undefined): number | null {
    const value = toExactNumber(row?.total);
    if (typeof value !== 'number') {
      return typeof value === 'string' ? Number(value) : null;
    }
    return value < 0 ? null : value;
  }

  /**
   * One query per target model and key column for every id on the page. A
   * target the session may not read degrades to raw ids.
   */
  private async readLabels(
    requested: readonly { lookup: LabelLookup; ids: RecordId[] }[],
    locales: readonly string[],
    options: ExecuteOptions,
    warnings: string[]
  ): Promise<Labels> {
    const labels: Labels = new Map();
    const lookups = requested.filter(({ ids }) => ids.length > 0);

    const results = await Promise.all(
      lookups.map(async ({ lookup, ids }) => {
        try {
          return { lookup, rows: await this.run(labelLookupStatement(lookup, ids), { model: lookup.model }, options) };
        } catch (error) {
          if (error instanceof ExecutionError && error.reason === 'permission') {
            const message = `Labels for ${lookup.model} unavailable: ${error.message}`;
            debug.error(message);
            warnings.push(message);
            return { lookup, rows: [] };
          }
          throw error;
        }
      })
    );

    for (const { lookup, rows: labelRows } of results) {
      const byId = new Map<string, string>();
      for (const row of labelRows) {
        if (isRecordId(row.key)) {
          byId.set(String(row.key), displayLabel(row.label, row.key, locales));
        }
      }
      labels.set(labelGroup(lookup.model, lookup.key), byId);
    }
    return labels;
  }

  private collectIds(plan: QueryPlan, rows: Row[], lookup: LabelLookup): RecordId[] {
    const aliases = plan.columns
      .filter(column => column.field.kind === 'many2one' && lookup.fields.includes(column.field.name))
      .map(column => column.alias);
    const ids = new Map<string, RecordId>();
    for (const row of rows) {
      for (const alias of aliases) {
        const value = row[alias];
        if (isRecordId(value)) ids.set(String(value), value);
      }
    }
    return [...ids.values()];
  }

  private projectRow(
    plan: QueryPlan,
    row: Row,
    labels: Labels,
    locales: readonly string[]
  ): ResultRecord {
    const values: Record<string, FieldValue> = {};

    for (const { alias, field } of plan.columns) {
      values[field.name] = projectValue(field, row[alias], labels, locales);
    }

    for (const field of plan.lazyFields) {
      values[field.name] = Object.freeze({
        kind: 'lazy',
        model: field.target.model,
        field: field.name,
        resolved: field.target.status === 'resolved',
      });
    }

    const rawId = plan.keyAlias ? row[plan.keyAlias] : null;
    const id = isRecordId(rawId) ? (typeof rawId === 'string' ? (toExactNumber(rawId) ?? rawId) : rawId) : null;

    return Object.freeze({ model: plan.model, id, values: Object.freeze(values) });
  }
}

const displayText = (raw: unknown, locales: readonly string[]): string =>
  typeof raw === 'string' ? raw : displayLabel(raw, '', locales);

function projectValue(field: ColumnBackedField, raw: unknown, labels: Labels, locales: readonly string[]): FieldValue {
  switch (field.kind) {
    case 'scalar':
      return convertScalar(raw, field.valueType);
    case 'translated-scalar':
      return raw === null || raw === undefined ? null : displayText(raw, locales);
    case 'many2one': {
      if (!isRecordId(raw)) {
        return null;
      }
      const id = typeof raw === 'string' ? (toExactNumber(raw) ?? raw) : raw;
      const label = labels.get(labelGroup(field.target.model, field.target.key))?.get(String(raw));
      return Object.freeze({
        kind: 'relation',
        model: field.target.model,
        id,
        label: label ?? String(raw),
        resolved: field.target.status === 'resolved',
      });
    }
  }
}

export default ResultProjector;
