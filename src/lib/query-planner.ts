import type { TableRef } from './catalog-types.js';
import { tableKey } from './catalog-types.js';
import { InvalidFilterError, UnsupportedTraversalError } from './errors.js';
import type { FilterSpec, PageSpec, SortSpec } from './filter-spec.js';
import { localeChain, SOURCE_LOCALE } from './locale.js';
import type { SchemaGraph } from './schema-graph.js';
import { findField } from './schema-graph.js';
import type {
  ColumnBackedField,
  LogicalField,
  LogicalModel,
  Many2ManyField,
  Many2OneField,
  One2ManyField,
  TranslatedScalarField,
} from './schema-types.js';
import { isColumnBacked } from './schema-types.js';
import type { Predicate, Statement } from './sql.js';
import { columnRef, ParameterList, qualifyTable, quoteIdent, renderPredicate, renderWhere } from './sql.js';

export type CountMode = 'exact' | 'estimate';

export interface PlannerSettings {
  defaultLocale: string;
  rowCeiling: number;
  defaultPageSize: number;
  countMode: CountMode;
}

export interface PlanOptions {
  locale?: string;
  countMode?: CountMode;
}

export interface PlannedColumn {
  readonly alias: string;
  readonly field: ColumnBackedField;
}

/**
 * Batched display-label query for one target model and the column the
 * referencing foreign keys point at. `$1` is reserved for the array of ids;
 * see {@link labelLookupStatement}.
 */
export interface LabelLookup {
  readonly model: string;
  /** Target column holding the values stored in the many2one columns. */
  readonly key: string;
  readonly fields: readonly string[];
  readonly sql: string;
  readonly params: readonly unknown[];
  readonly tables: readonly TableRef[];
}

export interface PlannedPage {
  readonly offset: number;
  readonly limit: number;
  readonly requestedLimit: number;
}

export interface QueryPlan {
  readonly model: string;
  readonly rows: Statement;
  readonly count: Statement;
  readonly countIsEstimate: boolean;
  /** Result column holding the record id, when the model has a key. */
  readonly keyAlias: string | null;
  readonly columns: readonly PlannedColumn[];
  readonly lazyFields: readonly (One2ManyField | Many2ManyField)[];
  readonly labelLookups: readonly LabelLookup[];
  readonly page: PlannedPage;
  readonly truncated: boolean;
  readonly locale: string;
  readonly fingerprint: string;
}

export interface DistinctOptions {
  locale?: string;
  limit?: number;
  /** Also plan `COUNT(DISTINCT ...)` over the filtered rows. */
  count?: boolean;
}

/**
 * Distinct values of one field path, for filter pickers and categorical
 * charts.
 */
export interface DistinctPlan {
  readonly model: string;
  readonly path: string;
  readonly field: ColumnBackedField;
  readonly values: Statement;
  readonly count: Statement | null;
  /** Labels for the ids when the path ends on a many2one. */
  readonly labelLookup: LabelLookup | null;
  readonly limit: number;
  readonly requestedLimit: number;
  readonly truncated: boolean;
  readonly locale: string;
}

export const KEY_ALIAS = '__id';

export const VALUE_ALIAS = 'value';

export const DEFAULT_DISTINCT_LIMIT = 100;

const MAX_HOPS = 1;

type X2ManyField = One2ManyField | Many2ManyField;

interface PlanContext {
  readonly graph: SchemaGraph;
  readonly params: ParameterList;
  readonly locales: readonly string[];
  readonly tables: Map<string, TableRef>;
  aliasCount: number;
}

/**
 * Table aliases for one model inside a statement: its base table plus the
 * delegated ancestor tables, joined only when a field needs them.
 */
interface Scope {
  readonly model: LogicalModel;
  readonly rootAlias: string;
  readonly joinKind: 'JOIN' | 'LEFT JOIN';
  readonly joins: string[];
  readonly aliases: Map<string, string>;
  readonly laterals: Map<string, string>;
  readonly hops: Map<string, Scope>;
}

interface ResolvedPath {
  readonly scope: Scope;
  readonly field: LogicalField;
  /** The x2many field crossed on the way, which forces an EXISTS subquery. */
  readonly via: X2ManyField | null;
  readonly path: string;
}

const isPlainOperand = (value: unknown): boolean =>
  typeof value === 'string' ||
  typeof value === 'number' ||
  typeof value === 'boolean' ||
  typeof value === 'bigint' ||
  value instanceof Date;

const nextAlias = (context: PlanContext, prefix: string): string => {
  context.aliasCount += 1;
  return `${prefix}${context.aliasCount}`;
};

const touch = (context: PlanContext, ref: TableRef): void => {
  context.tables.set(tableKey(ref), ref);
};

const createScope = (
  context: PlanContext,
  model: LogicalModel,
  rootAlias: string,
  joinKind: Scope['joinKind'],
  joins: string[]
): Scope => {
  touch(context, model.table);
  return {
    model,
    rootAlias,
    joinKind,
    joins,
    aliases: new Map([[tableKey(model.table), rootAlias]]),
    laterals: new Map(),
    hops: new Map(),
  };
};

/**
 * Alias for a physical table of the scope's model, joining the delegation
 * chain up to it on first use.
 */
function aliasFor(context: PlanContext, scope: Scope, table: TableRef): string {
  const key = tableKey(table);
  const existing = scope.aliases.get(key);
  if (existing) {
    return existing;
  }

  const link = scope.model.delegation.find(candidate => tableKey(candidate.table) === key);
  if (!link) {
    throw new InvalidFilterError(`Table ${key} is not part of model ${scope.model.name}`, {
      model: scope.model.name,
      table: table.name,
    });
  }

  const viaAlias = aliasFor(context, scope, link.via);
  const alias = nextAlias(context, 'd');
  scope.joins.push(
    `${scope.joinKind} ${qualifyTable(link.table)} AS ${alias} ON ${columnRef(alias, link.key)} = ${columnRef(viaAlias, link.viaColumn)}`
  );
  scope.aliases.set(key, alias);
  touch(context, link.table);
  return alias;
}

/**
 * Key column of one of the scope's physical tables: the model key for the
 * base table, the delegation key for ancestors.
 */
function keyOf(scope: Scope, table: TableRef): string | null {
  const key = tableKey(table);
  if (key === tableKey(scope.model.table)) {
    return scope.model.key;
  }
  return scope.model.delegation.find(link => tableKey(link.table) === key)?.key ?? null;
}

function translatedExpression(context: PlanContext, scope: Scope, field: TranslatedScalarField): string {
  const ownerAlias = aliasFor(context, scope, field.table);
  const base = columnRef(ownerAlias, field.column);
  const { translation } = field;

  if (translation.storage === 'jsonb') {
    const locales = [...new Set([...context.locales, SOURCE_LOCALE])];
    const reads = locales.map(locale => `${base} ->> ${context.params.add(locale)}`);
    return `COALESCE(${reads.join(', ')})`;
  }

  const ownerKey = keyOf(scope, field.table);
  if (!ownerKey) {
    return base;
  }

  const reads = context.locales.map(locale => {
    const lateralKey = [tableKey(translation.table), locale, translation.fieldKey ?? '', ownerAlias].join('|');
    let alias = scope.laterals.get(lateralKey);
    if (!alias) {
      alias = nextAlias(context, 'tr');
      const conditions = [
        `x.${quoteIdent(translation.recordColumn)} = ${columnRef(ownerAlias, ownerKey)}`,
        `x.${quoteIdent(translation.langColumn)} = ${context.params.add(locale)}`,
      ];
      if (translation.fieldKey !== null) {
        conditions.push(`x."name" = ${context.params.add(translation.fieldKey)}`);
      }
      scope.joins.push(
        `LEFT JOIN LATERAL (SELECT x.* FROM ${qualifyTable(translation.table)} AS x WHERE ${conditions.join(' AND ')} LIMIT 1) AS ${alias} ON TRUE`
      );
      scope.laterals.set(lateralKey, alias);
      touch(context, translation.table);
    }
    return `NULLIF(${columnRef(alias, translation.valueColumn)}, '')`;
  });

  return `COALESCE(${reads.join(', ')}, ${base})`;
}

/**
 * SQL expression reading a column-backed field inside a scope.
 */
function fieldExpression(context: PlanContext, scope: Scope, field: ColumnBackedField): string {
  if (field.kind === 'translated-scalar') {
    return translatedExpression(context, scope, field);
  }
  return columnRef(aliasFor(context, scope, field.table), field.column);
}

/**
 * Scope for the target of a many2one hop, LEFT JOINed once per field.
 */
function hopScope(context: PlanContext, scope: Scope, field: Many2OneField, target: LogicalModel): Scope {
  const existing = scope.hops.get(field.name);
  if (existing) {
    return existing;
  }
  const ownerAlias = aliasFor(context, scope, field.table);
  const alias = nextAlias(context, 'h');
  scope.joins.push(
    `LEFT JOIN ${qualifyTable(target.table)} AS ${alias} ON ${columnRef(alias, field.target.key)} = ${columnRef(ownerAlias, field.column)}`
  );
  const hop = createScope(context, target, alias, 'LEFT JOIN', scope.joins);
  scope.hops.set(field.name, hop);
  return hop;
}

function requireField(model: LogicalModel, name: string, path: string): LogicalField {
  const field = findField(model, name);
  if (!field) {
    throw new InvalidFilterError(`Field '${name}' does not exist on model ${model.name}`, {
      model: model.name,
      path,
    });
  }
  if (field.kind === 'computed-unknown') {
    throw new InvalidFilterError(`Field '${name}' on model ${model.name} is computed and not stored`, {
      model: model.name,
      path,
    });
  }
  return field;
}

function requireTarget(context: PlanContext, model: LogicalModel, field: LogicalField, path: string): LogicalModel {
  const target = 'target' in field ? context.graph.resolve(field.target) : null;
  if (!target) {
    throw new InvalidFilterError(`Relation '${field.name}' on model ${model.name} has no loaded target`, {
      model: model.name,
      path,
    });
  }
  return target;
}

/**
 * Split a path and check its depth before anything else.
 */
function splitPath(model: LogicalModel, path: string): string[] {
  const segments = path.split('.');
  if (segments.some(segment => segment.length === 0)) {
    throw new InvalidFilterError(`Malformed field path '${path}'`, { model: model.name, path });
  }
  if (segments.length - 1 > MAX_HOPS) {
    throw new UnsupportedTraversalError(
      `Path '${path}' crosses ${segments.length - 1} relations; at most ${MAX_HOPS} is supported`,
      { model: model.name, path },
      MAX_HOPS
    );
  }
  return segments;
}

/**
 * Resolve `field` or `relation.field`. many2one hops join in place; x2many
 * hops return a fresh scope to be wrapped in EXISTS by the caller.
 */
function resolvePath(context: PlanContext, scope: Scope, path: string): ResolvedPath {
  const { model } = scope;
  const [first, second] = splitPath(model, path);
  const head = requireField(model, first ?? '', path);

  if (second === undefined) {
    return { scope, field: head, via: null, path };
  }

  if (head.kind !== 'many2one' && head.kind !== 'one2many' && head.kind !== 'many2many') {
    throw new InvalidFilterError(`Field '${head.name}' on model ${model.name} is not a relation`, {
      model: model.name,
      path,
    });
  }

  const target = requireTarget(context, model, head, path);
  const field = requireField(target, second, path);
  if (!isColumnBacked(field)) {
    throw new UnsupportedTraversalError(
      `Path '${path}' ends on relation '${second}', which would be a second hop`,
      { model: model.name, path },
      MAX_HOPS
    );
  }

  if (head.kind === 'many2one') {
    return { scope: hopScope(context, scope, head, target), field, via: null, path };
  }

  const subAlias = nextAlias(context, 's');
  return { scope: createScope(context, target, subAlias, 'JOIN', []), field, via: head, path };
}

function invalidOperand(
  model: LogicalModel,
  filter: FilterSpec,
  expected: string
): InvalidFilterError {
  const shown =
    filter.value === undefined ? 'nothing' : (JSON.stringify(filter.value, fingerprintReplacer) ?? String(filter.value));
  return new InvalidFilterError(`Operator '${filter.operator}' on '${filter.path}' expects ${expected}, got ${shown}`, {
    model: model.name,
    path: filter.path,
  });
}

const isOperandArray = (value: unknown): value is unknown[] =>
  Array.isArray(value) && value.every(isPlainOperand);

const isAbsent = (value: unknown): boolean => value === undefined || value === null;

const likePattern = (value: string): string => `%${value}%`;

/**
 * Predicate for a scalar expression. like-style operators match substrings,
 * as Odoo domains do.
 */
function comparisonPredicate(
  model: LogicalModel,
  expression: string,
  filter: FilterSpec,
  textual: boolean
): Predicate {
  const { operator, value } = filter;

  switch (operator) {
    case '=':
      if (value === null) return { type: 'basic', expression, operator: 'IS NULL' };
      if (!isPlainOperand(value)) throw invalidOperand(model, filter, 'a value');
      return { type: 'basic', expression, operator: '=', value };
    case '!=':
      if (value === null) return { type: 'basic', expression, operator: 'IS NOT NULL' };
      if (!isPlainOperand(value)) throw invalidOperand(model, filter, 'a value');
      return { type: 'basic', expression, operator: 'IS DISTINCT FROM', value };
    case '<':
    case '<=':
    case '>':
    case '>=':
      if (!isPlainOperand(value)) throw invalidOperand(model, filter, 'a value');
      return { type: 'basic', expression, operator, value };
    case 'in':
      if (!isOperandArray(value)) throw invalidOperand(model, filter, 'an array of values');
      return {
        type: 'basic',
        expression,
        operator: '=',
        value,
        valueTransform: placeholder => `ANY(${placeholder})`,
      };
    case 'not in':
      if (!isOperandArray(value)) throw invalidOperand(model, filter, 'an array of values');
      return {
        type: 'template',
        render: bind => `(${expression} IS NULL OR ${expression} <> ALL(${bind(value)}))`,
      };
    case 'like':
    case 'ilike':
    case 'not ilike': {
      if (typeof value !== 'string') throw invalidOperand(model, filter, 'a string');
      const sqlOperator = operator === 'like' ? 'LIKE' : operator === 'ilike' ? 'ILIKE' : 'NOT ILIKE';
      return {
        type: 'basic',
        expression: textual ? expression : `${expression}::text`,
        operator: sqlOperator,
        value: likePattern(value),
      };
    }
    case 'is null':
      if (!isAbsent(value)) throw invalidOperand(model, filter, 'no value');
      return { type: 'basic', expression, operator: 'IS NULL' };
    case 'is not null':
      if (!isAbsent(value)) throw invalidOperand(model, filter, 'no value');
      return { type: 'basic', expression, operator: 'IS NOT NULL' };
    case 'between': {
      if (!isOperandArray(value) || value.length !== 2) {
        throw invalidOperand(model, filter, 'a [low, high] pair');
      }
      const [low, high] = value;
      return {
        type: 'template',
        render: bind => `${expression} BETWEEN ${bind(low)} AND ${bind(high)}`,
      };
    }
  }
}

const isTextual = (field: ColumnBackedField): boolean =>
  field.kind === 'translated-scalar' || (field.kind === 'scalar' && field.valueType === 'text');

/**
 * `EXISTS (...)` correlating an x2many field with the owning record. The
 * related model is only joined when `related` is given; id filters on a
 * many2many read the junction alone.
 */
function existsPredicate(
  context: PlanContext,
  scope: Scope,
  field: X2ManyField,
  negate: boolean,
  related: Scope | null,
  conditions: (junctionAlias: string | null) => Predicate[]
): Predicate {
  const ownerKey = columnRef(aliasFor(context, scope, field.table), field.key);

  const from: string[] = [];
  const correlation: string[] = [];
  let junctionAlias: string | null = null;

  if (field.kind === 'one2many') {
    if (!related) {
      throw new InvalidFilterError(`Relation '${field.name}' has no loaded target`, {
        model: scope.model.name,
        path: field.name,
      });
    }
    from.push(`${qualifyTable(related.model.table)} AS ${related.rootAlias}`);
    correlation.push(`${columnRef(related.rootAlias, field.inverseColumn)} = ${ownerKey}`);
  } else {
    junctionAlias = nextAlias(context, 'j');
    touch(context, field.junction.table);
    from.push(`${qualifyTable(field.junction.table)} AS ${junctionAlias}`);
    if (related) {
      from.push(
        `JOIN ${qualifyTable(related.model.table)} AS ${related.rootAlias} ON ${columnRef(related.rootAlias, field.target.key)} = ${columnRef(junctionAlias, field.junction.targetColumn)}`
      );
    }
    correlation.push(`${columnRef(junctionAlias, field.junction.sourceColumn)} = ${ownerKey}`);
  }

  const extra = conditions(junctionAlias);

  return {
    type: 'template',
    render: bind => {
      const rendered = extra.map(predicate => renderPredicate(predicate, bind));
      const body = [...from, ...(related ? related.joins : [])].join(' ');
      const sql = `EXISTS (SELECT 1 FROM ${body} WHERE ${[...correlation, ...rendered].join(' AND ')})`;
      return negate ? `NOT ${sql}` : sql;
    },
  };
}

/**
 * Filters directly on an x2many field compare related ids.
 */
function x2manyPredicate(context: PlanContext, scope: Scope, field: X2ManyField, filter: FilterSpec): Predicate {
  const { model } = scope;
  const { operator, value } = filter;

  if (operator === 'is null' || operator === 'is not null') {
    if (!isAbsent(value)) throw invalidOperand(model, filter, 'no value');
    const related = field.kind === 'one2many' ? relatedScope(context, scope, field, filter.path) : null;
    return existsPredicate(context, scope, field, operator === 'is null', related, () => []);
  }

  let ids: unknown[];
  if (operator === '=') {
    if (!isPlainOperand(value)) throw invalidOperand(model, filter, 'a record id');
    ids = [value];
  } else if (operator === 'in' || operator === 'not in') {
    if (!isOperandArray(value)) throw invalidOperand(model, filter, 'an array of record ids');
    ids = value;
  } else {
    throw new InvalidFilterError(`Operator '${operator}' is not supported on to-many field '${field.name}'`, {
      model: model.name,
      path: filter.path,
    });
  }

  const related = field.kind === 'one2many' ? relatedScope(context, scope, field, filter.path) : null;
  return existsPredicate(context, scope, field, operator === 'not in', related, junctionAlias => {
    let expression: string;
    if (field.kind === 'many2many' && junctionAlias) {
      expression = columnRef(junctionAlias, field.junction.targetColumn);
    } else if (related) {
      expression = columnRef(related.rootAlias, field.target.key);
    } else {
      return [];
    }
    return [{ type: 'basic', expression, operator: '=', value: ids, valueTransform: p => `ANY(${p})` }];
  });
}

/**
 * Fresh scope on the target of an x2many field, for use inside EXISTS.
 */
function relatedScope(context: PlanContext, scope: Scope, field: X2ManyField, path: string): Scope {
  const target = requireTarget(context, scope.model, field, path);
  return createScope(context, target, nextAlias(context, 's'), 'JOIN', []);
}

function filterPredicate(context: PlanContext, scope: Scope, filter: FilterSpec): Predicate {
  const resolved = resolvePath(context, scope, filter.path);
  const { field, via } = resolved;

  if (via === null && (field.kind === 'one2many' || field.kind === 'many2many')) {
    return x2manyPredicate(context, scope, field, filter);
  }

  // Text matching on a many2one searches the target's record name.
  if (
    field.kind === 'many2one' &&
    (filter.operator === 'like' || filter.operator === 'ilike' || filter.operator === 'not ilike') &&
    !filter.path.includes('.')
  ) {
    const target = requireTarget(context, scope.model, field, filter.path);
    if (!target.recName) {
      throw new InvalidFilterError(`Model ${target.name} has no record name to match '${filter.path}' against`, {
        model: scope.model.name,
        path: filter.path,
      });
    }
    return filterPredicate(context, scope, { ...filter, path: `${field.name}.${target.recName}` });
  }

  if (!isColumnBacked(field)) {
    throw new InvalidFilterError(`Field '${field.name}' cannot be filtered`, {
      model: scope.model.name,
      path: filter.path,
    });
  }

  const expression = fieldExpression(context, resolved.scope, field);
  const predicate = comparisonPredicate(scope.model, expression, filter, isTextual(field));
  if (via === null) {
    return predicate;
  }
  return existsPredicate(context, scope, via, false, resolved.scope, () => [predicate]);
}

function sortExpression(context: PlanContext, scope: Scope, sort: SortSpec): string {
  const resolved = resolvePath(context, scope, sort.path);
  if (resolved.via !== null || !isColumnBacked(resolved.field)) {
    throw new InvalidFilterError(`Cannot sort by to-many path '${sort.path}'`, {
      model: scope.model.name,
      path: sort.path,
    });
  }
  const direction = sort.direction === 'desc' ? 'DESC' : 'ASC';
  return `${fieldExpression(context, resolved.scope, resolved.field)} ${direction}`;
}

const labelGroupKey = (model: string, key: string): string => `${model}|${key}`;

const isX2Many = (field: LogicalField): field is X2ManyField =>
  field.kind === 'one2many' || field.kind === 'many2many';

/**
 * Build the `$1`-parameterized label lookup for one target model, matching
 * ids against `keyColumn`.
 */
function planLabelLookup(
  graph: SchemaGraph,
  target: LogicalModel,
  keyColumn: string,
  fields: string[],
  locales: readonly string[]
): LabelLookup | null {
  if (!target.recName) {
    return null;
  }
  const labelField = findField(target, target.recName);
  if (!labelField || !isColumnBacked(labelField)) {
    return null;
  }

  const context: PlanContext = {
    graph,
    params: new ParameterList(),
    locales,
    tables: new Map(),
    aliasCount: 0,
  };
  // Reserve $1 for the id array.
  context.params.add([]);
  const scope = createScope(context, target, 'l0', 'JOIN', []);
  const label = fieldExpression(context, scope, labelField);
  const key = columnRef('l0', keyColumn);

  const sql =
    `SELECT ${key} AS "key", ${label} AS "label" FROM ${qualifyTable(target.table)} AS l0` +
    (scope.joins.length > 0 ? ` ${scope.joins.join(' ')}` : '') +
    ` WHERE ${key} = ANY($1)`;

  return Object.freeze({
    model: target.name,
    key: keyColumn,
    fields,
    sql,
    params: context.params.values,
    tables: [...context.tables.values()],
  });
}

/**
 * The lookup statement for a concrete set of ids.
 */
export const labelLookupStatement = (lookup: LabelLookup, ids: readonly unknown[]): Statement => ({
  sql: lookup.sql,
  params: [[...ids], ...lookup.params.slice(1)],
  tables: lookup.tables,
});

const fingerprintReplacer = (_key: string, value: unknown): unknown =>
  typeof value === 'bigint' ? value.toString() : value;

const statementParts = (statement: Pick<Statement, 'sql' | 'params'>): unknown[] => [statement.sql, statement.params];

/**
 * Cache key covering everything a result depends on: every statement the plan
 * runs, the locale labels are rendered in and how the total is counted.
 */
const planFingerprint = (
  plan: Pick<QueryPlan, 'rows' | 'count' | 'countIsEstimate' | 'labelLookups' | 'locale'>
): string =>
  JSON.stringify(
    [
      plan.locale,
      plan.countIsEstimate,
      statementParts(plan.rows),
      statementParts(plan.count),
      plan.labelLookups.map(lookup => [lookup.model, lookup.key, ...statementParts(lookup)]),
    ],
    fingerprintReplacer
  );

const compareText = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Plans logical view requests as parameterized SQL against one schema graph.
 */
export class QueryPlanner {
  readonly graph: SchemaGraph;
  readonly settings: PlannerSettings;

  constructor(graph: SchemaGraph, settings: PlannerSettings) {
    this.graph = graph;
    this.settings = settings;
  }

  /**
   * Plan one page of a model's records.
   *
   * @throws InvalidFilterError for paths, operators or operands that do not fit the model
   * @throws UnsupportedTraversalError for paths crossing more than one relation
   */
  plan(
    model: LogicalModel,
    filters: readonly FilterSpec[] = [],
    sorts: readonly SortSpec[] = [],
    pageSpec: PageSpec = { offset: 0 },
    options: PlanOptions = {}
  ): QueryPlan {
    const locale = options.locale ?? this.settings.defaultLocale;
    const locales = localeChain(locale, this.settings.defaultLocale);
    const countMode = options.countMode ?? this.settings.countMode;

    const offset = pageSpec.offset;
    if (!Number.isInteger(offset) || offset < 0) {
      throw new InvalidFilterError(`Page offset must be a non-negative integer, got ${offset}`, {
        model: model.name,
      });
    }
    const requestedLimit = pageSpec.limit ?? this.settings.defaultPageSize;
    if (!Number.isInteger(requestedLimit) || requestedLimit <= 0) {
      throw new InvalidFilterError(`Page limit must be a positive integer, got ${requestedLimit}`, {
        model: model.name,
      });
    }
    const limit = Math.min(requestedLimit, this.settings.rowCeiling);
    const truncated = requestedLimit > this.settings.rowCeiling;

    const rows = this.planRows(model, filters, sorts, locales, offset, limit);
    const columns = rows.columns;

    const count =
      countMode === 'estimate' && filters.length === 0
        ? this.planEstimate(model)
        : this.planCount(model, filters, locales);

    // One lookup per (target model, referenced column).
    const labelTargets = new Map<string, { model: string; key: string; fields: string[] }>();
    for (const { field } of columns) {
      if (field.kind !== 'many2one') continue;
      const groupKey = labelGroupKey(field.target.model, field.target.key);
      const group = labelTargets.get(groupKey) ?? { model: field.target.model, key: field.target.key, fields: [] };
      group.fields.push(field.name);
      labelTargets.set(groupKey, group);
    }
    const labelLookups: LabelLookup[] = [];
    const groups = [...labelTargets.values()].sort(
      (a, b) => compareText(a.model, b.model) || compareText(a.key, b.key)
    );
    for (const group of groups) {
      const target = this.graph.get(group.model);
      const lookup = target ? planLabelLookup(this.graph, target, group.key, group.fields, locales) : null;
      if (lookup) labelLookups.push(lookup);
    }

    const parts = {
      rows: rows.statement,
      count,
      countIsEstimate: countMode === 'estimate' && filters.length === 0,
      labelLookups,
      locale,
    };

    return Object.freeze({
      model: model.name,
      ...parts,
      keyAlias: model.key ? KEY_ALIAS : null,
      columns,
      lazyFields: model.fields.filter(isX2Many),
      page: Object.freeze({ offset, limit, requestedLimit }),
      truncated,
      fingerprint: planFingerprint(parts),
    });
  }

  /**
   * Plan the distinct values of one column-backed path (`state`,
   * `partner_id`, `partner_id.country_id`) over the filtered rows.
   *
   * @throws InvalidFilterError for to-many or non-stored paths
   */
  planDistinct(
    model: LogicalModel,
    path: string,
    filters: readonly FilterSpec[] = [],
    options: DistinctOptions = {}
  ): DistinctPlan {
    const locale = options.locale ?? this.settings.defaultLocale;
    const locales = localeChain(locale, this.settings.defaultLocale);

    const requestedLimit = options.limit ?? DEFAULT_DISTINCT_LIMIT;
    if (!Number.isInteger(requestedLimit) || requestedLimit <= 0) {
      throw new InvalidFilterError(`Distinct limit must be a positive integer, got ${requestedLimit}`, {
        model: model.name,
        path,
      });
    }
    const limit = Math.min(requestedLimit, this.settings.rowCeiling);

    const values = this.planDistinctStatement(model, path, filters, locales, limit);
    const count = options.count
      ? this.planDistinctStatement(model, path, filters, locales, null).statement
      : null;

    const { field } = values;
    let labelLookup: LabelLookup | null = null;
    if (field.kind === 'many2one') {
      const target = this.graph.resolve(field.target);
      labelLookup = target ? planLabelLookup(this.graph, target, field.target.key, [field.name], locales) : null;
    }

    return Object.freeze({
      model: model.name,
      path,
      field,
      values: values.statement,
      count,
      labelLookup,
      limit,
      requestedLimit,
      truncated: requestedLimit > this.settings.rowCeiling,
      locale,
    });
  }

  private newContext(locales: readonly string[]): PlanContext {
    return { graph: this.graph, params: new ParameterList(), locales, tables: new Map(), aliasCount: 0 };
  }

  private planRows(
    model: LogicalModel,
    filters: readonly FilterSpec[],
    sorts: readonly SortSpec[],
    locales: readonly string[],
    offset: number,
    limit: number
  ): { statement: Statement; columns: PlannedColumn[] } {
    const context = this.newContext(locales);
    const joins: string[] = [];
    const scope = createScope(context, model, 't0', 'JOIN', joins);

    const select: string[] = [];
    if (model.key) {
      select.push(`${columnRef('t0', model.key)} AS ${quoteIdent(KEY_ALIAS)}`);
    }
    const columns: PlannedColumn[] = [];
    for (const field of model.fields) {
      if (!isColumnBacked(field)) continue;
      const alias = `c${columns.length}`;
      select.push(`${fieldExpression(context, scope, field)} AS ${quoteIdent(alias)}`);
      columns.push(Object.freeze({ alias, field }));
    }
    if (select.length === 0) {
      throw new InvalidFilterError(`Model ${model.name} has no readable columns`, { model: model.name });
    }

    const predicates = filters.map(filter => filterPredicate(context, scope, filter));
    const orderBy = sorts.map(sort => sortExpression(context, scope, sort));
    if (model.key && !sorts.some(sort => sort.path === model.key)) {
      orderBy.push(`${columnRef('t0', model.key)} ASC`);
    }

    const where = renderWhere(predicates, context.params);
    const limitPlaceholder = context.params.add(limit);
    const offsetPlaceholder = context.params.add(offset);

    const sql =
      `SELECT ${select.join(', ')} FROM ${qualifyTable(model.table)} AS t0` +
      (joins.length > 0 ? ` ${joins.join(' ')}` : '') +
      where +
      (orderBy.length > 0 ? ` ORDER BY ${orderBy.join(', ')}` : '') +
      ` LIMIT ${limitPlaceholder} OFFSET ${offsetPlaceholder}`;

    return {
      statement: Object.freeze({ sql, params: context.params.values, tables: [...context.tables.values()] }),
      columns,
    };
  }

  private planCount(model: LogicalModel, filters: readonly FilterSpec[], locales: readonly string[]): Statement {
    const context = this.newContext(locales);
    const joins: string[] = [];
    const scope = createScope(context, model, 't0', 'JOIN', joins);
    const predicates = filters.map(filter => filterPredicate(context, scope, filter));
    const where = renderWhere(predicates, context.params);

    const sql =
      `SELECT COUNT(*) AS "total" FROM ${qualifyTable(model.table)} AS t0` +
      (joins.length > 0 ? ` ${joins.join(' ')}` : '') +
      where;
    return Object.freeze({ sql, params: context.params.values, tables: [...context.tables.values()] });
  }

  /**
   * `SELECT DISTINCT` for a page of values, or `COUNT(DISTINCT ...)` when
   * `limit` is null.
   */
  private planDistinctStatement(
    model: LogicalModel,
    path: string,
    filters: readonly FilterSpec[],
    locales: readonly string[],
    limit: number | null
  ): { statement: Statement; field: ColumnBackedField } {
    const context = this.newContext(locales);
    const joins: string[] = [];
    const scope = createScope(context, model, 't0', 'JOIN', joins);

    const resolved = resolvePath(context, scope, path);
    const { field } = resolved;
    if (resolved.via !== null || !isColumnBacked(field)) {
      throw new InvalidFilterError(`Cannot list distinct values of to-many path '${path}'`, {
        model: model.name,
        path,
      });
    }
    const expression = fieldExpression(context, resolved.scope, field);

    const predicates = filters.map(filter => filterPredicate(context, scope, filter));
    const where = renderWhere(predicates, context.params);
    const from =
      ` FROM ${qualifyTable(model.table)} AS t0` + (joins.length > 0 ? ` ${joins.join(' ')}` : '') + where;

    const sql =
      limit === null
        ? `SELECT COUNT(DISTINCT ${expression}) AS "total"${from}`
        : `SELECT DISTINCT ${expression} AS ${quoteIdent(VALUE_ALIAS)}${from} ` +
          `ORDER BY ${quoteIdent(VALUE_ALIAS)} ASC LIMIT ${context.params.add(limit)}`;

    return {
      statement: Object.freeze({ sql, params: context.params.values, tables: [...context.tables.values()] }),
      field,
    };
  }

  private planEstimate(model: LogicalModel): Statement {
    return Object.freeze({
      sql: 'SELECT c.reltuples::bigint AS "total" FROM pg_catalog.pg_class c WHERE c.oid = to_regclass($1)',
      params: [qualifyTable(model.table)],
      tables: [model.table],
    });
  }
}

export default QueryPlanner;
