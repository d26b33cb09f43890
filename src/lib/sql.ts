import type { TableRef } from './catalog-types.js';

/**
 * Double-quote an identifier. Identifiers only ever come from the catalog,
 * but quoting keeps mixed-case and reserved names working.
 */
export const quoteIdent = (name: string): string => `"${name.replace(/"/g, '""')}"`;

export const qualifyTable = (ref: TableRef): string =>
  `${quoteIdent(ref.schema)}.${quoteIdent(ref.name)}`;

export const columnRef = (alias: string, column: string): string => `${alias}.${quoteIdent(column)}`;

/**
 * A parameterized statement plus the tables it reads, kept for error context.
 */
export interface Statement {
  readonly sql: string;
  readonly params: readonly unknown[];
  readonly tables: readonly TableRef[];
}

export interface BasicPredicate {
  type: 'basic';
  /** Already-quoted SQL expression on the left-hand side. */
  expression: string;
  operator: string;
  /** `undefined` renders a unary operator (`IS NULL`). */
  value?: unknown;
  valueTransform?: (placeholder: string) => string;
}

export interface GroupPredicate {
  type: 'group';
  conjunction: 'AND' | 'OR';
  predicates: Predicate[];
}

/**
 * Free-form fragment; `render` binds its own values through `bind`.
 */
export interface TemplatePredicate {
  type: 'template';
  render: (bind: (value: unknown) => string) => string;
}

export type Predicate = BasicPredicate | GroupPredicate | TemplatePredicate;

/**
 * Collects bound values and hands out `$n` placeholders in order.
 */
export class ParameterList {
  readonly values: unknown[] = [];

  add(value: unknown): string {
    this.values.push(value);
    return `$${this.values.length}`;
  }
}

export type Binder = (value: unknown) => string;

/**
 * Render a predicate tree, binding every value through `bind`.
 */
export function renderPredicate(predicate: Predicate, bind: Binder): string {
  if (predicate.type === 'group') {
    const inner = predicate.predicates
      .map(child => renderPredicate(child, bind))
      .filter(fragment => fragment.length > 0);
    if (inner.length === 0) {
      return '';
    }
    return inner.length === 1 ? (inner[0] ?? '') : `(${inner.join(` ${predicate.conjunction} `)})`;
  }

  if (predicate.type === 'template') {
    return predicate.render(bind);
  }

  if (predicate.value === undefined) {
    return `${predicate.expression} ${predicate.operator}`;
  }

  const placeholder = bind(predicate.value);
  const valueSql = predicate.valueTransform ? predicate.valueTransform(placeholder) : placeholder;
  return `${predicate.expression} ${predicate.operator} ${valueSql}`;
}

/**
 * Render predicates joined by AND; empty when there are none.
 */
export function renderWhere(predicates: readonly Predicate[], params: ParameterList): string {
  const fragments = predicates
    .map(predicate => renderPredicate(predicate, value => params.add(value)))
    .filter(fragment => fragment.length > 0);
  return fragments.length > 0 ? ` WHERE ${fragments.join(' AND ')}` : '';
}
