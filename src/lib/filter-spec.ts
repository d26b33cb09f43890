import { z } from 'zod';

import { InvalidFilterError } from './errors.js';
import { isValidLocale } from './locale.js';

export const FILTER_OPERATORS = [
  '=',
  '!=',
  '<',
  '<=',
  '>',
  '>=',
  'in',
  'not in',
  'like',
  'ilike',
  'not ilike',
  'is null',
  'is not null',
  'between',
] as const;

export type FilterOperator = (typeof FILTER_OPERATORS)[number];

export type SortDirection = 'asc' | 'desc';

/**
 * One condition. `path` is a field name, or `relation.field` for a single hop.
 */
export interface FilterSpec {
  readonly path: string;
  readonly operator: FilterOperator;
  readonly value?: unknown;
}

export interface SortSpec {
  readonly path: string;
  readonly direction: SortDirection;
}

export interface PageSpec {
  readonly offset: number;
  /** Falls back to the configured default page size. */
  readonly limit?: number;
}

export const filterSpecSchema = z.object({
  path: z.string().min(1),
  operator: z.enum(FILTER_OPERATORS),
  value: z.unknown().optional(),
});

export const sortSpecSchema = z.object({
  path: z.string().min(1),
  direction: z.enum(['asc', 'desc']).default('asc'),
});

export const pageSpecSchema = z.object({
  offset: z.number().int().nonnegative().default(0),
  limit: z.number().int().positive().optional(),
});

export const queryRequestSchema = z.object({
  model: z.string().min(1),
  filters: z.array(filterSpecSchema).default([]),
  sort: z.array(sortSpecSchema).default([]),
  page: pageSpecSchema.default({}),
  locale: z.string().refine(isValidLocale, 'must be an Odoo language code').optional(),
  /** Bypass the result cache for this request. */
  fresh: z.boolean().default(false),
});

export type QueryRequest = z.infer<typeof queryRequestSchema>;

export type QueryRequestInput = z.input<typeof queryRequestSchema>;

export const distinctRequestSchema = z.object({
  model: z.string().min(1),
  /** Column-backed field, or `relation.field` for a single hop. */
  path: z.string().min(1),
  filters: z.array(filterSpecSchema).default([]),
  limit: z.number().int().positive().optional(),
  locale: z.string().refine(isValidLocale, 'must be an Odoo language code').optional(),
  /** Also count the distinct values over all filtered rows. */
  count: z.boolean().default(false),
});

export type DistinctRequest = z.infer<typeof distinctRequestSchema>;

export type DistinctRequestInput = z.input<typeof distinctRequestSchema>;

const describeIssues = (error: z.ZodError): string =>
  error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');

/**
 * Validate a view request coming from the presentation layer.
 *
 * @throws InvalidFilterError listing every malformed part
 */
export function parseQueryRequest(input: unknown): QueryRequest {
  const parsed = queryRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidFilterError(`Invalid query request: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * @throws InvalidFilterError listing every malformed part
 */
export function parseDistinctRequest(input: unknown): DistinctRequest {
  const parsed = distinctRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidFilterError(`Invalid distinct-values request: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

const spec = (path: string, operator: FilterOperator, value?: unknown): FilterSpec =>
  Object.freeze(value === undefined ? { path, operator } : { path, operator, value });

/**
 * Small bag of constructors so call sites read like Odoo domains:
 * `ops.eq('partner_id', 7)`, `ops.in('state', ['draft', 'sent'])`.
 */
export function createOperators() {
  return {
    eq: (path: string, value: unknown) => spec(path, '=', value),
    neq: (path: string, value: unknown) => spec(path, '!=', value),
    lt: (path: string, value: unknown) => spec(path, '<', value),
    lte: (path: string, value: unknown) => spec(path, '<=', value),
    gt: (path: string, value: unknown) => spec(path, '>', value),
    gte: (path: string, value: unknown) => spec(path, '>=', value),
    in: (path: string, values: readonly unknown[]) => spec(path, 'in', [...values]),
    notIn: (path: string, values: readonly unknown[]) => spec(path, 'not in', [...values]),
    like: (path: string, pattern: string) => spec(path, 'like', pattern),
    ilike: (path: string, pattern: string) => spec(path, 'ilike', pattern),
    notIlike: (path: string, pattern: string) => spec(path, 'not ilike', pattern),
    isNull: (path: string) => spec(path, 'is null'),
    isNotNull: (path: string) => spec(path, 'is not null'),
    between: (path: string, low: unknown, high: unknown) => spec(path, 'between', [low, high]),
  };
}

export const ops = createOperators();

export const asc = (path: string): SortSpec => Object.freeze({ path, direction: 'asc' });

export const desc = (path: string): SortSpec => Object.freeze({ path, direction: 'desc' });

export const page = (offset = 0, limit?: number): PageSpec =>
  Object.freeze(limit === undefined ? { offset } : { offset, limit });
