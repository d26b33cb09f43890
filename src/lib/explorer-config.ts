import { z } from 'zod';

import { isValidLocale } from './locale.js';
import type { PostgresConfig } from './postgres-config.js';

const identifier = z.string().regex(/^[A-Za-z_][A-Za-z0-9_$]*$/, 'must be a plain SQL identifier');

const fieldHints = z.record(z.string(), z.array(z.string()));

export const explorerConfigSchema = z.object({
  /** Schemas introspected when refreshSchema() is called without a filter. */
  schemas: z.array(identifier).min(1).default(['public']),
  /** Schema whose tables get bare model names; others are prefixed. */
  defaultSchema: identifier.default('public'),
  defaultLocale: z.string().refine(isValidLocale, 'must be an Odoo language code').default('en_US'),
  rowCeiling: z.number().int().positive().default(1000),
  defaultPageSize: z.number().int().positive().default(100),
  statementTimeoutMs: z.number().int().positive().default(30000),
  catalogTimeoutMs: z.number().int().positive().default(60000),
  catalogBatchSize: z.number().int().positive().max(10000).default(500),
  resultCacheSize: z.number().int().nonnegative().default(32),
  /** Candidate record-name columns, in priority order. */
  labelFields: z.array(z.string()).min(1).default(['name', 'display_name', 'complete_name', 'login', 'code']),
  countMode: z.enum(['exact', 'estimate']).default('exact'),
  /** Odoo model name -> fields stored as translations (ir_translation or jsonb). */
  translatedFields: fieldHints.default({}),
  /** Odoo model name -> non-stored computed fields worth describing. */
  computedFields: fieldHints.default({}),
});

export type ExplorerConfig = z.infer<typeof explorerConfigSchema>;

export type ExplorerConfigInput = z.input<typeof explorerConfigSchema>;

/**
 * Validate explorer settings, filling defaults.
 *
 * @param input - Partial settings from the caller
 * @returns Complete configuration
 */
export const resolveExplorerConfig = (input: ExplorerConfigInput = {}): ExplorerConfig => {
  const parsed = explorerConfigSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new TypeError(`Invalid explorer configuration: ${details}`);
  }
  return parsed.data;
};

type Env = Record<string, string | undefined>;

const readInt = (value: string | undefined): number | undefined => {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
};

const readList = (value: string | undefined): string[] | undefined => {
  if (!value) return undefined;
  const items = value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
  return items.length > 0 ? items : undefined;
};

/**
 * Read explorer settings from `ODOO_EXPLORER_*` variables. Unset variables
 * fall back to the schema defaults.
 */
export const resolveExplorerConfigFromEnv = (env: Env = process.env): ExplorerConfig => {
  const input: ExplorerConfigInput = {};

  const schemas = readList(env.ODOO_EXPLORER_SCHEMAS);
  if (schemas) input.schemas = schemas;
  if (env.ODOO_EXPLORER_DEFAULT_LOCALE) input.defaultLocale = env.ODOO_EXPLORER_DEFAULT_LOCALE;

  const rowCeiling = readInt(env.ODOO_EXPLORER_ROW_CEILING);
  if (rowCeiling !== undefined) input.rowCeiling = rowCeiling;
  const pageSize = readInt(env.ODOO_EXPLORER_PAGE_SIZE);
  if (pageSize !== undefined) input.defaultPageSize = pageSize;
  const statementTimeout = readInt(env.ODOO_EXPLORER_STATEMENT_TIMEOUT_MS);
  if (statementTimeout !== undefined) input.statementTimeoutMs = statementTimeout;
  const catalogTimeout = readInt(env.ODOO_EXPLORER_CATALOG_TIMEOUT_MS);
  if (catalogTimeout !== undefined) input.catalogTimeoutMs = catalogTimeout;

  const countMode = env.ODOO_EXPLORER_COUNT_MODE;
  if (countMode === 'exact' || countMode === 'estimate') input.countMode = countMode;

  return resolveExplorerConfig(input);
};

/**
 * Read pg connection settings from the standard libpq variables, the same set
 * `psql` honours. `DATABASE_URL` wins when present.
 */
export const resolvePostgresConfigFromEnv = (env: Env = process.env): Partial<PostgresConfig> => {
  const connectionString = env.ODOO_EXPLORER_DATABASE_URL ?? env.DATABASE_URL;
  if (connectionString) {
    return { connectionString };
  }

  const config: Partial<PostgresConfig> = {};
  if (env.PGHOST) config.host = env.PGHOST;
  const port = readInt(env.PGPORT);
  if (port !== undefined) config.port = port;
  if (env.PGDATABASE) config.database = env.PGDATABASE;
  if (env.PGUSER) config.user = env.PGUSER;
  if (env.PGPASSWORD !== undefined) config.password = env.PGPASSWORD;
  return config;
};
