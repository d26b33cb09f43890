import type { TableRef } from './catalog-types.js';
import type { ScalarType } from './schema-types.js';

/**
 * Columns Odoo's ORM adds to every model (`MAGIC_COLUMNS` plus the key).
 */
export const SYSTEM_COLUMNS: ReadonlySet<string> = new Set([
  'id',
  'create_uid',
  'create_date',
  'write_uid',
  'write_date',
]);

export const TRANSLATION_RECORD_COLUMN = 'res_id';
export const TRANSLATION_LANG_COLUMN = 'lang';
export const GENERIC_TRANSLATION_TABLE = 'ir_translation';
/** Columns of the generic translation table that are bookkeeping, not values. */
export const GENERIC_TRANSLATION_META = new Set([
  'id',
  'name',
  'type',
  'src',
  'module',
  'state',
  'comments',
]);

/**
 * Odoo derives table names from model names by replacing dots with
 * underscores; this is the conventional inverse. Tables outside the default
 * schema are prefixed with their schema so names stay unique.
 */
export const tableToModelName = (table: TableRef, defaultSchema: string): string => {
  const dotted = table.name.replace(/_/g, '.');
  return table.schema === defaultSchema ? dotted : `${table.schema}:${dotted}`;
};

/**
 * `category_id` -> `category_ids`; `tag` -> `tag_ids`.
 */
export const many2manyFieldName = (column: string): string => {
  const stem = column.endsWith('_id') ? column.slice(0, -3) : column;
  return `${stem}_ids`;
};

/**
 * Implicit reverse of a many2one: `sale_order.partner_id` becomes
 * `sale_order_partner_ids` on the target.
 */
export const one2manyFieldName = (sourceTable: string, fieldName: string): string => {
  const stem = fieldName.endsWith('_id') ? fieldName.slice(0, -3) : fieldName;
  return `${sourceTable}_${stem}_ids`;
};

const TEXT_TYPES = /^(?:text|character varying|varchar|character|char|citext|name)\b/;

export const isTextType = (dataType: string): boolean => TEXT_TYPES.test(dataType);

export const isJsonbType = (dataType: string): boolean => dataType === 'jsonb';

/**
 * Map a `format_type()` string onto the value type records carry.
 */
export const scalarTypeFor = (dataType: string): ScalarType => {
  const type = dataType.toLowerCase();
  if (type === 'integer' || type === 'smallint' || type === 'int' || type === 'int4' || type === 'int2') {
    return 'integer';
  }
  if (type === 'bigint' || type === 'int8') return 'bigint';
  if (type === 'double precision' || type === 'real' || type === 'float8' || type === 'float4') {
    return 'float';
  }
  if (type.startsWith('numeric') || type.startsWith('decimal')) return 'numeric';
  if (type === 'boolean' || type === 'bool') return 'boolean';
  if (type === 'date') return 'date';
  if (type.startsWith('timestamp')) return 'datetime';
  if (type === 'json' || type === 'jsonb') return 'json';
  if (type === 'bytea') return 'binary';
  if (isTextType(type)) return 'text';
  return 'other';
};
