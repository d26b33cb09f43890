/**
 * Raw catalog facts, exactly as PostgreSQL reports them. One snapshot per
 * introspection pass; nothing here knows about Odoo.
 */

export type JsonObject = Record<string, unknown>;

export interface TableRef {
  readonly schema: string;
  readonly name: string;
}

export interface RawColumn {
  readonly name: string;
  /** `format_type()` output, e.g. `character varying`, `integer`, `jsonb`. */
  readonly dataType: string;
  readonly nullable: boolean;
  readonly defaultValue: string | null;
  readonly ordinal: number;
}

export interface RawForeignKey {
  readonly name: string;
  readonly columns: readonly string[];
  readonly referencedSchema: string;
  readonly referencedTable: string;
  readonly referencedColumns: readonly string[];
}

export interface RawIndex {
  readonly name: string;
  readonly columns: readonly string[];
  readonly unique: boolean;
  readonly primary: boolean;
  /** Access method, e.g. `btree`, `gin`. */
  readonly method: string;
}

export interface RawTable extends TableRef {
  readonly columns: readonly RawColumn[];
  readonly primaryKey: readonly string[];
  readonly foreignKeys: readonly RawForeignKey[];
  readonly indexes: readonly RawIndex[];
  /** Whether the session role may SELECT from the table. */
  readonly readable: boolean;
  readonly comment: string | null;
}

export const tableKey = (ref: TableRef): string => `${ref.schema}.${ref.name}`;

export const compareTables = (a: TableRef, b: TableRef): number => {
  if (a.schema === b.schema) {
    return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
  }
  return a.schema < b.schema ? -1 : 1;
};
