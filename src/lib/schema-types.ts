import type { RawIndex, TableRef } from './catalog-types.js';

export type FieldKind =
  | 'scalar'
  | 'many2one'
  | 'one2many'
  | 'many2many'
  | 'translated-scalar'
  | 'computed-unknown';

export type ScalarType =
  | 'integer'
  | 'bigint'
  | 'float'
  | 'numeric'
  | 'boolean'
  | 'text'
  | 'date'
  | 'datetime'
  | 'json'
  | 'binary'
  | 'other';

export type RelationStatus = 'resolved' | 'unresolved';

/**
 * Weak reference to another model: a name looked up in the graph, never a
 * pointer. `table`/`key` describe the physical side so an unresolved edge can
 * still be displayed.
 */
export interface RelationTarget {
  readonly model: string;
  readonly table: TableRef;
  readonly key: string;
  readonly status: RelationStatus;
}

interface FieldBase {
  readonly name: string;
  readonly kind: FieldKind;
  /** Physical table holding the field; null for computed fields. */
  readonly table: TableRef | null;
  /** Ancestor model the field was delegated from, if any. */
  readonly inheritedFrom: string | null;
  /** Odoo magic column (`id`, `create_uid`, `write_date`, ...). */
  readonly system: boolean;
}

export interface ScalarField extends FieldBase {
  readonly kind: 'scalar';
  readonly table: TableRef;
  readonly column: string;
  readonly dataType: string;
  readonly valueType: ScalarType;
  readonly nullable: boolean;
}

export interface Many2OneField extends FieldBase {
  readonly kind: 'many2one';
  readonly table: TableRef;
  readonly column: string;
  readonly target: RelationTarget;
  readonly required: boolean;
  /** The foreign key implements `_inherits` delegation. */
  readonly delegate: boolean;
}

export interface One2ManyField extends FieldBase {
  readonly kind: 'one2many';
  readonly table: TableRef;
  /** Key column on the owning table that the inverse column points at. */
  readonly key: string;
  readonly target: RelationTarget;
  readonly inverseField: string;
  readonly inverseColumn: string;
}

export interface JunctionRef {
  readonly table: TableRef;
  /** Junction column pointing at the owning model. */
  readonly sourceColumn: string;
  /** Junction column pointing at the target model. */
  readonly targetColumn: string;
}

export interface Many2ManyField extends FieldBase {
  readonly kind: 'many2many';
  readonly table: TableRef;
  readonly key: string;
  readonly target: RelationTarget;
  readonly junction: JunctionRef;
  /** Field on the target model walking the same junction backwards. */
  readonly inverseField: string | null;
}

export type TranslationSource =
  | {
      readonly storage: 'side-table';
      readonly table: TableRef;
      readonly recordColumn: string;
      readonly langColumn: string;
      readonly valueColumn: string;
      /** `model,field` discriminator for Odoo's generic ir_translation. */
      readonly fieldKey: string | null;
    }
  | {
      readonly storage: 'jsonb';
    };

export interface TranslatedScalarField extends FieldBase {
  readonly kind: 'translated-scalar';
  readonly table: TableRef;
  readonly column: string;
  readonly dataType: string;
  readonly translation: TranslationSource;
}

export interface ComputedUnknownField extends FieldBase {
  readonly kind: 'computed-unknown';
  readonly table: null;
}

export type LogicalField =
  | ScalarField
  | Many2OneField
  | One2ManyField
  | Many2ManyField
  | TranslatedScalarField
  | ComputedUnknownField;

export type RelationalField = Many2OneField | One2ManyField | Many2ManyField;

export type ColumnBackedField = ScalarField | Many2OneField | TranslatedScalarField;

export type ModelTrait = 'multi-company' | 'archivable' | 'hierarchical' | 'audited';

/**
 * One `_inherits` hop. `via` is the table holding the foreign key (the child
 * or an intermediate ancestor); `table` is the parent joined through it.
 */
export interface DelegationLink {
  readonly model: string;
  readonly table: TableRef;
  readonly key: string;
  readonly via: TableRef;
  readonly viaColumn: string;
}

export interface LogicalModel {
  readonly name: string;
  readonly table: TableRef;
  /** Single-column primary key, or null when the table has none usable. */
  readonly key: string | null;
  readonly fields: readonly LogicalField[];
  /** Delegated parents, root first. */
  readonly delegation: readonly DelegationLink[];
  /** Field used for display labels. */
  readonly recName: string | null;
  readonly traits: readonly ModelTrait[];
  readonly indexes: readonly RawIndex[];
  readonly readable: boolean;
  readonly comment: string | null;
}

export type InferenceWarningCode =
  | 'ambiguous-classification'
  | 'composite-foreign-key'
  | 'delegation-cycle'
  | 'delegation-target-missing'
  | 'name-collision'
  | 'translation-unmatched'
  | 'translation-target-missing'
  | 'computed-field-shadowed';

export interface InferenceWarning {
  readonly code: InferenceWarningCode;
  readonly table: string;
  readonly column?: string;
  readonly message: string;
}

export const isRelational = (field: LogicalField): field is RelationalField =>
  field.kind === 'many2one' || field.kind === 'one2many' || field.kind === 'many2many';

export const isColumnBacked = (field: LogicalField): field is ColumnBackedField =>
  field.kind === 'scalar' || field.kind === 'many2one' || field.kind === 'translated-scalar';
