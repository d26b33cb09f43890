import type { RawColumn, RawForeignKey, RawTable, TableRef } from './catalog-types.js';
import { compareTables, tableKey } from './catalog-types.js';
import {
  GENERIC_TRANSLATION_META,
  GENERIC_TRANSLATION_TABLE,
  isJsonbType,
  isTextType,
  many2manyFieldName,
  one2manyFieldName,
  SYSTEM_COLUMNS,
  scalarTypeFor,
  TRANSLATION_LANG_COLUMN,
  TRANSLATION_RECORD_COLUMN,
  tableToModelName,
} from './naming.js';
import { debug } from './runtime.js';
import { SchemaGraph } from './schema-graph.js';
import type {
  DelegationLink,
  InferenceWarning,
  InferenceWarningCode,
  LogicalField,
  LogicalModel,
  Many2ManyField,
  Many2OneField,
  ModelTrait,
  One2ManyField,
  RelationTarget,
  TranslationSource,
} from './schema-types.js';

export interface InferenceOptions {
  defaultSchema?: string;
  labelFields?: readonly string[];
  translatedFields?: Readonly<Record<string, readonly string[]>>;
  computedFields?: Readonly<Record<string, readonly string[]>>;
}

interface JunctionSide {
  column: string;
  fk: RawForeignKey;
}

interface JunctionShape {
  table: RawTable;
  left: JunctionSide;
  right: JunctionSide;
}

interface TranslationShape {
  table: RawTable;
  target: RawTable;
  valueColumns: string[];
}

interface DelegationEdge {
  parent: RawTable;
  column: string;
}

const DEFAULT_LABEL_FIELDS = ['name', 'display_name', 'complete_name', 'login', 'code'];

/**
 * Builds a {@link SchemaGraph} from raw catalog facts by applying Odoo's
 * structural conventions. One instance per inference pass; call
 * {@link inferSchema} rather than using it directly.
 */
class SchemaInferencer {
  private readonly defaultSchema: string;
  private readonly labelFields: readonly string[];
  private readonly translatedHints: Readonly<Record<string, readonly string[]>>;
  private readonly computedHints: Readonly<Record<string, readonly string[]>>;

  private readonly tables: RawTable[];
  private readonly tablesByKey = new Map<string, RawTable>();
  private readonly junctions: JunctionShape[] = [];
  private readonly translations: TranslationShape[] = [];
  private readonly candidates: RawTable[] = [];
  private readonly candidateKeys = new Set<string>();
  private readonly modelNames = new Map<string, string>();
  private readonly translationSources = new Map<string, TranslationSource>();
  private readonly delegationEdges = new Map<string, DelegationEdge[]>();
  private readonly ownFields = new Map<string, LogicalField[]>();
  private readonly warnings: InferenceWarning[] = [];

  constructor(tables: readonly RawTable[], options: InferenceOptions) {
    this.defaultSchema = options.defaultSchema ?? 'public';
    this.labelFields = options.labelFields ?? DEFAULT_LABEL_FIELDS;
    this.translatedHints = options.translatedFields ?? {};
    this.computedHints = options.computedFields ?? {};

    this.tables = [...tables].sort(compareTables);
    for (const table of this.tables) {
      this.tablesByKey.set(tableKey(table), table);
    }
  }

  run(): SchemaGraph {
    this.classifyTables();
    this.assignModelNames();
    this.collectTranslations();
    this.collectDelegations();

    for (const table of this.candidates) {
      this.ownFields.set(tableKey(table), this.buildColumnFields(table));
    }
    this.addMany2ManyFields();
    this.addOne2ManyFields();
    this.addComputedFields();

    const models = this.candidates.map(table => this.buildModel(table));
    debug.db(
      `Inferred ${models.length} models from ${this.tables.length} tables ` +
        `(${this.junctions.length} junctions, ${this.translations.length} translation tables, ` +
        `${this.warnings.length} warnings)`
    );
    return new SchemaGraph(models, this.warnings);
  }

  private warn(code: InferenceWarningCode, table: TableRef, message: string, column?: string) {
    const warning: InferenceWarning =
      column === undefined
        ? { code, table: tableKey(table), message }
        : { code, table: tableKey(table), column, message };
    this.warnings.push(Object.freeze(warning));
    debug.db(`Inference warning [${code}] ${tableKey(table)}: ${message}`);
  }

  // ----- Step 1: auxiliary tables -----

  private classifyTables(): void {
    const junctionKeys = new Set<string>();
    for (const table of this.tables) {
      const junction = this.detectJunction(table);
      if (junction) {
        this.junctions.push(junction);
        junctionKeys.add(tableKey(table));
      }
    }

    const translationKeys = new Set<string>();
    for (const table of this.tables) {
      if (junctionKeys.has(tableKey(table))) continue;
      const translation = this.detectTranslationTable(table, junctionKeys);
      if (translation) {
        this.translations.push(translation);
        translationKeys.add(tableKey(table));
      }
    }

    for (const table of this.tables) {
      const key = tableKey(table);
      if (junctionKeys.has(key) || translationKeys.has(key)) continue;
      this.candidates.push(table);
      this.candidateKeys.add(key);
    }
  }

  private detectJunction(table: RawTable): JunctionShape | null {
    if (table.foreignKeys.length !== 2 || table.columns.length !== 2) {
      return null;
    }
    const [first, second] = table.foreignKeys;
    if (!first || !second || first.columns.length !== 1 || second.columns.length !== 1) {
      return null;
    }
    const firstColumn = first.columns[0];
    const secondColumn = second.columns[0];
    if (!firstColumn || !secondColumn || firstColumn === secondColumn) {
      return null;
    }

    const columns = [firstColumn, secondColumn];
    const nonNullable = columns.every(name => findColumn(table, name)?.nullable === false);
    if (!nonNullable) {
      return null;
    }

    const coversBoth = (keyColumns: readonly string[]) =>
      keyColumns.length === 2 && columns.every(column => keyColumns.includes(column));
    const keyed =
      coversBoth(table.primaryKey) ||
      table.indexes.some(index => index.unique && coversBoth(index.columns));
    if (!keyed) {
      return null;
    }

    const sides: JunctionSide[] = [
      { column: firstColumn, fk: first },
      { column: secondColumn, fk: second },
    ].sort(
      (a, b) => (findColumn(table, a.column)?.ordinal ?? 0) - (findColumn(table, b.column)?.ordinal ?? 0)
    );
    const [left, right] = sides;
    if (!left || !right) {
      return null;
    }
    return { table, left, right };
  }

  private detectTranslationTable(
    table: RawTable,
    junctionKeys: ReadonlySet<string>
  ): TranslationShape | null {
    if (!hasTranslationKey(table)) {
      return null;
    }

    const recordFk = table.foreignKeys.find(
      fk => fk.columns.length === 1 && fk.columns[0] === TRANSLATION_RECORD_COLUMN
    );
    if (!recordFk) {
      return null;
    }

    const target = this.tablesByKey.get(referencedKey(recordFk));
    if (!target || junctionKeys.has(tableKey(target)) || hasTranslationKey(target)) {
      return null;
    }

    const generic = table.name === GENERIC_TRANSLATION_TABLE;
    const valueColumns = table.columns
      .map(column => column.name)
      .filter(
        name =>
          name !== TRANSLATION_RECORD_COLUMN &&
          name !== TRANSLATION_LANG_COLUMN &&
          !table.primaryKey.includes(name) &&
          !SYSTEM_COLUMNS.has(name) &&
          !(generic && GENERIC_TRANSLATION_META.has(name))
      );
    if (valueColumns.length === 0) {
      return null;
    }

    return { table, target, valueColumns };
  }

  private assignModelNames(): void {
    const taken = new Map<string, RawTable>();
    for (const table of this.candidates) {
      let name = tableToModelName(table, this.defaultSchema);
      const clash = taken.get(name);
      if (clash) {
        const renamed = `${name}(${tableKey(table)})`;
        this.warn(
          'name-collision',
          table,
          `model name '${name}' already used by ${tableKey(clash)}; using '${renamed}'`
        );
        name = renamed;
      }
      taken.set(name, table);
      this.modelNames.set(tableKey(table), name);
    }
  }

  private modelNameFor(ref: TableRef): string {
    return this.modelNames.get(tableKey(ref)) ?? tableToModelName(ref, this.defaultSchema);
  }

  // ----- Step 4: translations -----

  private collectTranslations(): void {
    for (const shape of this.translations) {
      const { table, target, valueColumns } = shape;
      const modelName = this.modelNameFor(target);
      const hasFieldKey =
        table.name === GENERIC_TRANSLATION_TABLE && findColumn(table, 'name') !== null;

      for (const valueColumn of valueColumns) {
        const baseColumns = this.translatedBaseColumns(shape, valueColumn, modelName);
        for (const baseColumn of baseColumns) {
          this.translationSources.set(sourceKey(target, baseColumn), {
            storage: 'side-table',
            table: toRef(table),
            recordColumn: TRANSLATION_RECORD_COLUMN,
            langColumn: TRANSLATION_LANG_COLUMN,
            valueColumn,
            fieldKey: hasFieldKey ? `${modelName},${baseColumn}` : null,
          });
        }
      }
    }

    this.collectHintedTranslations();
  }

  /**
   * Which base columns a translation value column stands for. A value column
   * named like a base text column translates that column; a generic `value`
   * column translates the hinted fields, or failing hints the record name.
   */
  private translatedBaseColumns(
    shape: TranslationShape,
    valueColumn: string,
    modelName: string
  ): string[] {
    const { table, target } = shape;
    const sameName = findColumn(target, valueColumn);
    if (sameName && isTextType(sameName.dataType)) {
      return [valueColumn];
    }

    if (valueColumn === 'value') {
      const hinted = this.translatedHints[modelName];
      if (hinted && hinted.length > 0) {
        return hinted.filter(name => {
          const column = findColumn(target, name);
          return column !== null && isTextType(column.dataType);
        });
      }
      const guess = this.labelFields.find(name => {
        const column = findColumn(target, name);
        return column !== null && isTextType(column.dataType);
      });
      if (guess) {
        this.warn(
          'translation-unmatched',
          table,
          `generic value column assumed to translate ${tableKey(target)}.${guess}`,
          valueColumn
        );
        return [guess];
      }
    }

    this.warn(
      'translation-unmatched',
      table,
      `value column '${valueColumn}' matches no text column of ${tableKey(target)}`,
      valueColumn
    );
    return [];
  }

  private collectHintedTranslations(): void {
    const generic = this.tables.find(
      table =>
        table.name === GENERIC_TRANSLATION_TABLE &&
        this.candidateKeys.has(tableKey(table)) &&
        hasTranslationKey(table) &&
        findColumn(table, 'value') !== null
    );

    for (const [modelName, fieldNames] of Object.entries(this.translatedHints).sort(byKey)) {
      const table = this.candidates.find(candidate => this.modelNameFor(candidate) === modelName);
      if (!table) continue;

      for (const fieldName of fieldNames) {
        const key = sourceKey(table, fieldName);
        if (this.translationSources.has(key)) continue;

        const column = findColumn(table, fieldName);
        if (column && isJsonbType(column.dataType)) {
          this.translationSources.set(key, { storage: 'jsonb' });
          continue;
        }

        if (column && isTextType(column.dataType) && generic) {
          this.translationSources.set(key, {
            storage: 'side-table',
            table: toRef(generic),
            recordColumn: TRANSLATION_RECORD_COLUMN,
            langColumn: TRANSLATION_LANG_COLUMN,
            valueColumn: 'value',
            fieldKey: findColumn(generic, 'name') ? `${modelName},${fieldName}` : null,
          });
          continue;
        }

        this.warn(
          'translation-target-missing',
          table,
          `translated field '${fieldName}' has no jsonb column and no translation table`,
          fieldName
        );
      }
    }
  }

  // ----- Step 2: delegation -----

  private collectDelegations(): void {
    const proposed = new Map<string, DelegationEdge[]>();

    for (const table of this.candidates) {
      const edges: DelegationEdge[] = [];
      for (const fk of this.singleForeignKeys(table)) {
        const column = fk.columns[0];
        if (!column || !table.primaryKey.includes(column)) continue;
        if (findColumn(table, column)?.nullable !== false) continue;

        const parent = this.tablesByKey.get(referencedKey(fk));
        if (!parent || !this.candidateKeys.has(tableKey(parent))) {
          this.warn(
            'delegation-target-missing',
            table,
            `key column references ${fk.referencedSchema}.${fk.referencedTable}, which is not a loaded model; treating as many2one`,
            column
          );
          continue;
        }
        if (parent === table) continue;
        if (!sameColumns(fk.referencedColumns, parent.primaryKey) || parent.primaryKey.length !== 1) {
          continue;
        }
        edges.push({ parent, column });
      }
      if (edges.length > 0) {
        proposed.set(tableKey(table), edges);
      }
    }

    // Depth-first walk in table order; an edge back onto the active path closes a cycle.
    const state = new Map<string, 'active' | 'done'>();
    const visit = (table: RawTable) => {
      const key = tableKey(table);
      state.set(key, 'active');
      const kept: DelegationEdge[] = [];
      for (const edge of proposed.get(key) ?? []) {
        const parentKey = tableKey(edge.parent);
        if (state.get(parentKey) === 'active') {
          this.warn(
            'delegation-cycle',
            table,
            `delegation to ${parentKey} closes a cycle; treating as many2one`,
            edge.column
          );
          continue;
        }
        if (!state.has(parentKey)) {
          visit(edge.parent);
        }
        kept.push(edge);
      }
      if (kept.length > 0) {
        this.delegationEdges.set(key, kept);
      }
      state.set(key, 'done');
    };

    for (const table of this.candidates) {
      if (!state.has(tableKey(table))) {
        visit(table);
      }
    }
  }

  private isDelegationColumn(table: RawTable, column: string): boolean {
    return (this.delegationEdges.get(tableKey(table)) ?? []).some(edge => edge.column === column);
  }

  // ----- Step 3: own fields -----

  private singleForeignKeys(table: RawTable): RawForeignKey[] {
    return [...table.foreignKeys]
      .filter(fk => fk.columns.length === 1)
      .sort((a, b) => {
        const ordinalA = findColumn(table, a.columns[0] ?? '')?.ordinal ?? 0;
        const ordinalB = findColumn(table, b.columns[0] ?? '')?.ordinal ?? 0;
        return ordinalA - ordinalB || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0);
      });
  }

  private relationTarget(schema: string, name: string, key: string): RelationTarget {
    const ref: TableRef = { schema, name };
    const resolved = this.candidateKeys.has(tableKey(ref));
    return {
      model: this.modelNameFor(ref),
      table: ref,
      key,
      status: resolved ? 'resolved' : 'unresolved',
    };
  }

  private buildColumnFields(table: RawTable): LogicalField[] {
    const ref = toRef(table);
    const fksByColumn = new Map<string, RawForeignKey[]>();
    for (const fk of this.singleForeignKeys(table)) {
      const column = fk.columns[0];
      if (!column) continue;
      const list = fksByColumn.get(column) ?? [];
      list.push(fk);
      fksByColumn.set(column, list);
    }

    for (const fk of table.foreignKeys) {
      if (fk.columns.length > 1) {
        this.warn(
          'composite-foreign-key',
          table,
          `foreign key ${fk.name} spans ${fk.columns.join(', ')}; columns kept as scalars`
        );
      }
    }

    const fields: LogicalField[] = [];
    for (const column of [...table.columns].sort((a, b) => a.ordinal - b.ordinal)) {
      const system = SYSTEM_COLUMNS.has(column.name);
      const fks = fksByColumn.get(column.name) ?? [];
      const translation = this.translationSources.get(sourceKey(table, column.name));

      const [fk, ...otherFks] = fks;
      if (fk) {
        if (otherFks.length > 0) {
          this.warn(
            'ambiguous-classification',
            table,
            `column has ${fks.length} foreign keys; using ${fk.name}`,
            column.name
          );
        }
        if (translation) {
          this.warn(
            'ambiguous-classification',
            table,
            'column is both a foreign key and translated; keeping the relation',
            column.name
          );
        }
        const field: Many2OneField = {
          name: column.name,
          kind: 'many2one',
          table: ref,
          column: column.name,
          target: this.relationTarget(
            fk.referencedSchema,
            fk.referencedTable,
            fk.referencedColumns[0] ?? 'id'
          ),
          required: !column.nullable,
          delegate: this.isDelegationColumn(table, column.name),
          inheritedFrom: null,
          system,
        };
        fields.push(field);
        continue;
      }

      if (translation) {
        fields.push({
          name: column.name,
          kind: 'translated-scalar',
          table: ref,
          column: column.name,
          dataType: column.dataType,
          translation,
          inheritedFrom: null,
          system,
        });
        continue;
      }

      fields.push({
        name: column.name,
        kind: 'scalar',
        table: ref,
        column: column.name,
        dataType: column.dataType,
        valueType: scalarTypeFor(column.dataType),
        nullable: column.nullable,
        inheritedFrom: null,
        system,
      });
    }

    return fields;
  }

  /**
   * Pick a free field name on a model, falling back to `fallback` and then
   * numbered suffixes. Collisions are reported.
   */
  private claimName(table: RawTable, preferred: string, fallback: string): string {
    const fields = this.ownFields.get(tableKey(table)) ?? [];
    const taken = (name: string) => fields.some(field => field.name === name);
    if (!taken(preferred)) {
      return preferred;
    }
    let name = fallback;
    let suffix = 2;
    while (taken(name)) {
      name = `${fallback}_${suffix}`;
      suffix += 1;
    }
    this.warn('name-collision', table, `field '${preferred}' already exists; using '${name}'`);
    return name;
  }

  private addMany2ManyFields(): void {
    for (const junction of this.junctions) {
      const { table, left, right } = junction;
      const leftTable = this.tablesByKey.get(referencedKey(left.fk));
      const rightTable = this.tablesByKey.get(referencedKey(right.fk));
      const fallbackStem = table.name.replace(/_rel$/, '');

      const leftOwned = leftTable && this.candidateKeys.has(tableKey(leftTable)) ? leftTable : null;
      const rightOwned =
        rightTable && this.candidateKeys.has(tableKey(rightTable)) ? rightTable : null;

      const leftName = leftOwned
        ? this.claimName(leftOwned, many2manyFieldName(right.column), `${fallbackStem}_${right.column}_ids`)
        : null;
      if (leftOwned && leftName) {
        this.pushOwnField(leftOwned, this.many2manyField(leftOwned, leftName, junction, left, right, null));
      }

      const rightName = rightOwned
        ? this.claimName(rightOwned, many2manyFieldName(left.column), `${fallbackStem}_${left.column}_ids`)
        : null;
      if (rightOwned && rightName) {
        this.pushOwnField(
          rightOwned,
          this.many2manyField(rightOwned, rightName, junction, right, left, leftName)
        );
      }

      if (leftOwned && leftName && rightName) {
        this.replaceOwnField(leftOwned, leftName, field =>
          field.kind === 'many2many' ? { ...field, inverseField: rightName } : field
        );
      }
    }
  }

  private many2manyField(
    owner: RawTable,
    name: string,
    junction: JunctionShape,
    source: JunctionSide,
    target: JunctionSide,
    inverseField: string | null
  ): Many2ManyField {
    return {
      name,
      kind: 'many2many',
      table: toRef(owner),
      key: source.fk.referencedColumns[0] ?? 'id',
      target: this.relationTarget(
        target.fk.referencedSchema,
        target.fk.referencedTable,
        target.fk.referencedColumns[0] ?? 'id'
      ),
      junction: {
        table: toRef(junction.table),
        sourceColumn: source.column,
        targetColumn: target.column,
      },
      inverseField,
      inheritedFrom: null,
      system: false,
    };
  }

  private addOne2ManyFields(): void {
    for (const source of this.candidates) {
      const fields = [...(this.ownFields.get(tableKey(source)) ?? [])];
      for (const field of fields) {
        if (field.kind !== 'many2one' || field.target.status !== 'resolved') continue;
        const target = this.tablesByKey.get(tableKey(field.target.table));
        if (!target) continue;

        const preferred = one2manyFieldName(source.name, field.name);
        const name = this.claimName(target, preferred, `${preferred}_reverse`);
        const reverse: One2ManyField = {
          name,
          kind: 'one2many',
          table: toRef(target),
          key: field.target.key,
          target: {
            model: this.modelNameFor(source),
            table: toRef(source),
            key: source.primaryKey.length === 1 ? (source.primaryKey[0] ?? 'id') : 'id',
            status: 'resolved',
          },
          inverseField: field.name,
          inverseColumn: field.column,
          inheritedFrom: null,
          system: false,
        };
        this.pushOwnField(target, reverse);
      }
    }
  }

  private addComputedFields(): void {
    for (const [modelName, fieldNames] of Object.entries(this.computedHints).sort(byKey)) {
      const table = this.candidates.find(candidate => this.modelNameFor(candidate) === modelName);
      if (!table) continue;
      for (const fieldName of fieldNames) {
        const existing = (this.ownFields.get(tableKey(table)) ?? []).some(
          field => field.name === fieldName
        );
        if (existing) {
          this.warn(
            'computed-field-shadowed',
            table,
            `computed field '${fieldName}' is stored; using the column`,
            fieldName
          );
          continue;
        }
        this.pushOwnField(table, {
          name: fieldName,
          kind: 'computed-unknown',
          table: null,
          inheritedFrom: null,
          system: false,
        });
      }
    }
  }

  private pushOwnField(table: RawTable, field: LogicalField): void {
    const key = tableKey(table);
    const fields = this.ownFields.get(key) ?? [];
    fields.push(field);
    this.ownFields.set(key, fields);
  }

  private replaceOwnField(
    table: RawTable,
    name: string,
    update: (field: LogicalField) => LogicalField
  ): void {
    const fields = this.ownFields.get(tableKey(table)) ?? [];
    const index = fields.findIndex(field => field.name === name);
    const current = fields[index];
    if (current) {
      fields[index] = update(current);
    }
  }

  // ----- Model assembly -----

  /**
   * Delegation chain, root first: for each parent in foreign-key order, the
   * parent's own chain followed by the parent itself.
   */
  private delegationChain(table: RawTable, seen = new Set<string>()): DelegationLink[] {
    const links: DelegationLink[] = [];
    for (const edge of this.delegationEdges.get(tableKey(table)) ?? []) {
      const parentKey = tableKey(edge.parent);
      if (seen.has(parentKey)) continue;
      seen.add(parentKey);
      links.push(...this.delegationChain(edge.parent, seen));
      links.push({
        model: this.modelNameFor(edge.parent),
        table: toRef(edge.parent),
        key: edge.parent.primaryKey[0] ?? 'id',
        via: toRef(table),
        viaColumn: edge.column,
      });
    }
    return links;
  }

  /**
   * Ancestors nearest first: direct parents in foreign-key order, then theirs.
   */
  private ancestorsByNearness(table: RawTable): RawTable[] {
    const ordered: RawTable[] = [];
    const seen = new Set<string>([tableKey(table)]);
    let frontier: RawTable[] = [table];
    while (frontier.length > 0) {
      const next: RawTable[] = [];
      for (const node of frontier) {
        for (const edge of this.delegationEdges.get(tableKey(node)) ?? []) {
          const key = tableKey(edge.parent);
          if (seen.has(key)) continue;
          seen.add(key);
          ordered.push(edge.parent);
          next.push(edge.parent);
        }
      }
      frontier = next;
    }
    return ordered;
  }

  private buildModel(table: RawTable): LogicalModel {
    const fields: LogicalField[] = [...(this.ownFields.get(tableKey(table)) ?? [])];
    const names = new Set(fields.map(field => field.name));

    for (const ancestor of this.ancestorsByNearness(table)) {
      const ancestorName = this.modelNameFor(ancestor);
      for (const field of this.ownFields.get(tableKey(ancestor)) ?? []) {
        if (names.has(field.name)) continue;
        names.add(field.name);
        fields.push({ ...field, inheritedFrom: ancestorName });
      }
    }

    const recName =
      this.labelFields.find(name => {
        const field = fields.find(candidate => candidate.name === name);
        return (
          field !== undefined &&
          (field.kind === 'translated-scalar' ||
            (field.kind === 'scalar' && (field.valueType === 'text' || field.valueType === 'json')))
        );
      }) ?? null;

    return deepFreeze({
      name: this.modelNameFor(table),
      table: toRef(table),
      key: table.primaryKey.length === 1 ? (table.primaryKey[0] ?? null) : null,
      fields: fields.map(field => Object.freeze(field)),
      delegation: this.delegationChain(table),
      recName,
      traits: detectTraits(fields),
      indexes: table.indexes,
      readable: table.readable,
      comment: table.comment,
    });
  }
}

function detectTraits(fields: readonly LogicalField[]): ModelTrait[] {
  const byName = new Map(fields.map(field => [field.name, field]));
  const traits: ModelTrait[] = [];

  if (byName.get('company_id')?.kind === 'many2one') {
    traits.push('multi-company');
  }
  const active = byName.get('active');
  if (active?.kind === 'scalar' && active.valueType === 'boolean') {
    traits.push('archivable');
  }
  if (byName.get('parent_id')?.kind === 'many2one' && byName.has('parent_path')) {
    traits.push('hierarchical');
  }
  if (byName.has('create_uid') && byName.has('write_date')) {
    traits.push('audited');
  }
  return traits;
}

function findColumn(table: RawTable, name: string): RawColumn | null {
  return table.columns.find(column => column.name === name) ?? null;
}

function hasTranslationKey(table: RawTable): boolean {
  return (
    findColumn(table, TRANSLATION_RECORD_COLUMN) !== null &&
    findColumn(table, TRANSLATION_LANG_COLUMN) !== null
  );
}

function referencedKey(fk: RawForeignKey): string {
  return `${fk.referencedSchema}.${fk.referencedTable}`;
}

function sourceKey(table: TableRef, column: string): string {
  return `${tableKey(table)}#${column}`;
}

function sameColumns(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((column, index) => b[index] === column);
}

function toRef(table: TableRef): TableRef {
  return Object.freeze({ schema: table.schema, name: table.name });
}

function byKey<T>(a: [string, T], b: [string, T]): number {
  return a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * Reconstruct Odoo's logical schema from raw catalog tables.
 *
 * Output depends only on the set of input tables, not their order. Ambiguous
 * structures never throw; they are recorded on {@link SchemaGraph.warnings}.
 *
 * @param tables - One introspection snapshot
 * @param options - Naming and hint settings
 */
export function inferSchema(tables: readonly RawTable[], options: InferenceOptions = {}): SchemaGraph {
  return new SchemaInferencer(tables, options).run();
}

export default inferSchema;
