import type { TableRef } from './catalog-types.js';
import { tableKey } from './catalog-types.js';
import type {
  InferenceWarning,
  LogicalField,
  LogicalModel,
  RelationTarget,
} from './schema-types.js';

/**
 * Arena of inferred models. Relations between models are name lookups
 * through {@link SchemaGraph.resolve}, so mutually-referencing models never
 * hold each other. Lookups work by technical name or by `schema.table`.
 */
export class SchemaGraph {
  private readonly modelsByName: ReadonlyMap<string, LogicalModel>;
  private readonly modelsByTable: ReadonlyMap<string, LogicalModel>;
  readonly warnings: readonly InferenceWarning[];

  constructor(models: readonly LogicalModel[], warnings: readonly InferenceWarning[] = []) {
    const byName = new Map<string, LogicalModel>();
    const byTable = new Map<string, LogicalModel>();

    for (const model of models) {
      if (byName.has(model.name)) {
        throw new Error(`Schema graph already holds a model named '${model.name}'.`);
      }
      byName.set(model.name, model);
      byTable.set(tableKey(model.table), model);
    }

    this.modelsByName = byName;
    this.modelsByTable = byTable;
    this.warnings = Object.freeze([...warnings]);
    Object.freeze(this);
  }

  get size(): number {
    return this.modelsByName.size;
  }

  /**
   * Retrieve a model by technical name or `schema.table`.
   * @returns The model when present, otherwise null.
   */
  get(identifier: string): LogicalModel | null {
    if (!identifier) {
      return null;
    }
    return this.modelsByName.get(identifier) ?? this.modelsByTable.get(identifier) ?? null;
  }

  has(identifier: string): boolean {
    return this.get(identifier) !== null;
  }

  getByTable(ref: TableRef): LogicalModel | null {
    return this.modelsByTable.get(tableKey(ref)) ?? null;
  }

  /**
   * Follow a relation edge. Unresolved edges, or edges whose target is not in
   * this graph, yield null.
   */
  resolve(target: RelationTarget): LogicalModel | null {
    if (target.status !== 'resolved') {
      return null;
    }
    return this.modelsByName.get(target.model) ?? null;
  }

  /**
   * Models in deterministic (schema, table) order.
   */
  list(): LogicalModel[] {
    return [...this.modelsByName.values()];
  }

  field(modelName: string, fieldName: string): LogicalField | null {
    const model = this.get(modelName);
    return model?.fields.find(field => field.name === fieldName) ?? null;
  }
}

export const findField = (model: LogicalModel, name: string): LogicalField | null =>
  model.fields.find(field => field.name === name) ?? null;

export default SchemaGraph;
