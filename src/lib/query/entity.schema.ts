import { AppError } from '../errors/AppError';
import { UnknownEntityError } from '../errors/EntitiesError';
import type {
  EntityDefinition,
  FieldDescriptor,
  RelationshipDescriptor,
} from './types';

/**
 * Static lookup tables for one entity, built once from its definition.
 * Unknown names resolve to `undefined`; callers decide whether that is an error.
 */
export class EntitySchema {
  public readonly key: string;
  public readonly label: string;
  public readonly collection: string;
  public readonly fields: ReadonlyArray<FieldDescriptor>;
  public readonly relationships: ReadonlyArray<RelationshipDescriptor>;

  private readonly fieldsByName: ReadonlyMap<string, FieldDescriptor>;
  private readonly relationshipsByName: ReadonlyMap<
    string,
    RelationshipDescriptor
  >;

  constructor(def: EntityDefinition) {
    this.key = def.key;
    this.label = def.label;
    this.collection = def.collection;
    this.fields = def.fields;
    this.relationships = def.relationships ?? [];
    this.fieldsByName = new Map(def.fields.map((f) => [f.name, f]));
    this.relationshipsByName = new Map(
      this.relationships.map((r) => [r.name, r]),
    );
    if (this.fieldsByName.size !== def.fields.length) {
      throw new AppError(
        `Duplicate field name in entity ${def.key}`,
        'SCHEMA_DUPLICATE_FIELD',
      );
    }
  }

  public field(name: string): FieldDescriptor | undefined {
    return this.fieldsByName.get(name);
  }

  public relationship(name: string): RelationshipDescriptor | undefined {
    return this.relationshipsByName.get(name);
  }

  /** Field whose stored column is `column` (e.g. the `_id` backing `id`). */
  public fieldByColumn(column: string): FieldDescriptor | undefined {
    return this.fields.find((f) => f.column === column);
  }

  public textFields(): FieldDescriptor[] {
    return this.fields.filter((f) => f.type === 'text');
  }

  public writableFields(): FieldDescriptor[] {
    return this.fields.filter((f) => !!f.writable);
  }
}

export class EntityRegistry {
  private readonly schemas: ReadonlyMap<string, EntitySchema>;

  constructor(defs: ReadonlyArray<EntityDefinition>) {
    const schemas = new Map<string, EntitySchema>();
    for (const def of defs) schemas.set(def.key, new EntitySchema(def));

    // Relationship targets must be registered too.
    for (const schema of schemas.values()) {
      for (const rel of schema.relationships) {
        if (!schemas.has(rel.target)) {
          throw new AppError(
            `Entity ${schema.key}: relationship ${rel.name} targets unknown entity ${rel.target}`,
            'SCHEMA_UNKNOWN_TARGET',
          );
        }
      }
    }
    this.schemas = schemas;
  }

  public get(key: string): EntitySchema | undefined {
    return this.schemas.get(key);
  }

  public require(key: string): EntitySchema {
    const schema = this.schemas.get(key);
    if (!schema) throw new UnknownEntityError(key);
    return schema;
  }

  public keys(): string[] {
    return Array.from(this.schemas.keys());
  }
}
