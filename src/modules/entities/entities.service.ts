import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import type { Document, Filter } from 'mongodb';
import {
  EntityRegistry,
  normalizeQueryParams,
  translateQuery,
  type EntitySchema,
  type QueryPlan,
  type RelationshipDescriptor,
} from '../../lib/query';
import {
  DeleteRestrictedError,
  EmptyUpdateError,
  EntityNotFoundError,
  MissingReferenceError,
} from '../../lib/errors/EntitiesError';
import { MongodbService } from '../mongodb/mongodb.service';
import type { MongoScope } from '../mongodb/internal';
import { entitiesConfig, type OnDeletePolicy } from './entities.config';
import { compileWhere, toMongoSort } from './internal/mongo.filter';
import type {
  EntityItemDto,
  ListEntitiesResponseDto,
} from './dto/ListEntities.response.dto';
import type { DeleteEntityResponseDto } from './dto/DeleteEntity.response.dto';

/**
 * CRUD + list for every registered entity. All entity-specific knowledge comes
 * from the EntitySchema; nothing here names Person, Address or Phone.
 */
@Injectable()
export class EntitiesService implements OnModuleInit {
  private readonly logger = new Logger(EntitiesService.name);

  constructor(
    private readonly mongo: MongodbService,
    private readonly registry: EntityRegistry,
    @Inject(entitiesConfig.KEY)
    private readonly cfg: ConfigType<typeof entitiesConfig>,
  ) {}

  onModuleInit(): void {
    if (this.cfg.onDelete === 'cascade' && !this.mongo.transactionsEnabled) {
      this.logger.warn(
        'ENTITIES_ON_DELETE=cascade needs MONGO_TRANSACTIONS; deleting a record with children answers 409',
      );
    }
  }

  /**
   * Cascades span several writes, so they only run inside a transaction.
   * Without one, parents with children are refused as under `restrict`.
   */
  get deletePolicy(): OnDeletePolicy {
    return this.mongo.transactionsEnabled ? this.cfg.onDelete : 'restrict';
  }

  /* ---------------
     Public methods
     --------------- */

  /** Translate the raw query string and run it. */
  async list(entity: string, rawQuery: unknown): Promise<ListEntitiesResponseDto> {
    const schema = this.registry.require(entity);
    const plan = this.plan(schema, rawQuery);

    return this.mongo.withSession(async (scope) => {
      const filter = await compileWhere(plan.where, (rel, childFilter) =>
        this.resolveRelated(scope, rel, childFilter),
      );
      const col = scope.collection(schema.collection);
      const total = await col.countDocuments(filter, {
        session: scope.session,
      });
      const docs = await col
        .find(filter, { session: scope.session })
        .sort(toMongoSort(plan.sort))
        .skip(plan.offset)
        .limit(plan.perPage)
        .toArray();

      return {
        data: await this.toItems(scope, schema, docs),
        total,
        page: plan.page,
        per_page: plan.perPage,
      };
    });
  }

  /** Exposed for logging/tests: the plan `list` would execute. */
  plan(schema: EntitySchema, rawQuery: unknown): QueryPlan {
    const plan = translateQuery(
      schema,
      this.registry,
      normalizeQueryParams(rawQuery),
      this.cfg,
    );
    if (this.cfg.logQueryPlans) {
      this.logger.debug(`plan ${schema.key}: ${JSON.stringify(plan)}`);
    }
    return plan;
  }

  async get(entity: string, id: number): Promise<EntityItemDto> {
    const schema = this.registry.require(entity);
    return this.mongo.withSession(async (scope) => {
      const doc = await this.findById(scope, schema, id);
      const [item] = await this.toItems(scope, schema, [doc]);
      return item;
    });
  }

  async create(entity: string, input: object): Promise<EntityItemDto> {
    const schema = this.registry.require(entity);
    const values = this.pickWritable(schema, input);

    return this.mongo.withSession(
      async (scope) => {
        await this.ensureReferences(scope, schema, values);

        const doc: Document = {};
        for (const f of schema.fields) {
          if (f.generated === 'id') {
            doc[f.column] = await this.mongo.nextSequence(
              scope,
              schema.collection,
            );
          } else if (f.generated === 'now') {
            doc[f.column] = new Date();
          }
        }
        Object.assign(doc, values);

        await scope
          .collection(schema.collection)
          .insertOne(doc, { session: scope.session });
        this.logger.log(`created ${schema.key} ${String(doc['_id'])}`);

        const [item] = await this.toItems(scope, schema, [doc]);
        return item;
      },
      { transaction: true },
    );
  }

  /**
   * Write the given fields. PUT and PATCH differ only in which DTO validated
   * `input`; null/undefined values are treated as absent.
   */
  async update(
    entity: string,
    id: number,
    input: object,
  ): Promise<EntityItemDto> {
    const schema = this.registry.require(entity);
    const changes = this.pickWritable(schema, input);
    if (Object.keys(changes).length === 0) {
      throw new EmptyUpdateError(schema.label);
    }

    return this.mongo.withSession(
      async (scope) => {
        const before = await this.findById(scope, schema, id);
        await this.ensureReferences(scope, schema, changes);

        const col = scope.collection(schema.collection);
        await col.updateOne(
          { _id: before['_id'] },
          { $set: changes },
          { session: scope.session },
        );
        const after = await this.findById(scope, schema, id);
        const [item] = await this.toItems(scope, schema, [after]);
        return item;
      },
      { transaction: true },
    );
  }

  async remove(entity: string, id: number): Promise<DeleteEntityResponseDto> {
    const schema = this.registry.require(entity);

    return this.mongo.withSession(
      async (scope) => {
        const doc = await this.findById(scope, schema, id);
        const dependents = await this.countDependents(scope, schema, doc);

        if (this.deletePolicy === 'restrict') {
          const blocking = dependents.find((d) => d.count > 0);
          if (blocking) {
            throw new DeleteRestrictedError(
              schema.label,
              id,
              blocking.relationship.name,
              blocking.count,
            );
          }
        }

        for (const { relationship, count } of dependents) {
          if (count === 0) continue;
          const target = this.registry.require(relationship.target);
          const res = await scope
            .collection(target.collection)
            .deleteMany(
              { [relationship.foreignColumn]: doc[relationship.localColumn] },
              { session: scope.session },
            );
          this.logger.log(
            `onDelete=cascade removed ${res.deletedCount} ${target.key} of ${schema.key} ${id}`,
          );
        }

        await scope
          .collection(schema.collection)
          .deleteOne({ _id: doc['_id'] }, { session: scope.session });
        this.logger.log(`deleted ${schema.key} ${id}`);
        return { deleted: true as const };
      },
      { transaction: true },
    );
  }

  /* ------------------------
     Helpers
     ------------------------ */

  private async findById(
    scope: MongoScope,
    schema: EntitySchema,
    id: number,
  ): Promise<Document> {
    const idField = schema.field('id');
    const column = idField ? idField.column : '_id';
    const doc = await scope
      .collection(schema.collection)
      .findOne({ [column]: id }, { session: scope.session });
    if (!doc) throw new EntityNotFoundError(schema.label, id);
    return doc;
  }

  /** Values of `foreignColumn` on related records matching `filter`. */
  private async resolveRelated(
    scope: MongoScope,
    rel: RelationshipDescriptor,
    filter: Filter<Document>,
  ): Promise<unknown[]> {
    const target = this.registry.require(rel.target);
    const values: unknown[] = await scope
      .collection(target.collection)
      .distinct(rel.foreignColumn, filter, { session: scope.session });
    return values;
  }

  /** Writable public fields of `input`, keyed by stored column. */
  private pickWritable(
    schema: EntitySchema,
    input: object,
  ): Record<string, unknown> {
    const given = new Map<string, unknown>(Object.entries(input));
    const out: Record<string, unknown> = {};
    for (const f of schema.writableFields()) {
      const v = given.get(f.name);
      if (v !== undefined && v !== null) out[f.column] = v;
    }
    return out;
  }

  /** Every `one` relationship value present in `values` must resolve. */
  private async ensureReferences(
    scope: MongoScope,
    schema: EntitySchema,
    values: Record<string, unknown>,
  ): Promise<void> {
    for (const rel of schema.relationships) {
      if (rel.cardinality !== 'one') continue;
      const value = values[rel.localColumn];
      if (value === undefined) continue;

      const target = this.registry.require(rel.target);
      const count = await scope
        .collection(target.collection)
        .countDocuments(
          { [rel.foreignColumn]: value },
          { limit: 1, session: scope.session },
        );
      if (count === 0) {
        const field = schema.fieldByColumn(rel.localColumn);
        throw new MissingReferenceError(
          field ? field.name : rel.localColumn,
          target.label,
          value,
        );
      }
    }
  }

  private async countDependents(
    scope: MongoScope,
    schema: EntitySchema,
    doc: Document,
  ): Promise<Array<{ relationship: RelationshipDescriptor; count: number }>> {
    const out: Array<{ relationship: RelationshipDescriptor; count: number }> =
      [];
    for (const rel of schema.relationships) {
      if (rel.cardinality !== 'many') continue;
      const target = this.registry.require(rel.target);
      const count = await scope
        .collection(target.collection)
        .countDocuments(
          { [rel.foreignColumn]: doc[rel.localColumn] },
          { session: scope.session },
        );
      out.push({ relationship: rel, count });
    }
    return out;
  }

  /**
   * Map stored docs to response items and embed `many` relationships
   * (one query per relationship for the whole page).
   */
  private async toItems(
    scope: MongoScope,
    schema: EntitySchema,
    docs: Document[],
  ): Promise<EntityItemDto[]> {
    const items = docs.map((d) => toItem(schema, d));

    for (const rel of schema.relationships) {
      if (rel.cardinality !== 'many') continue;
      const target = this.registry.require(rel.target);
      const keys = docs.map((d) => d[rel.localColumn]);
      const children =
        keys.length === 0
          ? []
          : await scope
              .collection(target.collection)
              .find(
                { [rel.foreignColumn]: { $in: keys } },
                { session: scope.session },
              )
              .sort({ _id: 1 })
              .toArray();

      docs.forEach((parent, i) => {
        items[i][rel.name] = children
          .filter((c) => c[rel.foreignColumn] === parent[rel.localColumn])
          .map((c) => toItem(target, c));
      });
    }
    return items;
  }
}

/** Stored doc -> public field names; Dates become ISO strings, absent values null. */
function toItem(schema: EntitySchema, doc: Document): EntityItemDto {
  const out: EntityItemDto = {};
  for (const f of schema.fields) {
    const v: unknown = doc[f.column];
    out[f.name] = v instanceof Date ? v.toISOString() : v ?? null;
  }
  return out;
}
