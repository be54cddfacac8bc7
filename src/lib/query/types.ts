/* ===========================================================
   Query translation: public types
   Storage-agnostic; modules/entities compiles plans to MongoDB.
   =========================================================== */

/** Semantic type of a field; drives value coercion and the predicate shape. */
export type FieldType = 'text' | 'integer' | 'float' | 'boolean' | 'timestamp';

export interface FieldDescriptor {
  /** Public name (query string + JSON body/response). */
  readonly name: string;
  /** Key in the stored document. */
  readonly column: string;
  readonly type: FieldType;
  /** Accepted from create/update payloads. */
  readonly writable?: boolean;
  /**
   * Filled by the service on insert:
   * - 'id': next value of the collection counter
   * - 'now': insertion time
   */
  readonly generated?: 'id' | 'now';
}

/**
 * One-hop link to another entity.
 * - many: parent side; children carry `foreignColumn` = parent `localColumn`
 * - one: child side; `localColumn` holds the parent's `foreignColumn`
 */
export interface RelationshipDescriptor {
  readonly name: string;
  /** Entity key of the related side. */
  readonly target: string;
  readonly localColumn: string;
  readonly foreignColumn: string;
  readonly cardinality: 'many' | 'one';
}

export interface EntityDefinition {
  /** Registry key, e.g. "person". */
  readonly key: string;
  /** Human label used in messages, e.g. "Person". */
  readonly label: string;
  readonly collection: string;
  readonly fields: ReadonlyArray<FieldDescriptor>;
  readonly relationships?: ReadonlyArray<RelationshipDescriptor>;
}

/* -------------------------------
   Plan
   ------------------------------- */

/** Value a filter compares against after coercion (strings on fallback). */
export type FilterValue = string | number | boolean | Date;

/** Case-insensitive substring match; `value` is literal text. */
export interface ContainsPredicate {
  readonly kind: 'contains';
  readonly column: string;
  readonly value: string;
}

export interface EqualsPredicate {
  readonly kind: 'equals';
  readonly column: string;
  readonly value: FilterValue;
}

/** Logical OR (free-text search). */
export interface AnyOfPredicate {
  readonly kind: 'anyOf';
  readonly predicates: ReadonlyArray<Predicate>;
}

/** At least one record across `relationship` satisfies every predicate in `where`. */
export interface RelatedPredicate {
  readonly kind: 'related';
  readonly relationship: RelationshipDescriptor;
  readonly where: ReadonlyArray<Predicate>;
}

export type Predicate =
  | ContainsPredicate
  | EqualsPredicate
  | AnyOfPredicate
  | RelatedPredicate;

export interface SortKey {
  readonly field: string;
  readonly column: string;
  readonly direction: 'asc' | 'desc';
}

export interface QueryPlan {
  readonly entity: string;
  /** ANDed. Empty means "match everything". */
  readonly where: ReadonlyArray<Predicate>;
  readonly sort: ReadonlyArray<SortKey>;
  readonly page: number;
  readonly perPage: number;
  readonly offset: number;
}

/** Query-string parameters after normalization (one string per name). */
export type QueryParams = Readonly<Record<string, string>>;

export interface TranslateOptions {
  readonly defaultPerPage: number;
  readonly maxPerPage: number;
}
