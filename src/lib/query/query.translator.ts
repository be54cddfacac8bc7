import { InvalidQueryError } from '../errors/EntitiesError';
import { coerceValue } from './coerce';
import type { EntityRegistry, EntitySchema } from './entity.schema';
import type {
  FieldDescriptor,
  Predicate,
  QueryParams,
  QueryPlan,
  RelationshipDescriptor,
  SortKey,
  TranslateOptions,
} from './types';

/** Control parameters; never treated as filters. */
export const RESERVED_PARAMS: ReadonlySet<string> = new Set([
  'page',
  'per_page',
  'sort',
  'search',
]);

/** Separates relationship and field in a filter name: `addresses__city`. */
export const RELATIONSHIP_SEPARATOR = '__';

/**
 * Flatten an Express/qs query object into one string per name.
 * Repeated keys keep their first string value; nested objects are dropped.
 */
export function normalizeQueryParams(raw: unknown): Record<string, string> {
  const out: Record<string, string> = {};
  if (raw === null || typeof raw !== 'object') return out;
  for (const [k, v] of Object.entries(raw)) {
    if (typeof v === 'string') {
      out[k] = v;
    } else if (Array.isArray(v)) {
      const first: unknown = v.find((x: unknown) => typeof x === 'string');
      if (typeof first === 'string') out[k] = first;
    }
  }
  return out;
}

/**
 * Translate query-string parameters into a plan against `schema`.
 *
 * Filters are fail-soft: unknown fields or relationships are skipped and values
 * that do not coerce are compared as literal strings. Sort and pagination are
 * strict and throw InvalidQueryError.
 */
export function translateQuery(
  schema: EntitySchema,
  registry: EntityRegistry,
  params: QueryParams,
  options: TranslateOptions,
): QueryPlan {
  const where: Predicate[] = [];

  const search = params['search'];
  if (search !== undefined && search.length > 0) {
    const searchPredicate = buildSearch(schema, search);
    if (searchPredicate) where.push(searchPredicate);
  }

  where.push(...buildFilters(schema, registry, params));

  const { page, perPage } = parsePagination(params, options);
  return {
    entity: schema.key,
    where,
    sort: parseSort(schema, params['sort']),
    page,
    perPage,
    offset: (page - 1) * perPage,
  };
}

/* -------------------------------
   Filters
   ------------------------------- */

export function buildFilters(
  schema: EntitySchema,
  registry: EntityRegistry,
  params: QueryParams,
): Predicate[] {
  const direct: Predicate[] = [];
  // Grouped so one related record has to satisfy all of a relationship's filters.
  const related = new Map<
    string,
    { relationship: RelationshipDescriptor; where: Predicate[] }
  >();

  for (const [name, value] of Object.entries(params)) {
    if (RESERVED_PARAMS.has(name)) continue;

    const sep = name.indexOf(RELATIONSHIP_SEPARATOR);
    if (sep === -1) {
      const field = schema.field(name);
      if (field) direct.push(fieldPredicate(field, value));
      continue;
    }

    const relName = name.slice(0, sep);
    const fieldName = name.slice(sep + RELATIONSHIP_SEPARATOR.length);
    const relationship = schema.relationship(relName);
    if (!relationship) continue;
    const field = registry.get(relationship.target)?.field(fieldName);
    if (!field) continue;

    const group = related.get(relName) ?? { relationship, where: [] };
    group.where.push(fieldPredicate(field, value));
    related.set(relName, group);
  }

  const out: Predicate[] = [...direct];
  for (const group of related.values()) {
    out.push({
      kind: 'related',
      relationship: group.relationship,
      where: group.where,
    });
  }
  return out;
}

export function fieldPredicate(
  field: FieldDescriptor,
  raw: string,
): Predicate {
  if (field.type === 'text') {
    return { kind: 'contains', column: field.column, value: raw };
  }
  return {
    kind: 'equals',
    column: field.column,
    value: coerceValue(raw, field.type),
  };
}

/** OR of substring matches over every text field; undefined when there are none. */
export function buildSearch(
  schema: EntitySchema,
  term: string,
): Predicate | undefined {
  const fields = schema.textFields();
  if (fields.length === 0) return undefined;
  return {
    kind: 'anyOf',
    predicates: fields.map((f) => ({
      kind: 'contains' as const,
      column: f.column,
      value: term,
    })),
  };
}

/* -------------------------------
   Sort
   ------------------------------- */

/** "-age,name" -> age desc, name asc, then id asc as tie-breaker. */
export function parseSort(
  schema: EntitySchema,
  raw: string | undefined,
): SortKey[] {
  const keys: SortKey[] = [];
  const parts = (raw ?? '')
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);

  for (const part of parts) {
    const desc = part.startsWith('-');
    const name = desc ? part.slice(1) : part;
    const field = schema.field(name);
    if (!field) {
      throw new InvalidQueryError(`Unknown sort field: ${name}`, 'sort');
    }
    if (keys.some((k) => k.field === field.name)) continue;
    keys.push({
      field: field.name,
      column: field.column,
      direction: desc ? 'desc' : 'asc',
    });
  }

  const id = schema.field('id');
  if (id && !keys.some((k) => k.field === id.name)) {
    keys.push({ field: id.name, column: id.column, direction: 'asc' });
  }
  return keys;
}

/* -------------------------------
   Pagination
   ------------------------------- */

export function parsePagination(
  params: QueryParams,
  options: TranslateOptions,
): { page: number; perPage: number } {
  const page = parsePositiveInt(params['page'], 1, 'page');
  const perPage = parsePositiveInt(
    params['per_page'],
    options.defaultPerPage,
    'per_page',
  );
  if (perPage > options.maxPerPage) {
    throw new InvalidQueryError(
      `per_page must be at most ${options.maxPerPage}`,
      'per_page',
    );
  }
  return { page, perPage };
}

function parsePositiveInt(
  raw: string | undefined,
  fallback: number,
  param: string,
): number {
  if (raw === undefined) return fallback;
  const s = raw.trim();
  const n = /^\d+$/.test(s) ? Number.parseInt(s, 10) : Number.NaN;
  if (!Number.isSafeInteger(n) || n < 1) {
    throw new InvalidQueryError(
      `${param} must be a positive integer`,
      param,
    );
  }
  return n;
}
