export * from './types';
export { EntitySchema, EntityRegistry } from './entity.schema';
export { coerceValue, parseTimestamp } from './coerce';
export {
  RESERVED_PARAMS,
  RELATIONSHIP_SEPARATOR,
  normalizeQueryParams,
  translateQuery,
  buildFilters,
  buildSearch,
  fieldPredicate,
  parseSort,
  parsePagination,
} from './query.translator';
