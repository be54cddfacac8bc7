import type { Document, Filter } from 'mongodb';
import type {
  Predicate,
  RelationshipDescriptor,
  SortKey,
} from '../../../lib/query';
import { escapeRegExp } from '../../../lib/utils/strings';

/**
 * Resolves a relationship predicate to the values of `relationship.foreignColumn`
 * held by matching related records.
 */
export type RelatedResolver = (
  relationship: RelationshipDescriptor,
  filter: Filter<Document>,
) => Promise<unknown[]>;

/** AND of `where`; `{}` when empty. */
export async function compileWhere(
  where: ReadonlyArray<Predicate>,
  resolveRelated: RelatedResolver,
): Promise<Filter<Document>> {
  const parts: Filter<Document>[] = [];
  for (const p of where) {
    parts.push(await compilePredicate(p, resolveRelated));
  }
  if (parts.length === 0) return {};
  if (parts.length === 1) return parts[0];
  return { $and: parts };
}

export async function compilePredicate(
  p: Predicate,
  resolveRelated: RelatedResolver,
): Promise<Filter<Document>> {
  switch (p.kind) {
    case 'contains':
      return {
        [p.column]: { $regex: escapeRegExp(p.value), $options: 'i' },
      };
    case 'equals':
      return { [p.column]: p.value };
    case 'anyOf': {
      const alternatives: Filter<Document>[] = [];
      for (const inner of p.predicates) {
        alternatives.push(await compilePredicate(inner, resolveRelated));
      }
      return { $or: alternatives };
    }
    case 'related': {
      const childFilter = await compileWhere(p.where, resolveRelated);
      const values = await resolveRelated(p.relationship, childFilter);
      return { [p.relationship.localColumn]: { $in: values } };
    }
  }
}

/** Ordered driver sort spec; key order is the sort priority. */
export function toMongoSort(
  keys: ReadonlyArray<SortKey>,
): Record<string, 1 | -1> {
  const out: Record<string, 1 | -1> = {};
  for (const k of keys) out[k.column] = k.direction === 'desc' ? -1 : 1;
  return out;
}
