import { EntityRegistry, type EntityDefinition } from '../../lib/query';

export const PERSON = 'person' as const;
export const ADDRESS = 'address' as const;
export const PHONE = 'phone' as const;

/** Allowed phone types as stored (input is matched case-insensitively). */
export const PHONE_TYPES = ['Home', 'Work', 'Mobile'] as const;

export const PERSON_ENTITY: EntityDefinition = {
  key: PERSON,
  label: 'Person',
  collection: 'persons',
  fields: [
    { name: 'id', column: '_id', type: 'integer', generated: 'id' },
    { name: 'name', column: 'name', type: 'text', writable: true },
    { name: 'age', column: 'age', type: 'integer', writable: true },
    {
      name: 'created_at',
      column: 'createdAt',
      type: 'timestamp',
      generated: 'now',
    },
  ],
  relationships: [
    {
      name: 'addresses',
      target: ADDRESS,
      localColumn: '_id',
      foreignColumn: 'personId',
      cardinality: 'many',
    },
    {
      name: 'phones',
      target: PHONE,
      localColumn: '_id',
      foreignColumn: 'personId',
      cardinality: 'many',
    },
  ],
};

export const ADDRESS_ENTITY: EntityDefinition = {
  key: ADDRESS,
  label: 'Address',
  collection: 'addresses',
  fields: [
    { name: 'id', column: '_id', type: 'integer', generated: 'id' },
    { name: 'street', column: 'street', type: 'text', writable: true },
    { name: 'city', column: 'city', type: 'text', writable: true },
    { name: 'person_id', column: 'personId', type: 'integer', writable: true },
  ],
  relationships: [
    {
      name: 'person',
      target: PERSON,
      localColumn: 'personId',
      foreignColumn: '_id',
      cardinality: 'one',
    },
  ],
};

export const PHONE_ENTITY: EntityDefinition = {
  key: PHONE,
  label: 'Phone',
  collection: 'phones',
  fields: [
    { name: 'id', column: '_id', type: 'integer', generated: 'id' },
    { name: 'number', column: 'number', type: 'text', writable: true },
    { name: 'type', column: 'type', type: 'text', writable: true },
    { name: 'person_id', column: 'personId', type: 'integer', writable: true },
  ],
  relationships: [
    {
      name: 'person',
      target: PERSON,
      localColumn: 'personId',
      foreignColumn: '_id',
      cardinality: 'one',
    },
  ],
};

export function createEntityRegistry(): EntityRegistry {
  return new EntityRegistry([PERSON_ENTITY, ADDRESS_ENTITY, PHONE_ENTITY]);
}
