import type { INestApplication } from '@nestjs/common';
import type { Server } from 'http';
import request from 'supertest';
import { createTestApp } from '../helpers/app';
import type {
  EntityItemDto,
  ListEntitiesResponseDto,
} from '../../src/modules/entities/dto/ListEntities.response.dto';

function listIds(body: unknown): unknown[] {
  return (body as ListEntitiesResponseDto).data.map((i) => i['id']);
}

describe('Entities (e2e)', () => {
  let app: INestApplication;
  let http: Server;

  beforeAll(async () => {
    ({ app, http } = await createTestApp());
  });

  afterAll(async () => {
    await app.close();
  });

  describe('person lifecycle', () => {
    it('POST /api/persons creates Ann with id 1', async () => {
      const res = await request(http)
        .post('/api/persons')
        .send({ name: 'Ann', age: 30 })
        .expect(201)
        .expect('Content-Type', /json/);

      const body = res.body as EntityItemDto;
      expect(body['id']).toBe(1);
      expect(body['name']).toBe('Ann');
      expect(body['age']).toBe(30);
      expect(body['addresses']).toEqual([]);
      expect(body['phones']).toEqual([]);
    });

    it('GET /api/persons?search=ann includes Ann', async () => {
      const res = await request(http).get('/api/persons?search=ann').expect(200);
      expect(listIds(res.body)).toEqual([1]);
      expect((res.body as ListEntitiesResponseDto).total).toBe(1);
      expect((res.body as ListEntitiesResponseDto).page).toBe(1);
      expect((res.body as ListEntitiesResponseDto).per_page).toBe(10);
    });

    it('GET /api/persons?age=31 excludes Ann', async () => {
      const res = await request(http).get('/api/persons?age=31').expect(200);
      expect(res.body).toEqual({ data: [], total: 0, page: 1, per_page: 10 });
    });

    it('children show up on the parent and filter it', async () => {
      await request(http)
        .post('/api/addresses')
        .send({ street: '1 Main St', city: 'Paris', person_id: 1 })
        .expect(201);
      const phone = await request(http)
        .post('/api/phones')
        .send({ number: '555-0100', type: 'MOBILE', person_id: 1 })
        .expect(201);
      expect((phone.body as EntityItemDto)['type']).toBe('Mobile');

      const ann = await request(http).get('/api/persons/1').expect(200);
      expect((ann.body as EntityItemDto)['addresses']).toEqual([
        { id: 1, street: '1 Main St', city: 'Paris', person_id: 1 },
      ]);

      const byCity = await request(http)
        .get('/api/persons?addresses__city=paris')
        .expect(200);
      expect(listIds(byCity.body)).toEqual([1]);

      const byType = await request(http)
        .get('/api/persons?phones__type=home')
        .expect(200);
      expect(listIds(byType.body)).toEqual([]);
    });

    it('PATCH updates a subset, PUT replaces', async () => {
      const patched = await request(http)
        .patch('/api/persons/1')
        .send({ age: 31 })
        .expect(200);
      expect(patched.body).toMatchObject({ id: 1, name: 'Ann', age: 31 });

      const put = await request(http)
        .put('/api/persons/1')
        .send({ name: 'Ann B', age: 32 })
        .expect(200);
      expect(put.body).toMatchObject({ id: 1, name: 'Ann B', age: 32 });
    });

    it('DELETE /api/persons/1 cascades, then GET is 404', async () => {
      await request(http)
        .delete('/api/persons/1')
        .expect(200)
        .expect({ deleted: true });

      await request(http)
        .get('/api/persons/1')
        .expect(404)
        .expect({ error: 'Person not found', code: 'ENTITIES_NOT_FOUND' });

      const addresses = await request(http).get('/api/addresses').expect(200);
      expect((addresses.body as ListEntitiesResponseDto).total).toBe(0);
    });
  });

  describe('list parameters', () => {
    beforeAll(async () => {
      for (const [name, age] of [
        ['Cara', 40],
        ['Dan', 22],
        ['Cal', 35],
      ] as const) {
        await request(http).post('/api/persons').send({ name, age }).expect(201);
      }
    });

    it('sorts and pages', async () => {
      const res = await request(http)
        .get('/api/persons?sort=-age&per_page=2&page=1')
        .expect(200);
      expect((res.body as ListEntitiesResponseDto).data.map((p) => p['name'])).toEqual([
        'Cara',
        'Cal',
      ]);
      expect((res.body as ListEntitiesResponseDto).total).toBe(3);
      expect((res.body as ListEntitiesResponseDto).per_page).toBe(2);
    });

    it('ANDs search with field filters', async () => {
      const res = await request(http)
        .get('/api/persons?search=ca&age=35')
        .expect(200);
      expect((res.body as ListEntitiesResponseDto).data.map((p) => p['name'])).toEqual([
        'Cal',
      ]);
    });

    it('skips unknown filters and matches uncoercible values against nothing', async () => {
      const unknown = await request(http).get('/api/persons?height=2').expect(200);
      expect((unknown.body as ListEntitiesResponseDto).total).toBe(3);

      const literal = await request(http).get('/api/persons?age=old').expect(200);
      expect((literal.body as ListEntitiesResponseDto).total).toBe(0);
    });

    it('rejects unknown sort fields with 400', async () => {
      await request(http)
        .get('/api/persons?sort=height')
        .expect(400)
        .expect({
          error: 'Unknown sort field: height',
          code: 'ENTITIES_INVALID_QUERY',
        });
    });

    it('rejects per_page above 100 and page below 1', async () => {
      await request(http)
        .get('/api/persons?per_page=101')
        .expect(400)
        .expect({
          error: 'per_page must be at most 100',
          code: 'ENTITIES_INVALID_QUERY',
        });
      await request(http)
        .get('/api/persons?page=0')
        .expect(400)
        .expect({
          error: 'page must be a positive integer',
          code: 'ENTITIES_INVALID_QUERY',
        });
    });
  });

  describe('without transactions', () => {
    let plain: INestApplication;
    let plainHttp: Server;

    beforeAll(async () => {
      ({ app: plain, http: plainHttp } = await createTestApp({
        transactions: false,
      }));
      await request(plainHttp)
        .post('/api/persons')
        .send({ name: 'Ann', age: 30 })
        .expect(201);
      await request(plainHttp)
        .post('/api/addresses')
        .send({ street: '1 Main St', city: 'Paris', person_id: 1 })
        .expect(201);
    });

    afterAll(async () => {
      await plain.close();
    });

    it('refuses to cascade and keeps the children', async () => {
      await request(plainHttp)
        .delete('/api/persons/1')
        .expect(409)
        .expect({
          error: 'Person 1 still has 1 related addresses',
          code: 'ENTITIES_DELETE_RESTRICTED',
        });

      const res = await request(plainHttp).get('/api/persons/1').expect(200);
      expect((res.body as EntityItemDto)['addresses']).toHaveLength(1);
    });
  });
});
