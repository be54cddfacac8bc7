import { MongoServerError } from 'mongodb';
import { MongoActionError } from '../MongoActionError';

describe('MongoActionError', () => {
  it('wraps driver errors with their code', () => {
    const driver = new MongoServerError({ message: 'E11000 duplicate key', code: 11000 });

    const err = MongoActionError.wrap(driver, {
      operation: 'insertOne',
      dbName: 'people',
      collection: 'persons',
    });

    expect(err.name).toBe('MongoActionError');
    expect(err.code).toBe('MONGO_ACTION_FAILED');
    expect(err.message).toBe('E11000 duplicate key');
    expect(err.summary()).toBe(
      'Mongo action failed: op=insertOne db=people coll=persons driverCode=11000',
    );
    expect(err.toJSON().cause).toEqual({
      name: 'MongoServerError',
      message: 'E11000 duplicate key',
    });
  });

  it('returns an existing MongoActionError unchanged', () => {
    const original = new MongoActionError('x', { operation: 'ping' });
    expect(MongoActionError.wrap(original, { operation: 'connect' })).toBe(original);
  });

  it('falls back to a generic message for non-errors', () => {
    const err = MongoActionError.wrap('boom', { operation: 'connect' });
    expect(err.message).toBe('Mongo action failed');
    expect(err.summary()).toBe('Mongo action failed: op=connect');
  });
});
