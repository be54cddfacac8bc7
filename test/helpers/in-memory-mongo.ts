import type { Document, MongoClient } from 'mongodb';
import { LazyMongoClient } from '../../src/modules/mongodb/internal';

// ---------- In-memory typed fakes of the driver surface the app uses ----------

type SortSpec = Record<string, 1 | -1>;

function clone(doc: Document): Document {
  return { ...doc };
}

function sameValue(a: unknown, b: unknown): boolean {
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
  return a === b;
}

function isOperatorObject(cond: unknown): cond is Record<string, unknown> {
  if (typeof cond !== 'object' || cond === null) return false;
  if (cond instanceof Date || Array.isArray(cond)) return false;
  const keys = Object.keys(cond);
  return keys.length > 0 && keys.every((k) => k.startsWith('$'));
}

function matchValue(actual: unknown, cond: unknown): boolean {
  if (!isOperatorObject(cond)) return sameValue(actual, cond);
  return Object.entries(cond).every(([op, arg]) => {
    switch (op) {
      case '$regex': {
        const flags = typeof cond.$options === 'string' ? cond.$options : '';
        return (
          typeof actual === 'string' &&
          new RegExp(String(arg), flags).test(actual)
        );
      }
      case '$options':
        return true;
      case '$in':
        return Array.isArray(arg) && arg.some((v) => sameValue(actual, v));
      default:
        throw new Error(`InMemoryCollection: unsupported operator ${op}`);
    }
  });
}

export function matches(doc: Document, filter: Document): boolean {
  return Object.entries(filter).every(([key, cond]) => {
    if (key === '$and' && Array.isArray(cond)) {
      return cond.every((f: Document) => matches(doc, f));
    }
    if (key === '$or' && Array.isArray(cond)) {
      return cond.some((f: Document) => matches(doc, f));
    }
    return matchValue(doc[key], cond);
  });
}

function compareValues(a: unknown, b: unknown): number {
  if (sameValue(a, b)) return 0;
  if (a === undefined || a === null) return -1;
  if (b === undefined || b === null) return 1;
  const x = a instanceof Date ? a.getTime() : a;
  const y = b instanceof Date ? b.getTime() : b;
  if (typeof x === 'number' && typeof y === 'number') return x - y;
  const sx = String(x);
  const sy = String(y);
  if (sx === sy) return 0;
  return sx < sy ? -1 : 1;
}

export class InMemoryCursor {
  private sortSpec: SortSpec = {};
  private skipN = 0;
  private limitN = 0;

  constructor(private readonly source: () => Document[]) {}

  public sort(spec: SortSpec): this {
    this.sortSpec = spec;
    return this;
  }

  public skip(n: number): this {
    this.skipN = n;
    return this;
  }

  public limit(n: number): this {
    this.limitN = n;
    return this;
  }

  // Like the server: sort, then skip, then limit, whatever the call order.
  public async toArray(): Promise<Document[]> {
    await Promise.resolve();
    const keys = Object.entries(this.sortSpec);
    const docs = this.source().sort((a, b) => {
      for (const [key, dir] of keys) {
        const c = compareValues(a[key], b[key]);
        if (c !== 0) return c * dir;
      }
      return 0;
    });
    const end = this.limitN > 0 ? this.skipN + this.limitN : undefined;
    return docs.slice(this.skipN, end).map(clone);
  }
}

export class InMemoryCollection {
  private docs: Document[] = [];

  constructor(public readonly name: string) {}

  public all(): Document[] {
    return this.docs.map(clone);
  }

  public replaceAll(docs: Document[]): void {
    this.docs = docs.map(clone);
  }

  public find(filter: Document = {}): InMemoryCursor {
    return new InMemoryCursor(() =>
      this.docs.filter((d) => matches(d, filter)),
    );
  }

  public async findOne(filter: Document): Promise<Document | null> {
    await Promise.resolve();
    const doc = this.docs.find((d) => matches(d, filter));
    return doc ? clone(doc) : null;
  }

  public async countDocuments(
    filter: Document = {},
    options?: { limit?: number },
  ): Promise<number> {
    await Promise.resolve();
    const n = this.docs.filter((d) => matches(d, filter)).length;
    return options?.limit ? Math.min(n, options.limit) : n;
  }

  public async distinct(key: string, filter: Document = {}): Promise<unknown[]> {
    await Promise.resolve();
    const out: unknown[] = [];
    for (const d of this.docs) {
      if (!matches(d, filter)) continue;
      const v: unknown = d[key];
      if (v !== undefined && !out.some((o) => sameValue(o, v))) out.push(v);
    }
    return out;
  }

  public async insertOne(
    doc: Document,
  ): Promise<{ acknowledged: true; insertedId: unknown }> {
    await Promise.resolve();
    const id: unknown = doc['_id'];
    if (id === undefined) throw new Error('InMemoryCollection: _id required');
    if (this.docs.some((d) => sameValue(d['_id'], id))) {
      throw new Error(`E11000 duplicate key error collection: ${this.name}`);
    }
    this.docs.push(clone(doc));
    return { acknowledged: true, insertedId: id };
  }

  public async updateOne(
    filter: Document,
    update: { $set?: Document },
  ): Promise<{ acknowledged: true; matchedCount: number; modifiedCount: number }> {
    await Promise.resolve();
    const idx = this.docs.findIndex((d) => matches(d, filter));
    if (idx < 0) return { acknowledged: true, matchedCount: 0, modifiedCount: 0 };
    this.docs[idx] = { ...this.docs[idx], ...update.$set };
    return { acknowledged: true, matchedCount: 1, modifiedCount: 1 };
  }

  public async findOneAndUpdate(
    filter: Document,
    update: { $inc?: Record<string, number> },
    options?: { upsert?: boolean; returnDocument?: 'before' | 'after' },
  ): Promise<Document | null> {
    await Promise.resolve();
    let idx = this.docs.findIndex((d) => matches(d, filter));
    if (idx < 0) {
      if (!options?.upsert) return null;
      this.docs.push(clone(filter));
      idx = this.docs.length - 1;
    }
    const before = clone(this.docs[idx]);
    const next = clone(before);
    for (const [k, by] of Object.entries(update.$inc ?? {})) {
      const cur: unknown = next[k];
      next[k] = (typeof cur === 'number' ? cur : 0) + by;
    }
    this.docs[idx] = next;
    return options?.returnDocument === 'after' ? clone(next) : before;
  }

  public async deleteOne(
    filter: Document,
  ): Promise<{ acknowledged: true; deletedCount: number }> {
    await Promise.resolve();
    const idx = this.docs.findIndex((d) => matches(d, filter));
    if (idx < 0) return { acknowledged: true, deletedCount: 0 };
    this.docs.splice(idx, 1);
    return { acknowledged: true, deletedCount: 1 };
  }

  public async deleteMany(
    filter: Document,
  ): Promise<{ acknowledged: true; deletedCount: number }> {
    await Promise.resolve();
    const before = this.docs.length;
    this.docs = this.docs.filter((d) => !matches(d, filter));
    return { acknowledged: true, deletedCount: before - this.docs.length };
  }
}

export class InMemoryDb {
  private readonly map = new Map<string, InMemoryCollection>();
  public pingOk = true;

  public collection(name: string): InMemoryCollection {
    let coll = this.map.get(name);
    if (!coll) {
      coll = new InMemoryCollection(name);
      this.map.set(name, coll);
    }
    return coll;
  }

  public snapshot(): Map<string, Document[]> {
    return new Map([...this.map].map(([name, coll]) => [name, coll.all()]));
  }

  /** Puts every collection back as it was; collections created since end up empty. */
  public restore(saved: Map<string, Document[]>): void {
    for (const [name, coll] of this.map) coll.replaceAll(saved.get(name) ?? []);
  }

  public async command(cmd: Document): Promise<Document> {
    await Promise.resolve();
    if ('ping' in cmd) return { ok: this.pingOk ? 1 : 0 };
    throw new Error(`InMemoryDb: unsupported command ${Object.keys(cmd)[0]}`);
  }
}

/** Transactions roll the whole database back when the callback throws. */
export class FakeSession {
  public ended = false;
  public transactions = 0;
  public aborted = 0;

  constructor(private readonly db: InMemoryDb) {}

  public async withTransaction(fn: () => Promise<void>): Promise<void> {
    this.transactions += 1;
    const saved = this.db.snapshot();
    try {
      await fn();
    } catch (err) {
      this.db.restore(saved);
      this.aborted += 1;
      throw err;
    }
  }

  public async endSession(): Promise<void> {
    await Promise.resolve();
    this.ended = true;
  }
}

export class InMemoryMongoClient {
  public readonly sessions: FakeSession[] = [];
  public closed = false;

  constructor(public readonly database: InMemoryDb = new InMemoryDb()) {}

  public db(): InMemoryDb {
    return this.database;
  }

  public startSession(): FakeSession {
    const session = new FakeSession(this.database);
    this.sessions.push(session);
    return session;
  }

  public async close(): Promise<void> {
    await Promise.resolve();
    this.closed = true;
  }
}

/**
 * Drop-in for the LazyMongoClient provider: MongodbService runs unchanged
 * against the in-memory client.
 */
export class InMemoryLazyClient extends LazyMongoClient {
  constructor(public readonly fake: InMemoryMongoClient = new InMemoryMongoClient()) {
    super('mongodb://in-memory');
  }

  public override async getClient(): Promise<MongoClient> {
    await Promise.resolve();
    return this.fake as unknown as MongoClient;
  }

  public override isConnected(): boolean {
    return true;
  }

  public override async close(): Promise<void> {
    await this.fake.close();
  }
}
