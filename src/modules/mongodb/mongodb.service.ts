import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
} from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { MongoError, type Db, type Document, type MongoClient } from 'mongodb';
import { mongoConfig, maskMongoUri } from '../../infra/mongo/mongo.config';
import { MongoActionError } from '../../lib/errors/MongoActionError';
import { isNonEmptyString } from '../../lib/utils/strings';
import {
  COUNTERS_COLLECTION,
  LazyMongoClient,
  type CounterDoc,
  type MongoScope,
  type SessionOptions,
} from './internal';

@Injectable()
export class MongodbService implements OnModuleDestroy {
  private readonly logger = new Logger(MongodbService.name);

  constructor(
    @Inject(mongoConfig.KEY)
    private readonly cfg: ConfigType<typeof mongoConfig>,
    private readonly lazy: LazyMongoClient,
  ) {}

  /** Whether `{ transaction: true }` work actually runs in a transaction. */
  public get transactionsEnabled(): boolean {
    return this.cfg.transactions;
  }

  /** Underlying client; connects on first use. */
  public async getClient(): Promise<MongoClient> {
    const first = !this.lazy.isConnected();
    try {
      const client = await this.lazy.getClient();
      if (first) this.logger.log(`Connected to ${maskMongoUri(this.cfg.uri)}`);
      return client;
    } catch (err) {
      throw MongoActionError.wrap(err, {
        operation: 'connect',
        dbName: this.cfg.dbName,
      });
    }
  }

  /**
   * Returns a connected native driver Db handle.
   * Defaults to the configured database when not provided.
   */
  public async getDb(dbName?: string): Promise<Db> {
    const client = await this.getClient();
    return client.db(dbName ?? this.cfg.dbName);
  }

  /**
   * Run `fn` with a fresh session. The session is ended on every exit path.
   *
   * With `transaction: true` and MONGO_TRANSACTIONS enabled, `fn` runs inside
   * `withTransaction`: any error aborts every write made through the scope.
   * Driver errors are wrapped in MongoActionError; domain errors pass through.
   */
  public async withSession<T>(
    fn: (scope: MongoScope) => Promise<T>,
    opts: SessionOptions = {},
  ): Promise<T> {
    const client = await this.getClient();
    const db = client.db(this.cfg.dbName);
    const session = client.startSession();
    const scope: MongoScope = {
      session,
      collection: <D extends Document = Document>(name: string) => {
        if (!isNonEmptyString(name)) {
          throw new MongoActionError(
            'Collection name must be a non-empty string',
            { operation: 'collection', dbName: this.cfg.dbName },
          );
        }
        return db.collection<D>(name);
      },
    };

    try {
      if (opts.transaction && this.cfg.transactions) {
        // The driver may re-run the callback on transient errors; keep the last result.
        const results: T[] = [];
        await session.withTransaction(async () => {
          results.push(await fn(scope));
        });
        if (results.length === 0) {
          throw new MongoActionError('Transaction finished without a result', {
            operation: 'withTransaction',
            dbName: this.cfg.dbName,
          });
        }
        return results[results.length - 1];
      }
      return await fn(scope);
    } catch (err) {
      if (err instanceof MongoError) {
        throw MongoActionError.wrap(err, {
          operation: opts.transaction ? 'withTransaction' : 'withSession',
          dbName: this.cfg.dbName,
        });
      }
      throw err;
    } finally {
      await session.endSession();
    }
  }

  /** Next integer id for `sequence` (atomic upsert + $inc on the counters collection). */
  public async nextSequence(scope: MongoScope, sequence: string): Promise<number> {
    const counters = scope.collection<CounterDoc>(COUNTERS_COLLECTION);
    const doc = await counters.findOneAndUpdate(
      { _id: sequence },
      { $inc: { seq: 1 } },
      { upsert: true, returnDocument: 'after', session: scope.session },
    );
    if (!doc) {
      throw new MongoActionError('Counter upsert returned no document', {
        operation: 'findOneAndUpdate',
        dbName: this.cfg.dbName,
        collection: COUNTERS_COLLECTION,
        argsPreview: { sequence },
      });
    }
    return doc.seq;
  }

  /** Round-trip `{ ping: 1 }` to the server. */
  public async ping(): Promise<boolean> {
    try {
      const db = await this.getDb();
      const res = await db.command({ ping: 1 });
      return res['ok'] === 1;
    } catch (err) {
      throw MongoActionError.wrap(err, {
        operation: 'ping',
        dbName: this.cfg.dbName,
      });
    }
  }

  /** Graceful shutdown for local runs/tests. */
  public async onModuleDestroy(): Promise<void> {
    await this.lazy.close();
  }
}
