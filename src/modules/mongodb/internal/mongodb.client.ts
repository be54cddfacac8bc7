import { MongoClient, type MongoClientOptions } from 'mongodb';

/**
 * Lazily connected MongoClient owned by one MongodbService instance.
 * - Concurrent first callers share a single connect attempt.
 * - A failed connect resets state so the next call retries.
 */
export class LazyMongoClient {
  private client?: MongoClient;
  private connecting?: Promise<MongoClient>;

  constructor(
    private readonly uri: string,
    private readonly options: MongoClientOptions = { ignoreUndefined: true },
  ) {}

  /** Get (or create) a connected MongoClient instance. */
  public async getClient(): Promise<MongoClient> {
    const existing: MongoClient | undefined = this.client;
    if (existing) return existing;

    const inflight: Promise<MongoClient> | undefined = this.connecting;
    if (inflight) return inflight;

    const connectPromise: Promise<MongoClient> = (async () => {
      const created = new MongoClient(this.uri, this.options);
      await created.connect();
      this.client = created;
      this.connecting = undefined;
      return created;
    })();

    this.connecting = connectPromise;

    try {
      return await connectPromise;
    } catch (err) {
      // Reset so a subsequent call can retry.
      this.connecting = undefined;
      this.client = undefined;

      if (err instanceof Error) {
        throw err;
      }
      throw new Error('Failed to connect to MongoDB');
    }
  }

  public isConnected(): boolean {
    return this.client !== undefined;
  }

  /** Close client if connected (idempotent). */
  public async close(): Promise<void> {
    const current: MongoClient | undefined = this.client;
    if (!current) return;
    this.client = undefined;
    this.connecting = undefined;
    await current.close();
  }
}
