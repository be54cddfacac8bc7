import type { ClientSession, Collection, Document } from 'mongodb';

/** Collection holding per-collection id sequences. */
export const COUNTERS_COLLECTION = 'counters' as const;

export interface CounterDoc {
  _id: string;
  seq: number;
}

/**
 * Per-request storage handle. Every driver call made through a scope passes
 * `{ session }` so the work shares one session (and transaction, when enabled).
 */
export interface MongoScope {
  readonly session?: ClientSession;
  collection<T extends Document = Document>(name: string): Collection<T>;
}

export interface SessionOptions {
  /** Wrap the callback in a transaction when the deployment allows it. */
  readonly transaction?: boolean;
}
