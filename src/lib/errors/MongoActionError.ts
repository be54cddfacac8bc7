import { AppError } from './AppError';

/** Storage operations MongodbService reports on. Open-ended for callers. */
export type MongoOperation =
  | 'connect'
  | 'ping'
  | 'collection'
  | 'withSession'
  | 'withTransaction'
  | 'findOneAndUpdate'
  | (string & {});

export interface MongoErrorContext {
  readonly operation: MongoOperation;
  readonly dbName?: string;
  readonly collection?: string;
  /** Small, non-sensitive preview of the arguments (never whole documents). */
  readonly argsPreview?: Readonly<Record<string, unknown>>;
  /** MongoServerError.code and friends. */
  readonly driverCode?: number | string;
}

/**
 * A failed MongoDB action with structured context. Never shown to clients:
 * HttpErrorFilter logs `summary()` and answers a generic 500.
 */
export class MongoActionError extends AppError {
  public readonly context: Readonly<MongoErrorContext>;

  constructor(message: string, context: MongoErrorContext, cause?: Error) {
    super(message, 'MONGO_ACTION_FAILED', cause);
    this.context = Object.freeze({ ...context });
  }

  /** One-line form for logs. */
  public summary(): string {
    const parts: string[] = [`op=${this.context.operation}`];
    if (this.context.dbName) parts.push(`db=${this.context.dbName}`);
    if (this.context.collection) parts.push(`coll=${this.context.collection}`);
    if (this.context.driverCode !== undefined) {
      parts.push(`driverCode=${String(this.context.driverCode)}`);
    }
    return `Mongo action failed: ${parts.join(' ')}`;
  }

  public toJSON(): {
    name: string;
    message: string;
    context: MongoErrorContext;
    cause?: { name: string; message: string };
  } {
    const c = this.cause instanceof Error ? this.cause : undefined;
    return {
      name: this.name,
      message: this.message,
      context: this.context,
      cause: c ? { name: c.name, message: c.message } : undefined,
    };
  }

  /** Wrap anything thrown by the driver; an existing MongoActionError is returned as is. */
  public static wrap(
    err: unknown,
    context: MongoErrorContext,
    fallbackMessage = 'Mongo action failed',
  ): MongoActionError {
    if (err instanceof MongoActionError) return err;
    const { message, driverCode } = driverDetails(err);
    return new MongoActionError(
      message ?? fallbackMessage,
      { ...context, driverCode },
      err instanceof Error ? err : undefined,
    );
  }
}

function driverDetails(err: unknown): {
  message?: string;
  driverCode?: number | string;
} {
  if (!(err instanceof Error)) return {};
  const code: unknown = 'code' in err ? err.code : undefined;
  return {
    message: err.message.length > 0 ? err.message : undefined,
    driverCode:
      typeof code === 'number' || typeof code === 'string' ? code : undefined,
  };
}
