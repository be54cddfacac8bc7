/** Base for domain errors; `code` is the stable machine-readable id sent to clients. */
export class AppError extends Error {
  public readonly code: string;
  public readonly cause?: unknown;

  constructor(message: string, code = 'APP_ERROR', cause?: unknown) {
    super(message);
    // Subclasses report their own class name in logs and stack traces.
    this.name = new.target.name;
    this.code = code;
    this.cause = cause;
  }
}
