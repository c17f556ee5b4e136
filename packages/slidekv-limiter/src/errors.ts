/** Invalid rule set construction. Raised at setup time, never per request. */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues?: unknown,
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export type StoreOperation = "get" | "put";

/** A store read or write failed. The limiter applies no default verdict. */
export class StoreError extends Error {
  constructor(
    public readonly operation: StoreOperation,
    public readonly key: string,
    cause: unknown,
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Store ${operation} failed for ${key}: ${detail}`, { cause });
    this.name = "StoreError";
  }
}
