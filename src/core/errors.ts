export class ManifestIdError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ManifestIdError";
  }
}

export class ContentStoreError extends Error {
  constructor(
    message: string,
    readonly manifestId: string | null = null,
    readonly relativePath: string | null = null
  ) {
    super(message);
    this.name = "ContentStoreError";
  }
}

export class ManifestRecordError extends Error {
  constructor(
    message: string,
    readonly path: string
  ) {
    super(message);
    this.name = "ManifestRecordError";
  }
}

export class PoolConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PoolConfigError";
  }
}

export class OperationCancelledError extends Error {
  constructor(operation: string) {
    super(`${operation} was cancelled`);
    this.name = "OperationCancelledError";
  }
}

export function throwIfAborted(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) throw new OperationCancelledError(operation);
}

export function isNotFoundError(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
