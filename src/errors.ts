/** A fare observation that cannot be stored. The scan skips it and moves on. */
export class ValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid fare observation: ${issues.join("; ")}`);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

/** The database could not be read or written. Surfaced to the scan, which skips the route. */
export class StorageError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`Storage error during ${operation}: ${errorMessage(cause)}`, { cause });
    this.name = "StorageError";
    this.operation = operation;
  }
}

/** A notification sink failed to deliver. The deal stays unclaimed and is retried next cycle. */
export class DeliveryError extends Error {
  readonly sink: string;

  constructor(sink: string, message: string, cause?: unknown) {
    super(`${sink} delivery failed: ${message}`, { cause });
    this.name = "DeliveryError";
    this.sink = sink;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
