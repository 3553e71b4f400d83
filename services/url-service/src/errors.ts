export type StoreErrorKind =
  | "generation_failed"
  | "allocation_exhausted"
  | "not_found"
  | "gone"
  | "backend_unavailable"
  | "storage_error";

/**
 * Base class for everything the storage layer throws on purpose.
 * `statusCode` is what the HTTP error handler answers with.
 */
export class StoreError extends Error {
  readonly kind: StoreErrorKind;
  readonly statusCode: number;

  constructor(kind: StoreErrorKind, statusCode: number, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
    this.statusCode = statusCode;
  }
}

export class GenerationError extends StoreError {
  constructor(options?: ErrorOptions) {
    super("generation_failed", 500, "random source failed while generating a short code", options);
  }
}

export class AllocationExhaustedError extends StoreError {
  readonly attempts: number;

  constructor(attempts: number) {
    super("allocation_exhausted", 500, `no free short code after ${attempts} attempts`);
    this.attempts = attempts;
  }
}

export class NotFoundError extends StoreError {
  readonly code: string;

  constructor(code: string) {
    super("not_found", 404, `short code ${code} not found`);
    this.code = code;
  }
}

export class GoneError extends StoreError {
  readonly code: string;

  constructor(code: string) {
    super("gone", 410, `short code ${code} was deleted`);
    this.code = code;
  }
}

export class BackendUnavailableError extends StoreError {
  constructor(message: string, options?: ErrorOptions) {
    super("backend_unavailable", 503, message, options);
  }
}

export class StorageOperationError extends StoreError {
  constructor(message: string, options?: ErrorOptions) {
    super("storage_error", 500, message, options);
  }
}
