export type ErrorKind =
  | "ValidationError"
  | "InvalidStateError"
  | "NotFoundError"
  | "TransientComputeError";

export abstract class TrackingError extends Error {
  abstract readonly code: string;
  abstract readonly kind: ErrorKind;
}

export class ValidationError extends TrackingError {
  readonly code = "VALIDATION_ERROR";
  readonly kind = "ValidationError";
  readonly field: string | null;

  constructor(message: string, field: string | null = null) {
    super(message);
    this.name = "ValidationError";
    this.field = field;
  }
}

export class StaleTimestampError extends ValidationError {
  constructor(message: string) {
    super(message, "timestamp");
    this.name = "StaleTimestampError";
  }
}

export class InvalidStateError extends TrackingError {
  readonly code = "INVALID_STATE";
  readonly kind = "InvalidStateError";

  constructor(message: string) {
    super(message);
    this.name = "InvalidStateError";
  }
}

export class NotFoundError extends TrackingError {
  readonly code = "NOT_FOUND";
  readonly kind = "NotFoundError";

  constructor(entity: string, id: string) {
    super(`${entity} ${id} not found`);
    this.name = "NotFoundError";
  }
}

export class TransientComputeError extends TrackingError {
  readonly code = "TRANSIENT_COMPUTE";
  readonly kind = "TransientComputeError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransientComputeError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
