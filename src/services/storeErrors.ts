import { logError } from "../utils/log";

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class RecordNotFoundError extends Error {
  constructor(entity: string, id: number) {
    super(`${entity} ${id} not found.`);
    this.name = "RecordNotFoundError";
  }
}

export class DeleteNotConfirmedError extends Error {
  constructor(readonly expectedPhrase: string) {
    super(`Confirmation text must be exactly '${expectedPhrase}'.`);
    this.name = "DeleteNotConfirmedError";
  }
}

export class StoreError extends Error {
  constructor(
    readonly operation: string,
    message: string,
  ) {
    super(`Database error during ${operation}: ${message}`);
    this.name = "StoreError";
  }
}

/**
 * Run one statement and translate driver failures into a StoreError.
 * Errors raised by the stores themselves pass through untouched.
 */
export function runStatement<T>(operation: string, statement: () => T): T {
  try {
    return statement();
  } catch (error) {
    if (
      error instanceof ValidationError ||
      error instanceof RecordNotFoundError ||
      error instanceof DeleteNotConfirmedError ||
      error instanceof StoreError
    ) {
      throw error;
    }

    const message = error instanceof Error ? error.message : String(error);
    logError("store_error", { operation, message });
    throw new StoreError(operation, message);
  }
}
