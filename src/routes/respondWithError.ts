import { Response } from "express";

import {
  DeleteNotConfirmedError,
  RecordNotFoundError,
  StoreError,
  ValidationError,
} from "../services/storeErrors";

function statusFor(error: unknown): number {
  if (error instanceof ValidationError) return 400;
  if (error instanceof DeleteNotConfirmedError) return 400;
  if (error instanceof RecordNotFoundError) return 404;
  if (error instanceof StoreError) return 500;
  return 500;
}

export function respondWithError(res: Response, error: unknown): void {
  const body: { error: { message: string; expected_confirmation?: string } } = {
    error: {
      message:
        error instanceof Error ? error.message : "Unexpected server error",
    },
  };

  if (error instanceof DeleteNotConfirmedError) {
    body.error.expected_confirmation = error.expectedPhrase;
  }

  res.status(statusFor(error)).json(body);
}
