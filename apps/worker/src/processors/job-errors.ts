import { UnrecoverableError } from "bullmq";
import { AppError } from "@groundwrite/errors";

/**
 * 4xx application errors fail the same way on every attempt, so they skip
 * BullMQ's remaining retries. Everything else is rethrown for backoff.
 */
export function toJobError(err: unknown): unknown {
  if (AppError.isAppError(err) && err.isClientError) {
    return new UnrecoverableError(`${err.code}: ${err.message}`);
  }
  return err;
}
