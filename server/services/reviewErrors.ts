import type { WorkRecordKey } from "../models/WorkRecord";

export type ReviewErrorCode =
  | "NOT_FOUND"
  | "VALIDATION_ERROR"
  | "CONCURRENCY_CONFLICT";

export abstract class ReviewError extends Error {
  abstract readonly code: ReviewErrorCode;
}

export class NotFoundError extends ReviewError {
  readonly code = "NOT_FOUND";
  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export class InvalidInputError extends ReviewError {
  readonly code = "VALIDATION_ERROR";
  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

export class ConcurrencyConflictError extends ReviewError {
  readonly code = "CONCURRENCY_CONFLICT";
  constructor(
    message: string,
    readonly key: WorkRecordKey,
    readonly attempts: number,
  ) {
    super(message);
    this.name = "ConcurrencyConflictError";
  }
}

export const isReviewError = (error: unknown): error is ReviewError =>
  error instanceof ReviewError;
