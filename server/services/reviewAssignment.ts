import { env } from "../config/env";
import {
  listUnitWorkRecords,
  updateWorkRecord,
  type UpdateWorkRecordOptions,
} from "../db/workRecords";
import type { WorkRecord } from "../models/WorkRecord";
import { InvalidInputError, NotFoundError } from "./reviewErrors";

export type ReviewOperationOptions = UpdateWorkRecordOptions;

const toEpochSeconds = (date: Date) => Math.floor(date.getTime() / 1000);

const hasReviewer = (record: WorkRecord, reviewerId: string) =>
  Object.hasOwn(record.reviewers, reviewerId);

// Reviewer ids are keys of the stored reviewer map.
function assertStorableReviewerId(reviewerId: string) {
  if (reviewerId === "__proto__") {
    throw new InvalidInputError(`"${reviewerId}" cannot be used as a reviewer id`);
  }
}

/**
 * Picks the submission with the fewest reviewers among those the reviewer may
 * still take on. Ties go to the earliest record in scan order.
 */
export function pickLeastReviewed(
  records: WorkRecord[],
  reviewerId: string,
  unitId: string,
): string | null {
  let chosen: WorkRecord | null = null;
  let chosenLoad = Number.POSITIVE_INFINITY;

  for (const record of records) {
    if (record.key.unitId !== unitId) continue;
    if (hasReviewer(record, reviewerId)) continue;
    if (record.key.studentId === reviewerId) continue;

    const load = Object.keys(record.reviewers).length;
    if (load < chosenLoad) {
      chosen = record;
      chosenLoad = load;
    }
  }

  return chosen ? chosen.key.studentId : null;
}

export async function assignNextSubmission(
  reviewerId: string,
  unitId: string,
): Promise<string | null> {
  const records = await listUnitWorkRecords(unitId);
  return pickLeastReviewed(records, reviewerId, unitId);
}

export async function addReviewer(
  studentId: string,
  unitId: string,
  reviewerId: string,
  options: ReviewOperationOptions = {},
): Promise<WorkRecord> {
  assertStorableReviewerId(reviewerId);
  if (studentId === reviewerId) {
    throw new InvalidInputError(
      `Student ${studentId} cannot review their own submission`,
    );
  }
  const now = options.now ?? (() => new Date());
  const { record } = await updateWorkRecord(
    { studentId, unitId },
    (current) => ({
      ...current.reviewers,
      [reviewerId]: {
        review: null,
        isDraft: true,
        dateAdded: toEpochSeconds(now()),
      },
    }),
    { ...options, now },
  );
  options.logger?.info(
    { studentId, unitId, reviewerId },
    "[REVIEW] Reviewer added",
  );
  return record;
}

export async function removeReviewer(
  studentId: string,
  unitId: string,
  reviewerId: string,
  options: ReviewOperationOptions = {},
): Promise<WorkRecord> {
  const { record } = await updateWorkRecord(
    { studentId, unitId },
    (current) => {
      if (!hasReviewer(current, reviewerId)) {
        throw new NotFoundError(
          `Reviewer ${reviewerId} is not assigned to student ${studentId} in unit ${unitId}`,
        );
      }
      const { [reviewerId]: _removed, ...rest } = current.reviewers;
      return rest;
    },
    options,
  );
  options.logger?.info(
    { studentId, unitId, reviewerId },
    "[REVIEW] Reviewer removed",
  );
  return record;
}

/**
 * Picks the next submission for a reviewer and records the assignment. When
 * a concurrent request has already put this reviewer on the picked record,
 * the pick is redone against a fresh scan.
 */
export async function assignReviewer(
  reviewerId: string,
  unitId: string,
  options: ReviewOperationOptions = {},
): Promise<string | null> {
  assertStorableReviewerId(reviewerId);
  const maxAttempts = options.maxAttempts ?? env.REVIEW_WRITE_MAX_ATTEMPTS;
  const now = options.now ?? (() => new Date());

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    const studentId = await assignNextSubmission(reviewerId, unitId);
    if (!studentId) {
      options.logger?.info(
        { reviewerId, unitId },
        "[REVIEW] No submission available for reviewer",
      );
      return null;
    }

    const { changed } = await updateWorkRecord(
      { studentId, unitId },
      (current) =>
        hasReviewer(current, reviewerId)
          ? null
          : {
              ...current.reviewers,
              [reviewerId]: {
                review: null,
                isDraft: true,
                dateAdded: toEpochSeconds(now()),
              },
            },
      { ...options, now },
    );
    if (changed) {
      options.logger?.info(
        { studentId, unitId, reviewerId },
        "[REVIEW] Reviewer assigned to submission",
      );
      return studentId;
    }
  }

  options.logger?.warn(
    { reviewerId, unitId, attempts: maxAttempts },
    "[REVIEW] Every pick was already taken by a concurrent assignment",
  );
  return null;
}
