import {
  getWorkRecord,
  listUnitWorkRecords,
  replaceWorkRecord,
  updateWorkRecord,
} from "../db/workRecords";
import {
  isReviewContentEmpty,
  type Answer,
  type JsonValue,
  type WorkRecord,
} from "../models/WorkRecord";
import type { ReviewOperationOptions } from "./reviewAssignment";
import { InvalidInputError, NotFoundError } from "./reviewErrors";

export interface ReviewView {
  studentId: string;
  submission: Answer[];
  review: JsonValue | null;
  isDraft: boolean;
  dateAdded: number;
}

function assertContiguous(answers: Answer[]) {
  answers.forEach((answer, position) => {
    if (answer.index !== position) {
      throw new InvalidInputError(
        `Answer at position ${position} has index ${answer.index}`,
      );
    }
  });
}

/** Answer values in submission order. */
export function getAnswerList(submission: Answer[]): JsonValue[] {
  assertContiguous(submission);
  return submission.map((answer) => answer.value);
}

export async function getStudentWork(
  studentId: string,
  unitId: string,
): Promise<WorkRecord | null> {
  return getWorkRecord({ studentId, unitId });
}

/** Puts a fresh submission into the review pool, replacing any earlier one. */
export async function submitWork(
  studentId: string,
  unitId: string,
  answers: Answer[],
  options: ReviewOperationOptions = {},
): Promise<void> {
  assertContiguous(answers);
  await replaceWorkRecord({ studentId, unitId }, answers, {}, options.now);
  options.logger?.info(
    { studentId, unitId, answers: answers.length },
    "[REVIEW] Work submitted",
  );
}

export async function submitReview(
  studentId: string,
  unitId: string,
  reviewerId: string,
  review: JsonValue | null,
  isDraft: boolean,
  options: ReviewOperationOptions = {},
): Promise<WorkRecord> {
  if (!isDraft && isReviewContentEmpty(review)) {
    throw new InvalidInputError("A review cannot be finalized without content");
  }

  const { record } = await updateWorkRecord(
    { studentId, unitId },
    (current) => {
      if (!Object.hasOwn(current.reviewers, reviewerId)) {
        throw new NotFoundError(
          `Reviewer ${reviewerId} is not assigned to student ${studentId} in unit ${unitId}`,
        );
      }
      const assignment = current.reviewers[reviewerId];
      return {
        ...current.reviewers,
        [reviewerId]: { ...assignment, review, isDraft },
      };
    },
    options,
  );
  options.logger?.info(
    { studentId, unitId, reviewerId, isDraft },
    "[REVIEW] Review saved",
  );
  return record;
}

/** The reviewer's assignments in a unit, oldest assignment first. */
export async function getReviewsForReviewer(
  reviewerId: string,
  unitId: string,
): Promise<ReviewView[]> {
  const records = await listUnitWorkRecords(unitId);
  const views: ReviewView[] = [];
  for (const record of records) {
    if (!Object.hasOwn(record.reviewers, reviewerId)) continue;
    const assignment = record.reviewers[reviewerId];
    views.push({
      studentId: record.key.studentId,
      submission: record.submission,
      review: assignment.review,
      isDraft: assignment.isDraft,
      dateAdded: assignment.dateAdded,
    });
  }
  return views.sort((a, b) => a.dateAdded - b.dateAdded);
}
