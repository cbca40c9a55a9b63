import { isReviewContentEmpty, type JsonValue } from "../models/WorkRecord";

export const ReviewProgressState = {
  NOT_STARTED: 0,
  IN_PROGRESS: 1,
  COMPLETED: 2,
} as const;

export type ReviewProgressState =
  (typeof ReviewProgressState)[keyof typeof ReviewProgressState];

export interface ReviewProgressInput {
  review: JsonValue | null;
  isDraft: boolean;
}

export interface ReviewProgressSummary {
  assignedCount: number;
  completedCount: number;
  minimumRequired: number;
  hasUnstarted: boolean;
  hasCompletedAll: boolean;
  hasCompletedEnough: boolean;
  state: ReviewProgressState;
}

export function countCompletedReviews(reviews: ReviewProgressInput[]): number {
  return reviews.filter((review) => !review.isDraft).length;
}

export function hasUnstartedReviews(reviews: ReviewProgressInput[]): boolean {
  return reviews.some((review) => isReviewContentEmpty(review.review));
}

export function hasCompletedAllAssignedReviews(
  reviews: ReviewProgressInput[],
): boolean {
  return reviews.every(
    (review) => !review.isDraft && !isReviewContentEmpty(review.review),
  );
}

export function hasCompletedEnoughReviews(
  reviews: ReviewProgressInput[],
  minimumRequired: number,
): boolean {
  return countCompletedReviews(reviews) >= minimumRequired;
}

export function getReviewProgress(
  reviews: ReviewProgressInput[],
  minimumRequired: number,
): ReviewProgressState {
  if (hasCompletedEnoughReviews(reviews, minimumRequired)) {
    return ReviewProgressState.COMPLETED;
  }
  if (countCompletedReviews(reviews) > 0) {
    return ReviewProgressState.IN_PROGRESS;
  }
  return ReviewProgressState.NOT_STARTED;
}

export function summarizeReviewProgress(
  reviews: ReviewProgressInput[],
  minimumRequired: number,
): ReviewProgressSummary {
  return {
    assignedCount: reviews.length,
    completedCount: countCompletedReviews(reviews),
    minimumRequired,
    hasUnstarted: hasUnstartedReviews(reviews),
    hasCompletedAll: hasCompletedAllAssignedReviews(reviews),
    hasCompletedEnough: hasCompletedEnoughReviews(reviews, minimumRequired),
    state: getReviewProgress(reviews, minimumRequired),
  };
}
