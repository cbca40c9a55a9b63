import type { FastifyPluginAsync } from "fastify";
import { z } from "zod";

import {
  getMinimumReviewCount,
  getReviewPolicy,
  type ReviewPolicy,
} from "../config/reviewPolicy";
import { identityOf, requireIdentity } from "../middleware/auth";
import { answerSchema, jsonValueSchema } from "../models/WorkRecord";
import {
  addReviewer,
  assignReviewer,
  removeReviewer,
} from "../services/reviewAssignment";
import { isReviewError, type ReviewErrorCode } from "../services/reviewErrors";
import {
  getAnswerList,
  getReviewsForReviewer,
  getStudentWork,
  submitReview,
  submitWork,
} from "../services/reviewLifecycle";
import { summarizeReviewProgress } from "../services/reviewProgress";

export interface ReviewRoutesOptions {
  policy?: ReviewPolicy;
}

const STATUS_BY_CODE: Record<ReviewErrorCode, number> = {
  NOT_FOUND: 404,
  VALIDATION_ERROR: 400,
  CONCURRENCY_CONFLICT: 409,
};

const submitWorkBodySchema = z.object({
  answers: z.array(answerSchema),
});

const submitReviewBodySchema = z.object({
  review: jsonValueSchema,
  isDraft: z.boolean(),
});

type UnitParams = { unitId: string };
type StudentParams = UnitParams & { studentId: string };
type ReviewerParams = StudentParams & { reviewerId: string };

const reviewRoutes: FastifyPluginAsync<ReviewRoutesOptions> = async (
  fastify,
  opts,
) => {
  const policy = opts.policy ?? getReviewPolicy();

  fastify.addHook("preHandler", requireIdentity);

  fastify.setErrorHandler((error, request, reply) => {
    if (isReviewError(error)) {
      return reply
        .status(STATUS_BY_CODE[error.code])
        .send({ code: error.code, message: error.message });
    }
    const statusCode = error.statusCode ?? 500;
    if (statusCode < 500) {
      return reply
        .status(statusCode)
        .send({ code: error.code ?? "BAD_REQUEST", message: error.message });
    }
    request.log.error({ err: error }, "[REVIEW] Request failed");
    return reply
      .status(500)
      .send({ code: "INTERNAL_ERROR", message: "Internal server error" });
  });

  fastify.post<{ Params: UnitParams }>(
    "/api/units/:unitId/submission",
    async (request, reply) => {
      const { unitId } = request.params;
      const parsed = submitWorkBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({
          code: "VALIDATION_ERROR",
          message: "answers must be a list of { index, value } entries",
        });
      }

      const { id } = identityOf(request);
      await submitWork(id, unitId, parsed.data.answers, { logger: request.log });
      return reply
        .status(201)
        .send({ studentId: id, unitId, answerCount: parsed.data.answers.length });
    },
  );

  fastify.get<{ Params: UnitParams }>(
    "/api/units/:unitId/submission",
    async (request, reply) => {
      const { unitId } = request.params;
      const { id } = identityOf(request);
      const work = await getStudentWork(id, unitId);
      if (!work) {
        return reply
          .status(404)
          .send({ code: "NOT_FOUND", message: "No submission for this unit" });
      }

      const finished = Object.values(work.reviewers).filter(
        (assignment) => !assignment.isDraft,
      );
      return reply.send({
        studentId: id,
        unitId,
        answers: getAnswerList(work.submission),
        reviewerCount: Object.keys(work.reviewers).length,
        reviews: finished.map((assignment) => assignment.review),
      });
    },
  );

  fastify.post<{ Params: UnitParams }>(
    "/api/units/:unitId/reviews/assign",
    async (request, reply) => {
      const { unitId } = request.params;
      const { id } = identityOf(request);
      const studentId = await assignReviewer(id, unitId, { logger: request.log });
      return reply.send({ studentId });
    },
  );

  fastify.get<{ Params: UnitParams }>(
    "/api/units/:unitId/reviews",
    async (request, reply) => {
      const { unitId } = request.params;
      const { id } = identityOf(request);
      const reviews = await getReviewsForReviewer(id, unitId);
      return reply.send({
        reviews,
        progress: summarizeReviewProgress(
          reviews,
          getMinimumReviewCount(unitId, policy),
        ),
      });
    },
  );

  fastify.put<{ Params: StudentParams }>(
    "/api/units/:unitId/reviews/:studentId",
    async (request, reply) => {
      const { unitId, studentId } = request.params;
      const parsed = submitReviewBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({
          code: "VALIDATION_ERROR",
          message: "Body must contain review and a boolean isDraft",
        });
      }

      const { id } = identityOf(request);
      await submitReview(
        studentId,
        unitId,
        id,
        parsed.data.review,
        parsed.data.isDraft,
        { logger: request.log },
      );
      return reply.send({ studentId, unitId, isDraft: parsed.data.isDraft });
    },
  );

  fastify.put<{ Params: ReviewerParams }>(
    "/api/units/:unitId/submissions/:studentId/reviewers/:reviewerId",
    async (request, reply) => {
      const { unitId, studentId, reviewerId } = request.params;
      await addReviewer(studentId, unitId, reviewerId, {
        logger: request.log,
      });
      return reply.status(204).send();
    },
  );

  fastify.delete<{ Params: ReviewerParams }>(
    "/api/units/:unitId/submissions/:studentId/reviewers/:reviewerId",
    async (request, reply) => {
      const { unitId, studentId, reviewerId } = request.params;
      await removeReviewer(studentId, unitId, reviewerId, {
        logger: request.log,
      });
      return reply.status(204).send();
    },
  );
};

export default reviewRoutes;
