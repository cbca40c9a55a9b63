import { z } from "zod";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

export const WORK_RECORD_COLLECTION = "student_work";
export const CURRENT_SCHEMA_VERSION = 2;

export interface WorkRecordKey {
  studentId: string;
  unitId: string;
}

export interface Answer {
  index: number;
  value: JsonValue;
}

export interface ReviewAssignment {
  review: JsonValue | null;
  isDraft: boolean;
  /** Whole UTC seconds since epoch, set once when the reviewer is assigned. */
  dateAdded: number;
}

export type ReviewerMap = Record<string, ReviewAssignment>;

export interface WorkRecord {
  key: WorkRecordKey;
  submission: Answer[];
  reviewers: ReviewerMap;
  version: number;
  updatedAt: Date | null;
}

/**
 * Empty review content counts as "not written yet": absent, blank strings,
 * and empty arrays or objects.
 */
export function isReviewContentEmpty(
  content: JsonValue | null | undefined,
): boolean {
  if (content === null || content === undefined) return true;
  if (typeof content === "string") return content.trim().length === 0;
  if (Array.isArray(content)) return content.length === 0;
  if (typeof content === "object") return Object.keys(content).length === 0;
  return false;
}

const escapeKeyPart = (part: string) =>
  part.replace(/%/g, "%25").replace(/:/g, "%3A");

/**
 * Stored `_id` for a work record. Each part is escaped so that a `:` inside a
 * student or unit id cannot make two different keys collide.
 */
export function workRecordKeyId(key: WorkRecordKey): string {
  return `${escapeKeyPart(key.studentId)}:${escapeKeyPart(key.unitId)}`;
}

export function sameWorkRecordKey(a: WorkRecordKey, b: WorkRecordKey): boolean {
  return a.studentId === b.studentId && a.unitId === b.unitId;
}

export const answerSchema = z.object({
  index: z.number().int().nonnegative(),
  value: jsonValueSchema,
});

const storedAssignmentSchema = z.object({
  review: jsonValueSchema.nullable().optional(),
  is_draft: z.boolean(),
  date_added: z.number().int(),
});

type StoredAssignment = z.infer<typeof storedAssignmentSchema>;

const workRecordDocumentSchema = z.object({
  _id: z.string(),
  schema_version: z.literal(CURRENT_SCHEMA_VERSION),
  student_id: z.string(),
  unit_id: z.string(),
  submission: z.array(answerSchema),
  reviewers: z.record(storedAssignmentSchema),
  version: z.number().int().nonnegative(),
  updated_at: z.date().nullable(),
});

export type WorkRecordDocument = z.infer<typeof workRecordDocumentSchema>;

// Layout written before typed documents: the whole bundle lives in `data` as
// a JSON string and the key is "<student>:<unit>".
const legacyWorkRecordDocumentSchema = z.object({
  _id: z.string(),
  schema_version: z.literal(1).optional(),
  key_string: z.string(),
  data: z.string(),
  updated_on: z.date().nullable().optional(),
  version: z.number().int().nonnegative().default(0),
});

const legacyWorkSchema = z.object({
  submission: z.array(answerSchema),
  reviewers: z.record(storedAssignmentSchema).default({}),
});

const schemaVersionSchema = z.object({
  schema_version: z.number().int().optional(),
});

function fromStoredReviewers(
  reviewers: Record<string, StoredAssignment>,
): ReviewerMap {
  return Object.fromEntries(
    Object.entries(reviewers).map(([reviewerId, entry]) => [
      reviewerId,
      {
        review: entry.review ?? null,
        isDraft: entry.is_draft,
        dateAdded: entry.date_added,
      },
    ]),
  );
}

export function toStoredReviewers(
  reviewers: ReviewerMap,
): Record<string, StoredAssignment> {
  return Object.fromEntries(
    Object.entries(reviewers).map(([reviewerId, entry]) => [
      reviewerId,
      {
        review: entry.review,
        is_draft: entry.isDraft,
        date_added: entry.dateAdded,
      },
    ]),
  );
}

function migrateLegacyDocument(raw: unknown): WorkRecord {
  const legacy = legacyWorkRecordDocumentSchema.parse(raw);
  const separator = legacy.key_string.indexOf(":");
  if (separator < 0) {
    throw new Error(`Legacy work record key has no unit: ${legacy.key_string}`);
  }
  const work = legacyWorkSchema.parse(JSON.parse(legacy.data));
  return {
    key: {
      studentId: legacy.key_string.slice(0, separator),
      unitId: legacy.key_string.slice(separator + 1),
    },
    submission: work.submission,
    reviewers: fromStoredReviewers(work.reviewers),
    version: legacy.version,
    updatedAt: legacy.updated_on ?? null,
  };
}

const storedIdSchema = z.object({ _id: z.string() });

export class InvalidWorkRecordError extends Error {
  constructor(
    readonly documentId: string,
    cause: unknown,
  ) {
    super(
      `Stored work record ${documentId} cannot be read: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      { cause },
    );
    this.name = "InvalidWorkRecordError";
  }
}

/**
 * Reads a stored work record of any known schema version. Legacy documents
 * are migrated in memory; the next write stores the current layout.
 */
export function parseWorkRecordDocument(raw: unknown): WorkRecord {
  try {
    return parseKnownLayout(raw);
  } catch (error) {
    const stored = storedIdSchema.safeParse(raw);
    throw new InvalidWorkRecordError(
      stored.success ? stored.data._id : "<unknown>",
      error,
    );
  }
}

function parseKnownLayout(raw: unknown): WorkRecord {
  const { schema_version: schemaVersion = 1 } = schemaVersionSchema.parse(raw);

  switch (schemaVersion) {
    case 1:
      return migrateLegacyDocument(raw);
    case CURRENT_SCHEMA_VERSION: {
      const doc = workRecordDocumentSchema.parse(raw);
      return {
        key: { studentId: doc.student_id, unitId: doc.unit_id },
        submission: doc.submission,
        reviewers: fromStoredReviewers(doc.reviewers),
        version: doc.version,
        updatedAt: doc.updated_at,
      };
    }
    default:
      throw new Error(`Unsupported work record schema_version: ${schemaVersion}`);
  }
}

export function buildWorkRecordFields(
  key: WorkRecordKey,
  submission: Answer[],
  reviewers: ReviewerMap,
  updatedAt: Date,
): Omit<WorkRecordDocument, "_id" | "version"> {
  return {
    schema_version: CURRENT_SCHEMA_VERSION,
    student_id: key.studentId,
    unit_id: key.unitId,
    submission,
    reviewers: toStoredReviewers(reviewers),
    updated_at: updatedAt,
  };
}
