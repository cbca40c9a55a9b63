import type { FastifyBaseLogger } from "fastify";
import type { Collection, Document, Filter } from "mongodb";

import { env } from "../config/env";
import {
  WORK_RECORD_COLLECTION,
  buildWorkRecordFields,
  parseWorkRecordDocument,
  workRecordKeyId,
  type Answer,
  type ReviewerMap,
  type WorkRecord,
  type WorkRecordKey,
} from "../models/WorkRecord";
import {
  ConcurrencyConflictError,
  NotFoundError,
} from "../services/reviewErrors";
import { getMongo } from "./mongo";

interface StoredWorkRecord extends Document {
  _id: string;
}

// Fields of the legacy single-blob layout, dropped on the first typed write.
const LEGACY_FIELDS = { key_string: "", data: "", updated_on: "" } as const;

async function getCollection(): Promise<Collection<StoredWorkRecord>> {
  const m = await getMongo();
  return m.collection<StoredWorkRecord>(WORK_RECORD_COLLECTION);
}

const escapeRegExp = (value: string) =>
  value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const describeKey = (key: WorkRecordKey) =>
  `student ${key.studentId} in unit ${key.unitId}`;

export async function getWorkRecord(
  key: WorkRecordKey,
): Promise<WorkRecord | null> {
  const col = await getCollection();
  const doc = await col.findOne({ _id: workRecordKeyId(key) });
  return doc ? parseWorkRecordDocument(doc) : null;
}

/** All work records of a unit, in `_id` order so repeated scans agree. */
export async function listUnitWorkRecords(
  unitId: string,
): Promise<WorkRecord[]> {
  const col = await getCollection();
  // Legacy documents have no unit field; their key_string ends in ":<unit>".
  const legacyKey = new RegExp(`:${escapeRegExp(unitId)}$`);
  const docs = await col
    .find({
      $or: [
        { unit_id: unitId },
        { schema_version: { $exists: false }, key_string: legacyKey },
        { schema_version: 1, key_string: legacyKey },
      ],
    })
    .sort({ _id: 1 })
    .toArray();
  return docs
    .map((doc) => parseWorkRecordDocument(doc))
    .filter((record) => record.key.unitId === unitId);
}

/**
 * Last-write-wins upsert of a whole record. The version still moves forward
 * so that conditional writers holding the old version retry.
 */
export async function replaceWorkRecord(
  key: WorkRecordKey,
  submission: Answer[],
  reviewers: ReviewerMap,
  now: () => Date = () => new Date(),
): Promise<void> {
  const col = await getCollection();
  await col.updateOne(
    { _id: workRecordKeyId(key) },
    {
      $set: buildWorkRecordFields(key, submission, reviewers, now()),
      $inc: { version: 1 },
      $unset: LEGACY_FIELDS,
    },
    { upsert: true },
  );
}

/** Returns the new reviewer map, or null to leave the record as it is. */
export type WorkRecordMutation = (record: WorkRecord) => ReviewerMap | null;

export interface UpdateWorkRecordOptions {
  maxAttempts?: number;
  logger?: FastifyBaseLogger;
  now?: () => Date;
}

export interface UpdateWorkRecordResult {
  record: WorkRecord;
  changed: boolean;
}

/**
 * Read-modify-write of one record, conditional on the version that was read.
 * A write that matches nothing lost a race and is retried from a fresh read.
 */
export async function updateWorkRecord(
  key: WorkRecordKey,
  mutate: WorkRecordMutation,
  options: UpdateWorkRecordOptions = {},
): Promise<UpdateWorkRecordResult> {
  const maxAttempts = options.maxAttempts ?? env.REVIEW_WRITE_MAX_ATTEMPTS;
  const now = options.now ?? (() => new Date());
  const col = await getCollection();
  const id = workRecordKeyId(key);

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    const doc = await col.findOne({ _id: id });
    if (!doc) {
      throw new NotFoundError(`No work record for ${describeKey(key)}`);
    }
    const current = parseWorkRecordDocument(doc);
    const reviewers = mutate(structuredClone(current));
    if (!reviewers) {
      return { record: current, changed: false };
    }

    // Legacy documents carry no version field until their first typed write.
    const filter: Filter<StoredWorkRecord> =
      typeof doc.version === "number"
        ? { _id: id, version: current.version }
        : { _id: id, version: { $exists: false } };
    const updatedAt = now();
    const result = await col.updateOne(filter, {
      $set: buildWorkRecordFields(
        current.key,
        current.submission,
        reviewers,
        updatedAt,
      ),
      $inc: { version: 1 },
      $unset: LEGACY_FIELDS,
    });

    if (result.matchedCount === 1) {
      return {
        record: {
          ...current,
          reviewers,
          version: current.version + 1,
          updatedAt,
        },
        changed: true,
      };
    }

    options.logger?.warn(
      { key, attempt, version: current.version },
      "[REVIEW] Work record changed during update, retrying",
    );
  }

  options.logger?.error(
    { key, attempts: maxAttempts },
    "[REVIEW] Gave up updating work record after repeated conflicts",
  );
  throw new ConcurrencyConflictError(
    `Work record for ${describeKey(key)} kept changing; gave up after ${maxAttempts} attempts`,
    key,
    maxAttempts,
  );
}
