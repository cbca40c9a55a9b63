import assert from "node:assert/strict";
import { describe, test } from "node:test";

import {
  CURRENT_SCHEMA_VERSION,
  buildWorkRecordFields,
  isReviewContentEmpty,
  parseWorkRecordDocument,
  sameWorkRecordKey,
  workRecordKeyId,
} from "../WorkRecord";

describe("WorkRecord keys", () => {
  test("joins student and unit with a colon", () => {
    assert.equal(
      workRecordKeyId({ studentId: "alice@example.com", unitId: "u1" }),
      "alice@example.com:u1",
    );
  });

  test("escapes separators so distinct keys never share an id", () => {
    const left = workRecordKeyId({ studentId: "a:b", unitId: "c" });
    const right = workRecordKeyId({ studentId: "a", unitId: "b:c" });
    assert.equal(left, "a%3Ab:c");
    assert.equal(right, "a:b%3Ac");
    assert.notEqual(left, right);
  });

  test("escapes percent signs before colons", () => {
    assert.equal(
      workRecordKeyId({ studentId: "50%:x", unitId: "u%3A1" }),
      "50%25%3Ax:u%253A1",
    );
  });

  test("compares keys field by field", () => {
    assert.equal(
      sameWorkRecordKey(
        { studentId: "s1", unitId: "u1" },
        { studentId: "s1", unitId: "u1" },
      ),
      true,
    );
    assert.equal(
      sameWorkRecordKey(
        { studentId: "s1", unitId: "u1" },
        { studentId: "s1", unitId: "u2" },
      ),
      false,
    );
  });
});

describe("parseWorkRecordDocument", () => {
  test("reads the current layout", () => {
    const updatedAt = new Date("2024-03-01T10:00:00Z");
    const record = parseWorkRecordDocument({
      _id: "s1:u1",
      version: 3,
      ...buildWorkRecordFields(
        { studentId: "s1", unitId: "u1" },
        [{ index: 0, value: "ans1" }],
        { r1: { review: null, isDraft: true, dateAdded: 100 } },
        updatedAt,
      ),
    });

    assert.deepEqual(record, {
      key: { studentId: "s1", unitId: "u1" },
      submission: [{ index: 0, value: "ans1" }],
      reviewers: { r1: { review: null, isDraft: true, dateAdded: 100 } },
      version: 3,
      updatedAt,
    });
  });

  test("migrates the legacy JSON blob layout", () => {
    const record = parseWorkRecordDocument({
      _id: "s2:u7",
      key_string: "s2:u7",
      data: JSON.stringify({
        submission: [
          { index: 0, value: "first" },
          { index: 1, value: 42 },
        ],
        reviewers: {
          r9: { is_draft: false, date_added: 1_700_000_000, review: "ok" },
          r8: { is_draft: true, date_added: 1_700_000_500 },
        },
      }),
      updated_on: null,
    });

    assert.deepEqual(record, {
      key: { studentId: "s2", unitId: "u7" },
      submission: [
        { index: 0, value: "first" },
        { index: 1, value: 42 },
      ],
      reviewers: {
        r9: { review: "ok", isDraft: false, dateAdded: 1_700_000_000 },
        r8: { review: null, isDraft: true, dateAdded: 1_700_000_500 },
      },
      version: 0,
      updatedAt: null,
    });
  });

  test("rejects schema versions it does not know", () => {
    assert.throws(
      () => parseWorkRecordDocument({ _id: "x:y", schema_version: 99 }),
      {
        name: "InvalidWorkRecordError",
        documentId: "x:y",
        message:
          "Stored work record x:y cannot be read: Unsupported work record schema_version: 99",
      },
    );
  });

  test("writes the current schema version", () => {
    const fields = buildWorkRecordFields(
      { studentId: "s1", unitId: "u1" },
      [],
      {},
      new Date(0),
    );
    assert.equal(fields.schema_version, CURRENT_SCHEMA_VERSION);
    assert.deepEqual(fields.reviewers, {});
  });
});

describe("isReviewContentEmpty", () => {
  test("treats absent and blank content as empty", () => {
    assert.equal(isReviewContentEmpty(null), true);
    assert.equal(isReviewContentEmpty(undefined), true);
    assert.equal(isReviewContentEmpty("   "), true);
    assert.equal(isReviewContentEmpty([]), true);
    assert.equal(isReviewContentEmpty({}), true);
  });

  test("treats written content as present", () => {
    assert.equal(isReviewContentEmpty("Nice work"), false);
    assert.equal(isReviewContentEmpty({ score: 3 }), false);
    assert.equal(isReviewContentEmpty(0), false);
    assert.equal(isReviewContentEmpty(false), false);
    assert.equal(isReviewContentEmpty(" ok "), false);
  });
});
