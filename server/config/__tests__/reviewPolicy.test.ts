import assert from "node:assert/strict";
import { describe, test } from "node:test";

import { getMinimumReviewCount, parseUnitMinCounts } from "../reviewPolicy";

describe("reviewPolicy", () => {
  test("parses per-unit minimum review counts", () => {
    assert.deepEqual(parseUnitMinCounts('{"u1": 3, "u2": 0}'), {
      u1: 3,
      u2: 0,
    });
  });

  test("drops entries that are not non-negative integers", () => {
    assert.deepEqual(
      parseUnitMinCounts('{"u1": 2, "u2": -1, "u3": 1.5, "u4": "3"}'),
      { u1: 2 },
    );
  });

  test("ignores malformed or non-object JSON", () => {
    assert.deepEqual(parseUnitMinCounts("{not json"), {});
    assert.deepEqual(parseUnitMinCounts("[1, 2]"), {});
    assert.deepEqual(parseUnitMinCounts(undefined), {});
  });

  test("falls back to the default count for units without an override", () => {
    const policy = { defaultMinCount: 2, unitMinCounts: { u1: 5 } };
    assert.equal(getMinimumReviewCount("u1", policy), 5);
    assert.equal(getMinimumReviewCount("u2", policy), 2);
  });
});
