import { env } from "./env";

export interface ReviewPolicy {
  defaultMinCount: number;
  unitMinCounts: Record<string, number>;
}

const isValidMinCount = (value: unknown): value is number =>
  typeof value === "number" && Number.isInteger(value) && value >= 0;

export function parseUnitMinCounts(value?: string): Record<string, number> {
  if (!value) {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch (error) {
    console.warn("Failed to parse REVIEW_MIN_COUNTS_JSON", error);
    return {};
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    console.warn("REVIEW_MIN_COUNTS_JSON must be a JSON object");
    return {};
  }

  const counts: Record<string, number> = {};
  const dropped: string[] = [];
  for (const [unitId, count] of Object.entries(parsed)) {
    if (isValidMinCount(count)) {
      counts[unitId] = count;
    } else {
      dropped.push(unitId);
    }
  }
  if (dropped.length) {
    console.warn("[REVIEW] Ignoring invalid unit minimum review counts", {
      dropped,
    });
  }
  return counts;
}

let cachedPolicy: ReviewPolicy | null = null;

export function getReviewPolicy(): ReviewPolicy {
  if (!cachedPolicy) {
    cachedPolicy = {
      defaultMinCount: env.REVIEW_MIN_COUNT_DEFAULT,
      unitMinCounts: parseUnitMinCounts(env.REVIEW_MIN_COUNTS_JSON),
    };
  }
  return cachedPolicy;
}

export function getMinimumReviewCount(
  unitId: string,
  policy: ReviewPolicy = getReviewPolicy(),
): number {
  return policy.unitMinCounts[unitId] ?? policy.defaultMinCount;
}
