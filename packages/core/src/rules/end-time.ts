import type { Issue, StateFilter } from "../types.js";

const ZONE_SUFFIX = /(?:Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Wall-clock milliseconds of an ISO timestamp, ignoring any zone designator.
 * `2026-03-01T10:00:00Z`, `2026-03-01T10:00:00+02:00` and `2026-03-01T10:00:00`
 * all map to the same instant.
 */
export function toWallClockTime(value: string): number | null {
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }
  const naive = trimmed.replace(ZONE_SUFFIX, "");
  const withTime = naive.includes("T") ? naive : `${naive}T00:00:00`;
  const ts = Date.parse(`${withTime}Z`);
  return Number.isFinite(ts) ? ts : null;
}

export function cutoffTimestamp(issue: Issue, state: StateFilter): string | undefined {
  if (state === "closed" && issue.closedAt) {
    return issue.closedAt;
  }
  return issue.updatedAt;
}

/** True when the issue's closing (or update) time lies after `endTime`. */
export function isAfterEndTime(issue: Issue, state: StateFilter, endTime?: string): boolean {
  if (!endTime) {
    return false;
  }
  const boundary = toWallClockTime(endTime);
  const marker = cutoffTimestamp(issue, state);
  if (boundary === null || !marker) {
    return false;
  }
  const ts = toWallClockTime(marker);
  return ts !== null && ts > boundary;
}
