import {
  IGNORE_LABELS,
  ISSUE_TYPES,
  TOP_PRIORITIES,
  type Issue,
  type IssueType,
  type TrackerIssue
} from "../types.js";

const PRIORITY_PREFIXES = ["p.", "s."];

export function normalizeLabels(labels?: Array<{ name: string } | string>): string[] {
  return (labels ?? [])
    .map((label) => (typeof label === "string" ? label : label.name))
    .filter((name) => name.length > 0);
}

/**
 * Type labels are checked in `ISSUE_TYPES` order, so an issue labelled both
 * `task` and `bug` is a bug.
 */
export function classifyIssueType(labels: readonly string[]): IssueType {
  const present = new Set(labels);
  return ISSUE_TYPES.find((type) => present.has(type)) ?? "unknown";
}

export function resolvePriority(labels: readonly string[]): string {
  return labels.find((label) => PRIORITY_PREFIXES.some((prefix) => label.startsWith(prefix))) ?? "unknown";
}

export function isTopPriority(priority: string): boolean {
  return TOP_PRIORITIES.some((top) => top === priority);
}

export function hasIgnoredLabel(
  labels: readonly string[],
  ignoreLabels: readonly string[] = IGNORE_LABELS
): boolean {
  const ignored = new Set(ignoreLabels);
  return labels.some((label) => ignored.has(label));
}

export function toIssueRecord(raw: TrackerIssue): Issue {
  const labels = normalizeLabels(raw.labels);
  return {
    number: raw.number,
    title: raw.title,
    url: raw.html_url,
    state: raw.state,
    type: classifyIssueType(labels),
    priority: resolvePriority(labels),
    labels,
    ...(raw.updated_at ? { updatedAt: raw.updated_at } : {}),
    ...(raw.closed_at ? { closedAt: raw.closed_at } : {})
  };
}

/** Repository name from an issue URL such as `https://github.com/org/repo/issues/12`. */
export function repoNameFromUrl(url: string): string | null {
  const parts = url.replace(/\/+$/, "").split("/");
  if (parts.length < 3 || parts[parts.length - 2] !== "issues") {
    return null;
  }
  const repo = parts[parts.length - 3];
  return repo ? repo : null;
}
