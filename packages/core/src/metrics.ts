import { OTHER_METRICS_BUCKET } from "./components.js";
import {
  ISSUE_TYPES,
  type ComponentMap,
  type IssuesByType,
  type KnownIssueType,
  type MetricsBucket,
  type MetricsSummary,
  type RepoIssues,
  type StateFilter,
  type TypeCounts
} from "./types.js";

export interface MetricsOptions {
  componentMap?: ComponentMap;
  groupByComponent?: boolean;
}

/** Column order of the summary table. */
export const METRICS_TYPE_COLUMNS: KnownIssueType[] = ["bug", "enhancement", "requirement", "task", "theme"];

function emptyCounts(): TypeCounts {
  return { bug: 0, enhancement: 0, requirement: 0, theme: 0, task: 0 };
}

/** Code-unit ordering, so the output does not depend on the host locale. */
export function compareKeys(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export function isComponentGrouping(options: MetricsOptions): boolean {
  return Boolean(options.groupByComponent && options.componentMap && options.componentMap.size > 0);
}

export function countByType(issuesByType: Partial<IssuesByType>): { byType: TypeCounts; total: number } {
  const byType = emptyCounts();
  let total = 0;
  for (const type of ISSUE_TYPES) {
    const count = issuesByType[type]?.length ?? 0;
    byType[type] = count;
    total += count;
  }
  return { byType, total };
}

/**
 * Sums issue counts per repository, or per component when component grouping is
 * active. The grand total is the sum of per-repository totals in both modes.
 */
export function rollupMetrics(repoIssues: RepoIssues, options: MetricsOptions = {}): MetricsSummary {
  const grouped = isComponentGrouping(options);
  const buckets = new Map<string, MetricsBucket>();
  const repoTotals = new Map<string, number>();
  const grandTotal: MetricsBucket = { key: "TOTAL", total: 0, byType: emptyCounts() };

  for (const [repo, issuesByType] of repoIssues) {
    const { byType, total } = countByType(issuesByType);
    repoTotals.set(repo, total);

    const key = grouped
      ? (options.componentMap?.get(repo)?.productName ?? OTHER_METRICS_BUCKET)
      : repo;
    const bucket = buckets.get(key) ?? { key, total: 0, byType: emptyCounts() };
    bucket.total += total;
    grandTotal.total += total;
    for (const type of ISSUE_TYPES) {
      bucket.byType[type] += byType[type];
      grandTotal.byType[type] += byType[type];
    }
    buckets.set(key, bucket);
  }

  return {
    dimension: grouped ? "component" : "repository",
    buckets: Array.from(buckets.values()).sort((a, b) => compareKeys(a.key, b.key)),
    grandTotal,
    repoTotals
  };
}

export function metricsTable(summary: MetricsSummary): { columns: string[]; rows: string[][] } {
  const columns = [
    summary.dimension === "component" ? "Component" : "Repository",
    ...METRICS_TYPE_COLUMNS.map(capitalize),
    "Total"
  ];
  const rows = summary.buckets.map((bucket) => [
    bucket.key,
    ...METRICS_TYPE_COLUMNS.map((type) => String(bucket.byType[type])),
    String(bucket.total)
  ]);
  rows.push([
    "**TOTAL**",
    ...METRICS_TYPE_COLUMNS.map((type) => `**${summary.grandTotal.byType[type]}**`),
    `**${summary.grandTotal.total}**`
  ]);
  return { columns, rows };
}

export function describeMetricsScope(state: StateFilter, since?: string, until?: string): string {
  if (state === "closed") {
    const start = since ? since.split("T")[0] : "start";
    const end = until ? until.split("T")[0] : "end";
    return `Issues closed between ${start} and ${end}`;
  }
  if (state === "open") {
    return "Open issues updated in the specified period";
  }
  return "All issues in the specified period";
}
