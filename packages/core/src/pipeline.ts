import { componentForRepo, formatComponentName, OTHER_COMPONENT } from "./components.js";
import { silentLogger, type Logger } from "./logger.js";
import {
  compareKeys,
  describeMetricsScope,
  isComponentGrouping,
  metricsTable,
  rollupMetrics
} from "./metrics.js";
import {
  buildKnownBugsSection,
  buildPlanningSection,
  combineIssues,
  KNOWN_BUGS_COLUMNS,
  knownBugsCells,
  PLANNING_COLUMNS,
  planningCells
} from "./report.js";
import type {
  ComponentMap,
  DocumentBuilder,
  HierarchyResolution,
  Issue,
  IssuesByType,
  MetricsSummary,
  RepoIssues,
  RepoSection,
  ReportBlock,
  ReportKind,
  StateFilter
} from "./types.js";

export const KNOWN_BUGS_INTRO =
  "Here is the list of the known bugs for the current release, click on them for more information and possible workarounds.";

export interface ReportContext {
  org: string;
  report: ReportKind;
  state?: StateFilter;
  since?: string;
  until?: string;
  componentMap?: ComponentMap;
  groupByComponent?: boolean;
  title?: string;
  date?: Date;
  logger?: Logger;
}

export interface ReportPipelineSteps<TRenderResult> {
  collect: (ctx: ReportContext) => Promise<RepoIssues> | RepoIssues;
  /** Resolves the hierarchy of one repository over the issues the chosen view shows. */
  hierarchy: (
    repo: string,
    issues: Issue[],
    ctx: ReportContext
  ) => Promise<HierarchyResolution> | HierarchyResolution;
  render: (report: IssueReport, ctx: ReportContext) => Promise<TRenderResult> | TRenderResult;
}

export interface ReportGroup {
  /** Product key, or `"other"`; null when the report is not grouped. */
  component: string | null;
  sections: RepoSection[];
}

export interface IssueReport {
  title: string;
  groups: ReportGroup[];
  metrics: MetricsSummary;
  blocks: ReportBlock[];
}

export interface ReportPipelineResult<TRenderResult> {
  report: IssueReport;
  output: TRenderResult;
}

function hasIssues(issuesByType: IssuesByType): boolean {
  return combineIssues(issuesByType).length > 0;
}

export function defaultReportTitle(ctx: ReportContext): string {
  if (ctx.report === "planning") {
    return `${ctx.org} Issues`;
  }
  const date = (ctx.date ?? new Date()).toISOString().slice(0, 10);
  return `Known Bugs on ${date}`;
}

/** Repositories with at least one issue, grouped by component when grouping is active. */
export function layoutRepositories(
  repoIssues: RepoIssues,
  ctx: Pick<ReportContext, "componentMap" | "groupByComponent">
): Array<{ component: string | null; repos: string[] }> {
  const repos = Array.from(repoIssues.entries())
    .filter(([, issuesByType]) => hasIssues(issuesByType))
    .map(([repo]) => repo)
    .sort(compareKeys);

  const componentMap = ctx.componentMap;
  if (!componentMap || !isComponentGrouping(ctx)) {
    return [{ component: null, repos }];
  }

  const byComponent = new Map<string, string[]>();
  for (const repo of repos) {
    const component = componentForRepo(componentMap, repo);
    const list = byComponent.get(component) ?? [];
    list.push(repo);
    byComponent.set(component, list);
  }
  return Array.from(byComponent.keys())
    .sort(compareKeys)
    .map((component) => ({ component, repos: byComponent.get(component) ?? [] }));
}

function sectionBlocks(section: RepoSection): ReportBlock[] {
  const blocks: ReportBlock[] = [{ kind: "header", level: 2, text: section.repo }];
  if (section.kind === "known_bugs") {
    blocks.push({ kind: "line", text: KNOWN_BUGS_INTRO });
    blocks.push({ kind: "table", columns: KNOWN_BUGS_COLUMNS, rows: section.rows.map(knownBugsCells) });
    return blocks;
  }

  if (section.parentRows.length > 0) {
    blocks.push({ kind: "header", level: 3, text: "Parent Issues" });
    blocks.push({ kind: "table", columns: PLANNING_COLUMNS, rows: section.parentRows.map(planningCells) });
  }
  if (section.otherRows.length > 0) {
    blocks.push({ kind: "header", level: 3, text: "Other Issues" });
    blocks.push({ kind: "table", columns: PLANNING_COLUMNS, rows: section.otherRows.map(planningCells) });
  }
  return blocks;
}

export function buildReportBlocks(
  title: string,
  groups: ReportGroup[],
  metrics: MetricsSummary,
  ctx: ReportContext
): ReportBlock[] {
  const blocks: ReportBlock[] = [{ kind: "header", level: 1, text: title }];

  for (const group of groups) {
    if (group.sections.length === 0) {
      continue;
    }
    if (group.component && group.component !== OTHER_COMPONENT) {
      blocks.push({ kind: "header", level: 1, text: `Component: ${formatComponentName(group.component)}` });
    }
    for (const section of group.sections) {
      blocks.push(...sectionBlocks(section));
    }
  }

  blocks.push({ kind: "header", level: 1, text: "Summary Metrics" });
  blocks.push({ kind: "line", text: describeMetricsScope(ctx.state ?? "all", ctx.since, ctx.until) });
  if (metrics.dimension === "component") {
    blocks.push({ kind: "header", level: 2, text: "By Component" });
  }
  const table = metricsTable(metrics);
  blocks.push({ kind: "table", columns: table.columns, rows: table.rows });
  return blocks;
}

/** Replays report blocks into a document builder, in order. */
export function emitReport(blocks: readonly ReportBlock[], builder: DocumentBuilder): void {
  for (const block of blocks) {
    if (block.kind === "header") {
      builder.header(block.level, block.text);
    } else if (block.kind === "line") {
      builder.line(block.text);
    } else {
      builder.table(block.columns, block.rows);
    }
  }
}

export async function buildIssueReport(
  repoIssues: RepoIssues,
  resolve: ReportPipelineSteps<unknown>["hierarchy"],
  ctx: ReportContext
): Promise<IssueReport> {
  const logger = ctx.logger ?? silentLogger;
  const groups: ReportGroup[] = [];

  for (const { component, repos } of layoutRepositories(repoIssues, ctx)) {
    const sections: RepoSection[] = [];
    for (const repo of repos) {
      const issuesByType = repoIssues.get(repo);
      if (!issuesByType) {
        continue;
      }

      const scoped = ctx.report === "known_bugs" ? issuesByType.bug : combineIssues(issuesByType);
      if (scoped.length === 0) {
        logger.debug(`Skipping ${repo}: nothing to report`);
        continue;
      }

      const hierarchy = await resolve(repo, scoped, ctx);
      const section =
        ctx.report === "known_bugs"
          ? buildKnownBugsSection(repo, issuesByType, hierarchy)
          : buildPlanningSection(repo, issuesByType, hierarchy);
      if (section) {
        sections.push(section);
      }
    }
    groups.push({ component, sections });
  }

  const metrics = rollupMetrics(repoIssues, ctx);
  const title = ctx.title ?? defaultReportTitle(ctx);
  return {
    title,
    groups,
    metrics,
    blocks: buildReportBlocks(title, groups, metrics, ctx)
  };
}

export async function runReportPipeline<TRenderResult>(
  steps: ReportPipelineSteps<TRenderResult>,
  ctx: ReportContext
): Promise<ReportPipelineResult<TRenderResult>> {
  const logger = ctx.logger ?? silentLogger;
  const repoIssues = await steps.collect(ctx);
  logger.info(`Collected issues from ${repoIssues.size} repositories`);

  const report = await buildIssueReport(repoIssues, steps.hierarchy, ctx);
  const output = await steps.render(report, ctx);
  return { report, output };
}
