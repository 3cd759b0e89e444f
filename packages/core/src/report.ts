import { isTopPriority } from "./rules/issue-classifier.js";
import {
  ISSUE_TYPES,
  type FetchedParent,
  type HierarchyResolution,
  type Issue,
  type IssuesByType,
  type KnownBugsSection,
  type PlanningSection,
  type ReportRow
} from "./types.js";

export const IN_PROGRESS_STATUS = "in progress";
export const CHILD_MARKER = "  ↳ ";
export const KNOWN_BUGS_COLUMNS = ["Issue", "Severity", "Status"];
export const PLANNING_COLUMNS = ["Issue", "Type", "Priority / Bug Severity", "Status", "On Deck"];

export function createIssuesByType(): IssuesByType {
  return {
    bug: [],
    enhancement: [],
    requirement: [],
    theme: [],
    task: []
  };
}

/** All issues in type order: every bug, then every enhancement, and so on. */
export function combineIssues(issuesByType: Partial<IssuesByType>): Issue[] {
  return ISSUE_TYPES.flatMap((type) => issuesByType[type] ?? []);
}

function indexByNumber(issues: readonly Issue[]): Map<number, Issue> {
  const index = new Map<number, Issue>();
  for (const issue of issues) {
    if (!index.has(issue.number)) {
      index.set(issue.number, issue);
    }
  }
  return index;
}

function issueRow(repo: string, issue: Issue, options: { child?: boolean; status?: string } = {}): ReportRow {
  return {
    repo,
    number: issue.number,
    title: issue.title,
    url: issue.url,
    type: issue.type,
    priority: issue.priority,
    status: options.status ?? issue.state,
    onDeck: isTopPriority(issue.priority),
    child: options.child ?? false
  };
}

function fetchedParentRow(repo: string, parent: FetchedParent): ReportRow {
  return {
    repo,
    number: parent.number,
    title: parent.title,
    url: parent.url,
    type: "unknown",
    priority: "unknown",
    status: parent.state,
    onDeck: false,
    child: false
  };
}

function childIssues(
  parentNumber: number,
  hierarchy: HierarchyResolution,
  index: Map<number, Issue>
): Issue[] {
  return (hierarchy.parentToChildren.get(parentNumber) ?? []).flatMap((childNumber) => {
    const child = index.get(childNumber);
    return child ? [child] : [];
  });
}

function appendFetchedParents(
  rows: ReportRow[],
  repo: string,
  hierarchy: HierarchyResolution,
  index: Map<number, Issue>
): void {
  for (const [parentNumber, parent] of hierarchy.fetchedParents) {
    const children = childIssues(parentNumber, hierarchy, index);
    if (children.length === 0) {
      continue;
    }
    rows.push(fetchedParentRow(repo, parent));
    for (const child of children) {
      rows.push(issueRow(repo, child, { child: true }));
    }
  }
}

/**
 * Bug-only view. `hierarchy` must be resolved over the bug list itself.
 * Returns null when the repository has no bugs.
 */
export function buildKnownBugsSection(
  repo: string,
  issuesByType: Partial<IssuesByType>,
  hierarchy: HierarchyResolution
): KnownBugsSection | null {
  const bugs = issuesByType.bug ?? [];
  if (bugs.length === 0) {
    return null;
  }

  const index = indexByNumber(bugs);
  const rows: ReportRow[] = [];
  for (const bug of bugs) {
    if (hierarchy.childNumbers.has(bug.number)) {
      continue;
    }
    rows.push(issueRow(repo, bug));
    for (const child of childIssues(bug.number, hierarchy, index)) {
      rows.push(issueRow(repo, child, { child: true }));
    }
  }
  appendFetchedParents(rows, repo, hierarchy, index);

  return { kind: "known_bugs", repo, rows };
}

/**
 * Open parents with at least one closed child, in hierarchy discovery order.
 * Their rows display `in progress` instead of `open`.
 */
export function findInProgressParents(issues: readonly Issue[], hierarchy: HierarchyResolution): number[] {
  const index = indexByNumber(issues);
  const result: number[] = [];
  for (const [parentNumber, children] of hierarchy.parentToChildren) {
    const parent = index.get(parentNumber);
    if (!parent || parent.state !== "open") {
      continue;
    }
    if (children.some((childNumber) => index.get(childNumber)?.state === "closed")) {
      result.push(parentNumber);
    }
  }
  return result;
}

/**
 * Planning view over every type. `hierarchy` must be resolved over
 * `combineIssues(issuesByType)`. Returns null when the repository has no issues.
 */
export function buildPlanningSection(
  repo: string,
  issuesByType: Partial<IssuesByType>,
  hierarchy: HierarchyResolution
): PlanningSection | null {
  const issues = combineIssues(issuesByType);
  if (issues.length === 0) {
    return null;
  }

  const { parentToChildren, childNumbers } = hierarchy;
  const index = indexByNumber(issues);
  const inProgress = findInProgressParents(issues, hierarchy);
  const inProgressSet = new Set(inProgress);
  const shownChildren = new Map<number, Set<number>>();
  const listedParents = new Set<number>();
  const parentRows: ReportRow[] = [];

  const pushChild = (parentNumber: number, child: Issue): void => {
    const shown = shownChildren.get(parentNumber) ?? new Set<number>();
    if (shown.has(child.number)) {
      return;
    }
    shown.add(child.number);
    shownChildren.set(parentNumber, shown);
    parentRows.push(issueRow(repo, child, { child: true }));
  };

  for (const parentNumber of inProgress) {
    // Nested parents stay under their own parent.
    if (childNumbers.has(parentNumber)) {
      continue;
    }
    const parent = index.get(parentNumber);
    if (!parent) {
      continue;
    }
    parentRows.push(issueRow(repo, parent, { status: IN_PROGRESS_STATUS }));
    listedParents.add(parentNumber);
    // Closed children first, then the rest, all under this parent's row.
    const children = childIssues(parentNumber, hierarchy, index);
    for (const child of children) {
      if (child.state === "closed") {
        pushChild(parentNumber, child);
      }
    }
    for (const child of children) {
      pushChild(parentNumber, child);
    }
  }

  for (const parent of issues) {
    if (!parentToChildren.has(parent.number)) {
      continue;
    }
    if (inProgressSet.has(parent.number) || listedParents.has(parent.number)) {
      continue;
    }
    parentRows.push(issueRow(repo, parent));
    listedParents.add(parent.number);
    for (const child of childIssues(parent.number, hierarchy, index)) {
      pushChild(parent.number, child);
    }
  }

  appendFetchedParents(parentRows, repo, hierarchy, index);

  const otherRows = issues
    .filter((issue) => !parentToChildren.has(issue.number) && !childNumbers.has(issue.number))
    .map((issue) => issueRow(repo, issue));

  return { kind: "planning", repo, parentRows, otherRows };
}

export function formatIssueCell(row: ReportRow): string {
  const prefix = row.child ? CHILD_MARKER : "";
  return `${prefix}[${row.repo}#${row.number}](${row.url}) - ${row.title}`;
}

export function knownBugsCells(row: ReportRow): string[] {
  return [formatIssueCell(row), row.priority, row.status];
}

export function planningCells(row: ReportRow): string[] {
  return [formatIssueCell(row), row.type, row.priority, row.status, row.onDeck ? "X" : ""];
}
