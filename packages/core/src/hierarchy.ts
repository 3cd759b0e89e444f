import { silentLogger, type Logger } from "./logger.js";
import type {
  FetchedParent,
  HierarchyResolution,
  HierarchySource,
  Issue,
  RelatedIssue
} from "./types.js";

export interface ResolveHierarchyOptions {
  /** Run the parent-lookup pass and record parents that are not in the input list. */
  includeExternalParents?: boolean;
  logger?: Logger;
  /** Label used in log lines, usually `owner/repo`. */
  scope?: string;
}

export function emptyHierarchy(): HierarchyResolution {
  return {
    parentToChildren: new Map(),
    childNumbers: new Set(),
    fetchedParents: new Map()
  };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

async function safeSubIssues(
  source: HierarchySource,
  issueNumber: number,
  logger: Logger,
  scope: string
): Promise<RelatedIssue[]> {
  try {
    const result = await source.fetchSubIssues(issueNumber);
    return Array.isArray(result) ? result : [];
  } catch (error: unknown) {
    logger.debug(`Sub-issue lookup failed for ${scope}#${issueNumber}: ${describeError(error)}`);
    return [];
  }
}

async function safeParentIssue(
  source: HierarchySource,
  issueNumber: number,
  logger: Logger,
  scope: string
): Promise<RelatedIssue | null> {
  try {
    return (await source.fetchParentIssue(issueNumber)) ?? null;
  } catch (error: unknown) {
    logger.debug(`Parent lookup failed for ${scope}#${issueNumber}: ${describeError(error)}`);
    return null;
  }
}

function toFetchedParent(parent: RelatedIssue): FetchedParent {
  return {
    number: parent.number,
    title: parent.title ?? "",
    url: parent.html_url ?? "",
    state: parent.state ?? "unknown"
  };
}

/**
 * Builds the parent→children relation for one repository's issues.
 *
 * The forward pass asks every issue for its sub-issues and links only those
 * already in `issues`. The backward pass (opt-in) asks the remaining issues for
 * their parent and records parents that are missing from `issues`; a parent that
 * is present is left to the forward pass, even when that pass did not link it.
 * Lookups run one at a time, in input order.
 */
export async function resolveHierarchy(
  issues: readonly Issue[],
  source: HierarchySource,
  options: ResolveHierarchyOptions = {}
): Promise<HierarchyResolution> {
  const logger = options.logger ?? silentLogger;
  const scope = options.scope ?? "repo";
  const resolution = emptyHierarchy();
  const { parentToChildren, childNumbers, fetchedParents } = resolution;
  const index = new Set(issues.map((issue) => issue.number));

  for (const issue of issues) {
    const subIssues = await safeSubIssues(source, issue.number, logger, scope);
    const children: number[] = [];
    for (const subIssue of subIssues) {
      const childNumber = subIssue?.number;
      if (!isPositiveInteger(childNumber) || childNumber === issue.number) {
        continue;
      }
      if (!index.has(childNumber) || children.includes(childNumber)) {
        continue;
      }
      children.push(childNumber);
      childNumbers.add(childNumber);
    }
    if (children.length > 0) {
      parentToChildren.set(issue.number, children);
    }
  }

  if (options.includeExternalParents) {
    await linkExternalParents(issues, index, source, resolution, logger, scope);
  }

  logger.debug(
    `Resolved hierarchy for ${scope}: ${parentToChildren.size} parents, ${childNumbers.size} children, ${fetchedParents.size} fetched parents`
  );
  return resolution;
}

async function linkExternalParents(
  issues: readonly Issue[],
  index: Set<number>,
  source: HierarchySource,
  resolution: HierarchyResolution,
  logger: Logger,
  scope: string
): Promise<void> {
  const { parentToChildren, childNumbers, fetchedParents } = resolution;
  for (const issue of issues) {
    if (parentToChildren.has(issue.number)) {
      continue;
    }

    const parent = await safeParentIssue(source, issue.number, logger, scope);
    const parentNumber = parent?.number;
    if (!parent || !isPositiveInteger(parentNumber) || parentNumber === issue.number) {
      continue;
    }
    if (index.has(parentNumber)) {
      continue;
    }

    if (!fetchedParents.has(parentNumber)) {
      fetchedParents.set(parentNumber, toFetchedParent(parent));
    }
    childNumbers.add(issue.number);
    const siblings = parentToChildren.get(parentNumber) ?? [];
    if (!siblings.includes(issue.number)) {
      siblings.push(issue.number);
    }
    parentToChildren.set(parentNumber, siblings);
  }
}
