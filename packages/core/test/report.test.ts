import { describe, expect, it } from "vitest";
import { emptyHierarchy } from "../src/hierarchy.js";
import {
  buildKnownBugsSection,
  buildPlanningSection,
  createIssuesByType,
  findInProgressParents,
  formatIssueCell,
  knownBugsCells,
  planningCells
} from "../src/report.js";
import type { HierarchyResolution, Issue, IssueState, IssueType } from "../src/types.js";

function issue(
  number: number,
  overrides: { state?: IssueState; type?: IssueType; priority?: string } = {}
): Issue {
  return {
    number,
    title: `Issue ${number}`,
    url: `https://github.com/acme/widgets/issues/${number}`,
    state: overrides.state ?? "open",
    type: overrides.type ?? "bug",
    priority: overrides.priority ?? "unknown",
    labels: []
  };
}

function hierarchy(links: Array<[number, number[]]>): HierarchyResolution {
  const resolution = emptyHierarchy();
  for (const [parent, children] of links) {
    resolution.parentToChildren.set(parent, children);
    for (const child of children) {
      resolution.childNumbers.add(child);
    }
  }
  return resolution;
}

describe("buildKnownBugsSection", () => {
  it("returns null for a repository without bugs", () => {
    const issuesByType = createIssuesByType();
    issuesByType.task.push(issue(1, { type: "task" }));

    expect(buildKnownBugsSection("widgets", issuesByType, emptyHierarchy())).toBeNull();
  });

  it("lists each bug once with children under their parent", () => {
    const issuesByType = createIssuesByType();
    issuesByType.bug.push(issue(1), issue(2), issue(3, { priority: "s.high" }));

    const section = buildKnownBugsSection("widgets", issuesByType, hierarchy([[1, [2]]]));

    expect(section?.rows.map((row) => [row.number, row.child])).toEqual([
      [1, false],
      [2, true],
      [3, false]
    ]);
    expect(section?.rows.map(knownBugsCells)).toEqual([
      ["[widgets#1](https://github.com/acme/widgets/issues/1) - Issue 1", "unknown", "open"],
      ["  ↳ [widgets#2](https://github.com/acme/widgets/issues/2) - Issue 2", "unknown", "open"],
      ["[widgets#3](https://github.com/acme/widgets/issues/3) - Issue 3", "s.high", "open"]
    ]);
  });

  it("appends fetched parents with their children", () => {
    const issuesByType = createIssuesByType();
    issuesByType.bug.push(issue(4), issue(5));
    const resolution = hierarchy([[900, [5]]]);
    resolution.fetchedParents.set(900, {
      number: 900,
      title: "Epic",
      url: "https://github.com/acme/widgets/issues/900",
      state: "open"
    });

    const section = buildKnownBugsSection("widgets", issuesByType, resolution);

    expect(section?.rows.map((row) => [row.number, row.child, row.type, row.priority])).toEqual([
      [4, false, "bug", "unknown"],
      [900, false, "unknown", "unknown"],
      [5, true, "bug", "unknown"]
    ]);
  });
});

describe("buildPlanningSection", () => {
  it("shows an in-progress parent with closed and open children exactly once", () => {
    const issuesByType = createIssuesByType();
    issuesByType.enhancement.push(
      issue(5, { type: "enhancement" }),
      issue(6, { type: "enhancement", state: "closed" }),
      issue(7, { type: "enhancement" })
    );
    const resolution = hierarchy([[5, [6, 7]]]);

    const section = buildPlanningSection("widgets", issuesByType, resolution);

    expect(findInProgressParents(issuesByType.enhancement, resolution)).toEqual([5]);
    expect(section?.parentRows.map((row) => [row.number, row.child, row.status])).toEqual([
      [5, false, "in progress"],
      [6, true, "closed"],
      [7, true, "open"]
    ]);
    expect(section?.otherRows).toEqual([]);
  });

  it("keeps every child under its own parent when an in-progress parent is listed later", () => {
    const issuesByType = createIssuesByType();
    issuesByType.task.push(
      issue(1, { type: "task" }),
      issue(2, { type: "task" }),
      issue(5, { type: "task" }),
      issue(6, { type: "task", state: "closed" }),
      issue(7, { type: "task" })
    );

    const section = buildPlanningSection("widgets", issuesByType, hierarchy([[1, [2]], [5, [6, 7]]]));

    expect(section?.parentRows.map((row) => [row.number, row.child, row.status])).toEqual([
      [5, false, "in progress"],
      [6, true, "closed"],
      [7, true, "open"],
      [1, false, "open"],
      [2, true, "open"]
    ]);
    expect(section?.otherRows).toEqual([]);
  });

  it("keeps open parents without closed children in their own state", () => {
    const issuesByType = createIssuesByType();
    issuesByType.bug.push(issue(3));
    issuesByType.task.push(issue(1, { type: "task" }), issue(2, { type: "task" }), issue(8, { type: "task" }));

    const section = buildPlanningSection("widgets", issuesByType, hierarchy([[1, [2]]]));

    expect(section?.parentRows.map((row) => [row.number, row.child, row.status])).toEqual([
      [1, false, "open"],
      [2, true, "open"]
    ]);
    expect(section?.otherRows.map((row) => row.number)).toEqual([3, 8]);
  });

  it("does not list a nested in-progress parent at the top", () => {
    const issuesByType = createIssuesByType();
    issuesByType.theme.push(issue(1, { type: "theme" }));
    issuesByType.task.push(
      issue(2, { type: "task" }),
      issue(3, { type: "task", state: "closed" })
    );

    const section = buildPlanningSection("widgets", issuesByType, hierarchy([[1, [2]], [2, [3]]]));

    expect(section?.parentRows.map((row) => [row.number, row.child, row.status])).toEqual([
      [1, false, "open"],
      [2, true, "open"]
    ]);
  });

  it("marks top-priority rows as on deck", () => {
    const issuesByType = createIssuesByType();
    issuesByType.requirement.push(issue(9, { type: "requirement", priority: "p.must-have" }));
    issuesByType.task.push(issue(10, { type: "task", priority: "p.nice-to-have" }));

    const section = buildPlanningSection("widgets", issuesByType, emptyHierarchy());

    expect(section?.otherRows.map(planningCells)).toEqual([
      ["[widgets#9](https://github.com/acme/widgets/issues/9) - Issue 9", "requirement", "p.must-have", "open", "X"],
      ["[widgets#10](https://github.com/acme/widgets/issues/10) - Issue 10", "task", "p.nice-to-have", "open", ""]
    ]);
  });

  it("returns null when there is nothing to plan", () => {
    expect(buildPlanningSection("widgets", createIssuesByType(), emptyHierarchy())).toBeNull();
  });
});

describe("formatIssueCell", () => {
  it("prefixes child rows with the child marker", () => {
    expect(
      formatIssueCell({
        repo: "widgets",
        number: 6,
        title: "Fix it",
        url: "https://github.com/acme/widgets/issues/6",
        type: "bug",
        priority: "unknown",
        status: "open",
        onDeck: false,
        child: true
      })
    ).toBe("  ↳ [widgets#6](https://github.com/acme/widgets/issues/6) - Fix it");
  });
});
