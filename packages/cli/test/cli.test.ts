import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import type { KnownIssueType, OrgIssueSource, TrackerIssue } from "@issueroll/core";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { runCli } from "../src/index.js";

const tempDirs: string[] = [];
let originalGithubToken: string | undefined;

beforeEach(() => {
  originalGithubToken = process.env.GITHUB_TOKEN;
  delete process.env.GITHUB_TOKEN;
});

afterEach(async () => {
  await Promise.all(tempDirs.map((dir) => rm(dir, { recursive: true, force: true })));
  tempDirs.length = 0;

  if (typeof originalGithubToken === "undefined") {
    delete process.env.GITHUB_TOKEN;
  } else {
    process.env.GITHUB_TOKEN = originalGithubToken;
  }
});

async function createTempDir(): Promise<string> {
  const dir = await mkdtemp(path.join(tmpdir(), "issueroll-cli-"));
  tempDirs.push(dir);
  return dir;
}

function createMockIO() {
  const logs: string[] = [];
  const errors: string[] = [];
  return {
    io: {
      log: (message: string) => logs.push(message),
      error: (message: string) => errors.push(message)
    },
    logs,
    errors
  };
}

function trackerIssue(repo: string, number: number, labels: string[], state: "open" | "closed" = "open"): TrackerIssue {
  return {
    number,
    title: `Issue ${number}`,
    html_url: `https://github.com/acme/${repo}/issues/${number}`,
    state,
    labels: labels.map((name) => ({ name }))
  };
}

function createFakeProvider(
  issues: Partial<Record<KnownIssueType, TrackerIssue[]>>,
  subIssues: Record<number, number[]> = {}
): OrgIssueSource {
  return {
    async *fetchOrgIssues(query) {
      yield* issues[query.typeLabel] ?? [];
    },
    hierarchySource: () => ({
      fetchSubIssues: async (issueNumber) => (subIssues[issueNumber] ?? []).map((number) => ({ number })),
      fetchParentIssue: async () => null
    })
  };
}

const fixedNow = () => new Date("2026-03-05T12:00:00Z");

describe("runCli", () => {
  it("prints help for unknown commands", async () => {
    const { io, logs } = createMockIO();
    const code = await runCli(["bogus"], process.cwd(), { io });
    expect(code).toBe(0);
    expect(logs[0]).toBe("issueroll CLI");
  });

  it("validates existing config", async () => {
    const dir = await createTempDir();
    await writeFile(path.join(dir, ".issueroll.yml"), "org: acme\n", "utf-8");
    process.env.GITHUB_TOKEN = "test-secret";

    const { io, logs } = createMockIO();
    const code = await runCli(["validate"], dir, { io });

    expect(code).toBe(0);
    expect(logs).toEqual(["Config is valid.", "Organization: acme", "Tracked repos: all", "Report: planning"]);
  });

  it("fails validation when the products file is invalid", async () => {
    const dir = await createTempDir();
    await writeFile(
      path.join(dir, ".issueroll.yml"),
      "org: acme\nreport:\n  groupByComponent: true\n  productsFile: products.yaml\n",
      "utf-8"
    );
    await writeFile(path.join(dir, "products.yaml"), "products: []\n", "utf-8");
    process.env.GITHUB_TOKEN = "test-secret";

    const { io, errors } = createMockIO();
    const code = await runCli(["validate"], dir, { io });

    expect(code).toBe(1);
    expect(errors).toEqual(["Config validation failed.", "products: Expected object, received array"]);
  });

  it("prints a known-bugs report in dry-run mode", async () => {
    const dir = await createTempDir();
    await writeFile(path.join(dir, ".issueroll.yml"), "org: acme\n", "utf-8");
    process.env.GITHUB_TOKEN = "test-secret";
    const provider = createFakeProvider({
      bug: [trackerIssue("widgets", 1, ["bug", "s.high"])],
      task: [trackerIssue("widgets", 2, ["task"])]
    });
    const tokens: string[] = [];

    const { io, logs, errors } = createMockIO();
    const code = await runCli(["report", "--report", "known_bugs", "--dry-run", "--loglevel", "error"], dir, {
      io,
      now: fixedNow,
      createGithubProvider: (token) => {
        tokens.push(token);
        return provider;
      }
    });

    expect(code).toBe(0);
    expect(errors).toEqual([]);
    expect(tokens).toEqual(["test-secret"]);
    const lines = (logs[0] ?? "").split("\n");
    expect(lines[0]).toBe("# Known Bugs on 2026-03-05");
    expect(lines).toContain("| [widgets#1](https://github.com/acme/widgets/issues/1) - Issue 1 | s.high | open |");
    expect(lines).toContain("| widgets | 1 | 0 | 0 | 1 | 0 | 2 |");
  });

  it("writes a planning report with nested sub-issues", async () => {
    const dir = await createTempDir();
    await writeFile(path.join(dir, ".issueroll.yml"), "org: acme\n", "utf-8");
    await writeFile(path.join(dir, ".env"), "GITHUB_TOKEN=\"test-secret\"\n", "utf-8");
    const provider = createFakeProvider(
      {
        enhancement: [
          trackerIssue("widgets", 5, ["enhancement"]),
          trackerIssue("widgets", 6, ["enhancement"], "closed"),
          trackerIssue("widgets", 7, ["enhancement"])
        ]
      },
      { 5: [6, 7] }
    );
    const tokens: string[] = [];

    const { io, logs } = createMockIO();
    const code = await runCli(["report", "--show-parent-child", "--loglevel", "error"], dir, {
      io,
      now: fixedNow,
      createGithubProvider: (token) => {
        tokens.push(token);
        return provider;
      }
    });

    expect(code).toBe(0);
    expect(tokens).toEqual(["test-secret"]);
    const reportFile = path.join(dir, "issueroll", "planning-2026-03-05.md");
    const latestFile = path.join(dir, "issueroll", "latest.md");
    expect(logs).toEqual([`Created ${reportFile}`, `Updated ${latestFile}`, "Issues: 3 across 1 repositories"]);

    const content = await readFile(reportFile, "utf-8");
    const lines = content.split("\n");
    expect(lines[0]).toBe("# acme Issues");
    const parentStart = lines.indexOf("### Parent Issues");
    expect(parentStart).toBeGreaterThan(0);
    expect(lines.slice(parentStart + 4, parentStart + 7)).toEqual([
      "| [widgets#5](https://github.com/acme/widgets/issues/5) - Issue 5 | enhancement | unknown | in progress |  |",
      "|   ↳ [widgets#6](https://github.com/acme/widgets/issues/6) - Issue 6 | enhancement | unknown | closed |  |",
      "|   ↳ [widgets#7](https://github.com/acme/widgets/issues/7) - Issue 7 | enhancement | unknown | open |  |"
    ]);
    expect(lines).not.toContain("### Other Issues");
    expect(await readFile(latestFile, "utf-8")).toBe(content);
  });

  it("reports without grouping when the products file is missing", async () => {
    const dir = await createTempDir();
    process.env.GITHUB_TOKEN = "test-secret";
    const provider = createFakeProvider({ bug: [trackerIssue("widgets", 1, ["bug"])] });

    const { io, logs, errors } = createMockIO();
    const code = await runCli(
      ["report", "--org", "acme", "--group-by-component", "--dry-run", "--loglevel", "warn"],
      dir,
      { io, now: fixedNow, createGithubProvider: () => provider }
    );

    expect(code).toBe(0);
    expect(
      errors.some((line) => line.endsWith("WARN  No component mapping available; reporting without component grouping"))
    ).toBe(true);
    const lines = (logs[0] ?? "").split("\n");
    expect(lines).toContain("| Repository | Bug | Enhancement | Requirement | Task | Theme | Total |");
    expect(lines).not.toContain("## By Component");
  });

  it("requires an organization", async () => {
    const dir = await createTempDir();
    process.env.GITHUB_TOKEN = "test-secret";

    const { io, errors } = createMockIO();
    const code = await runCli(["report"], dir, { io });

    expect(code).toBe(1);
    expect(errors).toEqual(["Missing organization. Set org in .issueroll.yml or pass --org."]);
  });

  it("requires a token", async () => {
    const dir = await createTempDir();
    await writeFile(path.join(dir, ".issueroll.yml"), "org: acme\n", "utf-8");

    const { io, errors } = createMockIO();
    const code = await runCli(["report"], dir, { io });

    expect(code).toBe(1);
    expect(errors).toEqual(["Missing GitHub token. Set GITHUB_TOKEN in environment or .env"]);
  });

  it("rejects invalid options", async () => {
    const { io, errors } = createMockIO();

    expect(await runCli(["report", "--state", "pending"], process.cwd(), { io })).toBe(1);
    expect(await runCli(["report", "--since", "2026-03-02", "--until", "2026-03-01"], process.cwd(), { io })).toBe(1);
    expect(errors).toEqual(["Invalid --state value: pending", "--since must be earlier than --until"]);
  });
});
