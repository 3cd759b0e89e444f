import { Octokit } from "@octokit/rest";
import {
  silentLogger,
  type HierarchySource,
  type Logger,
  type OrgIssueQuery,
  type OrgIssueSource,
  type RelatedIssue
} from "@issueroll/core";
import { z } from "zod";

export interface GithubLabel {
  name: string;
}

export interface GithubIssue {
  number: number;
  title: string;
  state: "open" | "closed";
  html_url: string;
  labels: Array<GithubLabel | string>;
  updated_at?: string | null;
  closed_at?: string | null;
}

export interface IssueRef {
  owner: string;
  repo: string;
  issueNumber: number;
}

/** Raw transport. Lookups resolve to the undecoded JSON body. */
export interface GithubApi {
  searchIssues(query: string): AsyncIterable<GithubIssue>;
  getSubIssues(ref: IssueRef): Promise<unknown>;
  getParentIssue(ref: IssueRef): Promise<unknown>;
}

export interface GithubProviderClientOptions {
  token?: string;
  userAgent?: string;
  api?: GithubApi;
  logger?: Logger;
}

const relatedIssueSchema = z.object({
  number: z.number().int().positive(),
  title: z.string().optional(),
  html_url: z.string().optional(),
  state: z.string().optional()
});

const relatedIssueListSchema = z.array(z.unknown());

function datePart(value: string): string {
  return value.split("T")[0] ?? value;
}

/**
 * GitHub search syntax for one issue type across an organization. Closed
 * searches with both bounds filter on the closing date, every other search on
 * the last update.
 */
export function buildSearchQuery(query: OrgIssueQuery): string {
  const parts = [`org:${query.org}`, `label:${query.typeLabel}`, "is:issue"];
  if (query.state !== "all") {
    parts.push(`is:${query.state}`);
  }

  if (query.state === "closed" && query.since && query.until) {
    parts.push(`closed:${datePart(query.since)}..${datePart(query.until)}`);
  } else if (query.since) {
    parts.push(`updated:>=${datePart(query.since)}`);
  }
  return parts.join(" ");
}

function errorStatus(error: unknown): string {
  if (error && typeof error === "object" && "status" in error) {
    return String(error.status ?? "");
  }
  return "";
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (error && typeof error === "object" && "message" in error) {
    return String(error.message ?? "");
  }
  return String(error);
}

export function formatProviderError(error: unknown, context: string): Error {
  const status = errorStatus(error);
  const message = errorMessage(error);
  const lower = message.toLowerCase();

  if (status === "403" && lower.includes("rate limit")) {
    return new Error(`GitHub rate limit reached for ${context}. Retry later or use a higher quota token.`);
  }
  if (status === "401") {
    return new Error(`GitHub authentication failed for ${context}. Check token permissions and value.`);
  }
  if (message) {
    return new Error(`GitHub provider error for ${context}: ${message}`);
  }
  return new Error(`GitHub provider error for ${context}: ${String(error)}`);
}

export function decodeRelatedIssue(payload: unknown): RelatedIssue | null {
  const parsed = relatedIssueSchema.safeParse(payload);
  return parsed.success ? parsed.data : null;
}

export function decodeRelatedIssues(payload: unknown): RelatedIssue[] | null {
  const parsed = relatedIssueListSchema.safeParse(payload);
  if (!parsed.success) {
    return null;
  }
  return parsed.data.flatMap((entry) => {
    const issue = decodeRelatedIssue(entry);
    return issue ? [issue] : [];
  });
}

class OctokitGithubApi implements GithubApi {
  constructor(private readonly octokit: Octokit) {}

  async *searchIssues(query: string): AsyncIterable<GithubIssue> {
    const pages = this.octokit.paginate.iterator(this.octokit.rest.search.issuesAndPullRequests, {
      q: query,
      per_page: 100
    });

    for await (const page of pages) {
      for (const item of page.data) {
        if (item.pull_request) {
          continue;
        }
        yield {
          number: item.number,
          title: item.title,
          state: item.state === "closed" ? "closed" : "open",
          html_url: item.html_url,
          labels: item.labels.map((label) =>
            typeof label === "string" ? label : (label.name ?? "")
          ),
          updated_at: item.updated_at,
          closed_at: item.closed_at
        };
      }
    }
  }

  async getSubIssues(ref: IssueRef): Promise<unknown> {
    const response = await this.octokit.request(
      "GET /repos/{owner}/{repo}/issues/{issue_number}/sub_issues",
      {
        owner: ref.owner,
        repo: ref.repo,
        issue_number: ref.issueNumber,
        per_page: 100
      }
    );
    return response.data;
  }

  async getParentIssue(ref: IssueRef): Promise<unknown> {
    const response = await this.octokit.request("GET /repos/{owner}/{repo}/issues/{issue_number}/parent", {
      owner: ref.owner,
      repo: ref.repo,
      issue_number: ref.issueNumber
    });
    return response.data;
  }
}

export function createGithubApi(token: string, userAgent = "issueroll/0.1.0"): GithubApi {
  const octokit = new Octokit({ auth: token, userAgent });
  return new OctokitGithubApi(octokit);
}

/**
 * Caller-owned GitHub handle. Build one per run and hand it to the report
 * pipeline; nothing here is cached between calls.
 */
export class GithubProviderClient implements OrgIssueSource {
  private readonly api: GithubApi;
  private readonly logger: Logger;

  constructor(options: GithubProviderClientOptions) {
    this.logger = options.logger ?? silentLogger;
    if (options.api) {
      this.api = options.api;
      return;
    }

    if (!options.token) {
      throw new Error("GithubProviderClient requires either `api` or `token`.");
    }

    this.api = createGithubApi(options.token, options.userAgent);
  }

  async *fetchOrgIssues(query: OrgIssueQuery): AsyncIterable<GithubIssue> {
    const q = buildSearchQuery(query);
    this.logger.debug(`Searching with query: ${q}`);
    try {
      yield* this.api.searchIssues(q);
    } catch (error: unknown) {
      throw formatProviderError(error, `search "${q}"`);
    }
  }

  hierarchySource(owner: string, repo: string): HierarchySource {
    return {
      fetchSubIssues: (issueNumber) => this.fetchSubIssues({ owner, repo, issueNumber }),
      fetchParentIssue: (issueNumber) => this.fetchParentIssue({ owner, repo, issueNumber })
    };
  }

  /** Sub-issues of one issue; empty on 404, transport errors and malformed bodies. */
  async fetchSubIssues(ref: IssueRef): Promise<RelatedIssue[]> {
    const label = `${ref.owner}/${ref.repo}#${ref.issueNumber}`;
    try {
      const payload = await this.api.getSubIssues(ref);
      const decoded = decodeRelatedIssues(payload);
      if (!decoded) {
        this.logger.debug(`Malformed sub-issue response for ${label}`);
        return [];
      }
      return decoded;
    } catch (error: unknown) {
      this.logLookupError("sub-issues", label, error);
      return [];
    }
  }

  /** Parent of one issue; null on 404, transport errors and malformed bodies. */
  async fetchParentIssue(ref: IssueRef): Promise<RelatedIssue | null> {
    const label = `${ref.owner}/${ref.repo}#${ref.issueNumber}`;
    try {
      const payload = await this.api.getParentIssue(ref);
      const decoded = decodeRelatedIssue(payload);
      if (!decoded) {
        this.logger.debug(`Malformed parent response for ${label}`);
      }
      return decoded;
    } catch (error: unknown) {
      this.logLookupError("parent", label, error);
      return null;
    }
  }

  private logLookupError(kind: "sub-issues" | "parent", label: string, error: unknown): void {
    const status = errorStatus(error);
    if (status === "404") {
      this.logger.debug(`No ${kind} found for ${label}`);
      return;
    }
    if (status) {
      this.logger.warn(`Error fetching ${kind} for ${label}: ${status}`);
      return;
    }
    this.logger.warn(`Exception fetching ${kind} for ${label}: ${errorMessage(error)}`);
  }
}
