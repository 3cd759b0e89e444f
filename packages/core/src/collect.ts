import { silentLogger, type Logger } from "./logger.js";
import { createIssuesByType } from "./report.js";
import { isAfterEndTime } from "./rules/end-time.js";
import { hasIgnoredLabel, repoNameFromUrl, toIssueRecord } from "./rules/issue-classifier.js";
import {
  ISSUE_TYPES,
  type KnownIssueType,
  type OrgIssueSource,
  type RepoIssues,
  type StateFilter
} from "./types.js";

export interface CollectOptions {
  org: string;
  /** Repository names to keep; empty keeps every repository. */
  repos?: string[];
  state?: StateFilter;
  since?: string;
  until?: string;
  ignoreTypes?: KnownIssueType[];
  logger?: Logger;
}

/**
 * Runs one organization-wide search per issue type and files each result under
 * its repository and the searched type. An issue carrying two type labels is
 * filed under both.
 */
export async function collectOrgIssues(
  source: Pick<OrgIssueSource, "fetchOrgIssues">,
  options: CollectOptions
): Promise<RepoIssues> {
  const logger = options.logger ?? silentLogger;
  const state = options.state ?? "all";
  const repoFilter = new Set(options.repos ?? []);
  const ignoreTypes = new Set(options.ignoreTypes ?? []);
  const result: RepoIssues = new Map();

  for (const typeLabel of ISSUE_TYPES) {
    if (ignoreTypes.has(typeLabel)) {
      continue;
    }

    logger.debug(`Searching ${options.org} for ${typeLabel} issues`);
    let matched = 0;
    try {
      const stream = source.fetchOrgIssues({
        org: options.org,
        typeLabel,
        state,
        ...(options.since ? { since: options.since } : {}),
        ...(options.until ? { until: options.until } : {})
      });

      for await (const raw of stream) {
        const repo = repoNameFromUrl(raw.html_url);
        if (!repo) {
          logger.warn(`Could not determine repository for issue #${raw.number} (${raw.html_url})`);
          continue;
        }
        if (repoFilter.size > 0 && !repoFilter.has(repo)) {
          continue;
        }

        const issue = toIssueRecord(raw);
        if (hasIgnoredLabel(issue.labels)) {
          continue;
        }
        if (isAfterEndTime(issue, state, options.until)) {
          continue;
        }

        const bucket = result.get(repo) ?? createIssuesByType();
        bucket[typeLabel].push(issue);
        result.set(repo, bucket);
        matched += 1;
      }
    } catch (error: unknown) {
      logger.error(
        `Issue search failed for ${typeLabel} in ${options.org}: ${error instanceof Error ? error.message : String(error)}`
      );
      continue;
    }
    logger.info(`Found ${matched} ${typeLabel} issues in ${options.org}`);
  }

  return result;
}
