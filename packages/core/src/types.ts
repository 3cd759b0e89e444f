export const ISSUE_TYPES = ["bug", "enhancement", "requirement", "theme", "task"] as const;
export const TOP_PRIORITIES = ["p.must-have", "s.high", "s.critical"] as const;
export const IGNORE_LABELS = ["wontfix", "duplicate", "invalid"] as const;

export type KnownIssueType = (typeof ISSUE_TYPES)[number];
export type IssueType = KnownIssueType | "unknown";
export type IssueState = "open" | "closed";
export type StateFilter = IssueState | "all";
export type ReportKind = "planning" | "known_bugs";

/**
 * Issue as the tracker returns it, before labels are interpreted.
 * Timestamps are ISO strings, with or without a zone designator.
 */
export interface TrackerIssue {
  number: number;
  title: string;
  html_url: string;
  state: IssueState;
  labels: Array<{ name: string } | string>;
  updated_at?: string | null;
  closed_at?: string | null;
}

export interface Issue {
  readonly number: number;
  readonly title: string;
  readonly url: string;
  readonly state: IssueState;
  readonly type: IssueType;
  readonly priority: string;
  readonly labels: readonly string[];
  readonly updatedAt?: string;
  readonly closedAt?: string;
}

export type IssuesByType = Record<KnownIssueType, Issue[]>;
export type RepoIssues = Map<string, IssuesByType>;

/** Minimal shape of an entry returned by the sub-issue and parent lookups. */
export interface RelatedIssue {
  number: number;
  title?: string;
  html_url?: string;
  state?: string;
}

export interface FetchedParent {
  number: number;
  title: string;
  url: string;
  state: string;
}

export type ParentChildMap = Map<number, number[]>;

export interface HierarchyResolution {
  parentToChildren: ParentChildMap;
  childNumbers: Set<number>;
  fetchedParents: Map<number, FetchedParent>;
}

export interface HierarchySource {
  fetchSubIssues(issueNumber: number): Promise<RelatedIssue[]>;
  fetchParentIssue(issueNumber: number): Promise<RelatedIssue | null>;
}

export interface OrgIssueQuery {
  org: string;
  typeLabel: KnownIssueType;
  state: StateFilter;
  since?: string;
  until?: string;
}

export interface OrgIssueSource {
  fetchOrgIssues(query: OrgIssueQuery): AsyncIterable<TrackerIssue>;
  hierarchySource(owner: string, repo: string): HierarchySource;
}

export interface ProductInfo {
  repositories?: string[];
  ignore?: boolean;
  description?: string;
  [key: string]: unknown;
}

export interface ProductsConfig {
  products: Record<string, ProductInfo>;
}

export interface ComponentAssignment {
  productName: string;
  productInfo: ProductInfo;
}

export type ComponentMap = Map<string, ComponentAssignment>;

export interface ReportRow {
  repo: string;
  number: number;
  title: string;
  url: string;
  type: IssueType;
  priority: string;
  status: string;
  onDeck: boolean;
  child: boolean;
}

export interface KnownBugsSection {
  kind: "known_bugs";
  repo: string;
  rows: ReportRow[];
}

export interface PlanningSection {
  kind: "planning";
  repo: string;
  parentRows: ReportRow[];
  otherRows: ReportRow[];
}

export type RepoSection = KnownBugsSection | PlanningSection;

export type TypeCounts = Record<KnownIssueType, number>;

export interface MetricsBucket {
  key: string;
  total: number;
  byType: TypeCounts;
}

export interface MetricsSummary {
  dimension: "repository" | "component";
  buckets: MetricsBucket[];
  grandTotal: MetricsBucket;
  repoTotals: Map<string, number>;
}

export type ReportBlock =
  | { kind: "header"; level: number; text: string }
  | { kind: "line"; text: string }
  | { kind: "table"; columns: string[]; rows: string[][] };

export interface DocumentBuilder {
  header(level: number, text: string): void;
  line(text?: string): void;
  table(columns: string[], rows: string[][]): void;
}
