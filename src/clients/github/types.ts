/**
 * GitHub payload shapes, limited to the fields the gateway reads.
 */

export interface GitHubUser {
  login: string;
}

export interface GitHubRepo {
  full_name: string;
  description: string | null;
  html_url: string;
  default_branch?: string;
  language?: string | null;
  updated_at?: string | null;
  private?: boolean;
}

export interface GitHubCommitFile {
  filename: string;
  status?: string;
  additions?: number;
  deletions?: number;
  patch?: string;
}

export interface GitHubCommit {
  sha: string;
  html_url?: string;
  commit: {
    message: string;
    author?: { name?: string; date?: string } | null;
  };
  files?: GitHubCommitFile[];
}

export interface GitHubPullRequest {
  number: number;
  title: string;
  state: string;
  user?: GitHubUser | null;
  head?: { ref: string };
  base?: { ref: string };
  created_at: string;
  html_url: string;
}

export interface GitHubLabel {
  name?: string;
}

export interface GitHubIssue {
  number: number;
  title: string;
  state: string;
  node_id?: string;
  body?: string | null;
  user?: GitHubUser | null;
  assignees?: GitHubUser[] | null;
  labels?: Array<string | GitHubLabel>;
  created_at: string;
  html_url: string;
  /** Present when the entry is really a pull request */
  pull_request?: unknown;
}

export interface GitHubContent {
  type: string;
  name: string;
  path: string;
  sha?: string;
  size: number;
  content?: string;
  encoding?: string;
  html_url?: string | null;
  download_url?: string | null;
}

export interface GitHubCodeSearchItem {
  name: string;
  path: string;
  html_url: string;
}

export interface GitHubWorkflowRun {
  id: number;
  name?: string | null;
  status?: string | null;
  conclusion?: string | null;
  head_branch?: string | null;
  created_at: string;
  html_url: string;
}

export interface SearchResult<T> {
  total_count?: number;
  items?: T[];
}

export interface WorkflowRunsResult {
  total_count?: number;
  workflow_runs?: GitHubWorkflowRun[];
}

// Projects (v2), GraphQL

export interface GitHubProject {
  id: string;
  number: number;
  title: string;
  url: string;
  closed: boolean;
  shortDescription?: string | null;
}

export interface GitHubProjectItem {
  id: string;
  /** ISSUE, PULL_REQUEST, DRAFT_ISSUE or REDACTED */
  type: string;
  title: string;
  number: number | null;
  state: string | null;
  url: string | null;
  /** Value of the board's "Status" single-select field */
  status: string | null;
}

// Operation options; unset or empty fields are not sent

export interface CommitFilters {
  branch?: string;
  since?: string;
  until?: string;
  perPage?: number;
}

export type IssueState = 'open' | 'closed' | 'all';

export interface PullRequestFilters {
  state?: IssueState;
  perPage?: number;
}

export interface IssueFilters {
  state?: IssueState;
  /** Comma-separated label names */
  labels?: string;
  perPage?: number;
}

export interface CreateIssueInput {
  title: string;
  body?: string;
  labels?: string[];
  assignees?: string[];
}

export interface UpdateIssueInput {
  title?: string;
  body?: string;
  state?: 'open' | 'closed';
  labels?: string[];
}

export interface WorkflowRunFilters {
  status?: string;
  perPage?: number;
}
