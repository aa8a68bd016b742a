/**
 * GitHub Client
 *
 * REST access to repositories, commits, pull requests, issues, contents,
 * code search and Actions runs, plus GraphQL access to Projects (v2) boards.
 *
 * Stateless apart from the immutable token and default owner. Calls are not
 * retried: any non-2xx response surfaces as GitHubApiError.
 */

import { Octokit } from '@octokit/rest';
import { RequestError } from '@octokit/request-error';
import { GraphqlResponseError } from '@octokit/graphql';
import { createLogger } from '../../lib/logger.js';
import { matchByName } from '../../lib/name-match.js';
import { compact } from '../../lib/params.js';
import { GitHubApiError, GitHubGraphqlError, errorMessage } from '../../lib/errors.js';
import type {
  CommitFilters,
  CreateIssueInput,
  GitHubCodeSearchItem,
  GitHubCommit,
  GitHubContent,
  GitHubIssue,
  GitHubProject,
  GitHubProjectItem,
  GitHubPullRequest,
  GitHubRepo,
  GitHubWorkflowRun,
  IssueFilters,
  PullRequestFilters,
  SearchResult,
  UpdateIssueInput,
  WorkflowRunFilters,
  WorkflowRunsResult,
} from './types.js';

const logger = createLogger('github');

export const GITHUB_API_BASE = 'https://api.github.com';
export const GITHUB_API_VERSION = '2022-11-28';
export const REQUEST_TIMEOUT_MS = 30_000;

/** Reserved expansion keeps the `/` separators of a content path but escapes spaces and braces */
const CONTENTS_ROUTE = 'GET /repos/{owner}/{repo}/contents/{+path}';

export interface GitHubClientOptions {
  token: string;
  /** Completes bare repository names: `widgets` -> `<owner>/widgets` */
  owner?: string;
  baseUrl?: string;
  /** Replaces the global fetch (tests, proxies) */
  fetch?: typeof fetch;
}

// =============================================================================
// GRAPHQL DOCUMENTS
// =============================================================================

const LIST_PROJECTS_QUERY = `
  query ListProjects($owner: String!, $first: Int!) {
    repositoryOwner(login: $owner) {
      ... on ProjectV2Owner {
        projectsV2(first: $first) {
          nodes { id number title url closed shortDescription }
        }
      }
    }
  }
`;

const PROJECT_ITEMS_QUERY = `
  query ProjectItems($projectId: ID!, $first: Int!) {
    node(id: $projectId) {
      ... on ProjectV2 {
        items(first: $first) {
          nodes {
            id
            type
            content {
              ... on Issue { title number state url }
              ... on PullRequest { title number state url }
              ... on DraftIssue { title }
            }
            fieldValueByName(name: "Status") {
              ... on ProjectV2ItemFieldSingleSelectValue { name }
            }
          }
        }
      }
    }
  }
`;

const ADD_PROJECT_ITEM_MUTATION = `
  mutation AddProjectItem($projectId: ID!, $contentId: ID!) {
    addProjectV2ItemById(input: { projectId: $projectId, contentId: $contentId }) {
      item { id }
    }
  }
`;

interface ListProjectsResponse {
  repositoryOwner: {
    projectsV2?: { nodes: Array<GitHubProject | null> };
  } | null;
}

interface ProjectItemNode {
  id: string;
  type: string;
  content: { title?: string; number?: number; state?: string; url?: string } | null;
  fieldValueByName: { name?: string } | null;
}

interface ProjectItemsResponse {
  node: { items?: { nodes: Array<ProjectItemNode | null> } } | null;
}

interface AddProjectItemResponse {
  addProjectV2ItemById: { item: { id: string } | null } | null;
}

// =============================================================================
// CLIENT
// =============================================================================

export class GitHubClient {
  readonly owner: string;
  private readonly octokit: Octokit;
  private readonly headers: Record<string, string>;

  constructor(options: GitHubClientOptions) {
    this.owner = options.owner ?? '';
    this.headers = {
      authorization: `Bearer ${options.token}`,
      accept: 'application/vnd.github+json',
      'x-github-api-version': GITHUB_API_VERSION,
    };
    this.octokit = new Octokit({
      baseUrl: options.baseUrl ?? GITHUB_API_BASE,
      request: options.fetch ? { fetch: options.fetch } : undefined,
    });
  }

  /**
   * Complete a repository reference. `owner/name` passes through unchanged;
   * a bare name gets the default owner, or stays bare without one.
   */
  fullRepo(repo: string): string {
    if (repo.includes('/')) return repo;
    if (this.owner) return `${this.owner}/${repo}`;
    return repo;
  }

  /**
   * `{owner, repo}` route parameters for a repository reference
   */
  repoParams(repo: string): { owner: string; repo: string } {
    const full = this.fullRepo(repo);
    const slash = full.indexOf('/');
    if (slash < 0) {
      throw new Error(`Repository "${repo}" has no owner and no default GitHub owner is configured`);
    }
    return { owner: full.slice(0, slash), repo: full.slice(slash + 1) };
  }

  /**
   * Route values (owner, repo, path, ...) go in `params` and are expanded
   * by the route template, never spliced into the route itself.
   */
  private async request<T>(route: string, params: Record<string, unknown> = {}): Promise<T> {
    try {
      const response = await this.octokit.request(route, {
        ...params,
        headers: this.headers,
        request: { signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS) },
      });
      return response.data;
    } catch (error) {
      throw toGitHubError(error, route);
    }
  }

  private async graphql<T>(document: string, variables: Record<string, unknown>): Promise<T> {
    try {
      return await this.octokit.graphql<T>(document, {
        ...variables,
        headers: this.headers,
        request: { signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS) },
      });
    } catch (error) {
      throw toGitHubError(error, 'POST /graphql');
    }
  }

  // ===========================================================================
  // REPOSITORIES
  // ===========================================================================

  async listRepos(perPage = 20): Promise<GitHubRepo[]> {
    const repos = await this.request<GitHubRepo[]>('GET /user/repos', {
      per_page: perPage,
      sort: 'updated',
      direction: 'desc',
    });
    logger.debug({ count: repos.length }, 'Listed repositories');
    return repos;
  }

  async searchRepos(query: string, perPage = 10): Promise<GitHubRepo[]> {
    const result = await this.request<SearchResult<GitHubRepo>>('GET /search/repositories', {
      q: query,
      per_page: perPage,
      sort: 'updated',
    });
    const items = result.items ?? [];
    logger.debug({ query, count: items.length }, 'Searched repositories');
    return items;
  }

  async getRepo(repo: string): Promise<GitHubRepo> {
    return this.request<GitHubRepo>('GET /repos/{owner}/{repo}', this.repoParams(repo));
  }

  // ===========================================================================
  // COMMITS
  // ===========================================================================

  async getCommits(repo: string, filters: CommitFilters = {}): Promise<GitHubCommit[]> {
    const full = this.fullRepo(repo);
    const commits = await this.request<GitHubCommit[]>('GET /repos/{owner}/{repo}/commits', {
      ...this.repoParams(repo),
      per_page: filters.perPage ?? 20,
      ...compact({ sha: filters.branch, since: filters.since, until: filters.until }),
    });
    logger.info({ repo: full, count: commits.length }, 'Fetched commits');
    return commits;
  }

  async getCommitDetail(repo: string, sha: string): Promise<GitHubCommit> {
    const full = this.fullRepo(repo);
    const commit = await this.request<GitHubCommit>('GET /repos/{owner}/{repo}/commits/{ref}', {
      ...this.repoParams(repo),
      ref: sha,
    });
    logger.info({ repo: full, sha: sha.slice(0, 8), files: commit.files?.length ?? 0 }, 'Fetched commit detail');
    return commit;
  }

  // ===========================================================================
  // PULL REQUESTS & ISSUES
  // ===========================================================================

  async getPullRequests(repo: string, filters: PullRequestFilters = {}): Promise<GitHubPullRequest[]> {
    const full = this.fullRepo(repo);
    const state = filters.state ?? 'open';
    const pulls = await this.request<GitHubPullRequest[]>('GET /repos/{owner}/{repo}/pulls', {
      ...this.repoParams(repo),
      state,
      per_page: filters.perPage ?? 20,
      sort: 'updated',
    });
    logger.info({ repo: full, state, count: pulls.length }, 'Fetched pull requests');
    return pulls;
  }

  /**
   * The issues endpoint also returns pull requests; those carry a
   * `pull_request` key and are dropped here.
   */
  async getIssues(repo: string, filters: IssueFilters = {}): Promise<GitHubIssue[]> {
    const full = this.fullRepo(repo);
    const state = filters.state ?? 'open';
    const entries = await this.request<GitHubIssue[]>('GET /repos/{owner}/{repo}/issues', {
      ...this.repoParams(repo),
      state,
      per_page: filters.perPage ?? 20,
      ...compact({ labels: filters.labels }),
    });
    const issues = entries.filter((entry) => !('pull_request' in entry));
    logger.info({ repo: full, state, count: issues.length }, 'Fetched issues');
    return issues;
  }

  async getIssue(repo: string, issueNumber: number): Promise<GitHubIssue> {
    return this.request<GitHubIssue>('GET /repos/{owner}/{repo}/issues/{issue_number}', {
      ...this.repoParams(repo),
      issue_number: issueNumber,
    });
  }

  async createIssue(repo: string, input: CreateIssueInput): Promise<GitHubIssue> {
    const full = this.fullRepo(repo);
    const issue = await this.request<GitHubIssue>('POST /repos/{owner}/{repo}/issues', {
      ...this.repoParams(repo),
      title: input.title,
      ...compact({
        body: input.body,
        labels: input.labels?.length ? input.labels : undefined,
        assignees: input.assignees?.length ? input.assignees : undefined,
      }),
    });
    logger.info({ repo: full, number: issue.number }, 'Created issue');
    return issue;
  }

  /**
   * Only the fields given are changed. An empty `labels` array clears the
   * labels; an empty `body` clears the description.
   */
  async updateIssue(repo: string, issueNumber: number, input: UpdateIssueInput): Promise<GitHubIssue> {
    const full = this.fullRepo(repo);
    const fields: Record<string, unknown> = { ...this.repoParams(repo), issue_number: issueNumber };
    if (input.title) fields.title = input.title;
    if (input.body !== undefined) fields.body = input.body;
    if (input.state) fields.state = input.state;
    if (input.labels !== undefined) fields.labels = input.labels;

    const issue = await this.request<GitHubIssue>('PATCH /repos/{owner}/{repo}/issues/{issue_number}', fields);
    logger.info({ repo: full, number: issueNumber }, 'Updated issue');
    return issue;
  }

  // ===========================================================================
  // CONTENTS & SEARCH
  // ===========================================================================

  /**
   * Read a file. Base64 content is returned decoded as UTF-8; invalid byte
   * sequences become U+FFFD.
   */
  async getFile(repo: string, filePath: string, ref?: string): Promise<GitHubContent> {
    const full = this.fullRepo(repo);
    const file = await this.request<GitHubContent>(CONTENTS_ROUTE, {
      ...this.repoParams(repo),
      path: filePath,
      ...compact({ ref }),
    });
    logger.info({ repo: full, path: filePath }, 'Read file');
    if (file.content && file.encoding === 'base64') {
      return { ...file, content: decodeBase64Content(file.content) };
    }
    return file;
  }

  async getRepositoryTree(repo: string, path?: string, ref?: string): Promise<GitHubContent[]> {
    const full = this.fullRepo(repo);
    const route = path ? CONTENTS_ROUTE : 'GET /repos/{owner}/{repo}/contents';
    const result = await this.request<GitHubContent | GitHubContent[]>(route, {
      ...this.repoParams(repo),
      ...compact({ path, ref }),
    });
    const entries = Array.isArray(result) ? result : [result];
    logger.info({ repo: full, path: path || '/', count: entries.length }, 'Listed directory');
    return entries;
  }

  async searchCode(repo: string, query: string): Promise<GitHubCodeSearchItem[]> {
    const full = this.fullRepo(repo);
    const result = await this.request<SearchResult<GitHubCodeSearchItem>>('GET /search/code', {
      q: `${query} repo:${full}`,
      per_page: 20,
    });
    const items = result.items ?? [];
    logger.info({ repo: full, query, count: items.length }, 'Searched code');
    return items;
  }

  // ===========================================================================
  // ACTIONS
  // ===========================================================================

  async getWorkflowRuns(repo: string, filters: WorkflowRunFilters = {}): Promise<GitHubWorkflowRun[]> {
    const full = this.fullRepo(repo);
    const result = await this.request<WorkflowRunsResult>('GET /repos/{owner}/{repo}/actions/runs', {
      ...this.repoParams(repo),
      per_page: filters.perPage ?? 10,
      ...compact({ status: filters.status }),
    });
    const runs = result.workflow_runs ?? [];
    logger.info({ repo: full, count: runs.length }, 'Fetched workflow runs');
    return runs;
  }

  // ===========================================================================
  // PROJECTS (v2)
  // ===========================================================================

  async listProjects(owner?: string, first = 20): Promise<GitHubProject[]> {
    const login = owner || this.owner;
    if (!login) {
      throw new Error('No project owner given and no default GitHub owner configured');
    }

    const data = await this.graphql<ListProjectsResponse>(LIST_PROJECTS_QUERY, { owner: login, first });
    const projects = (data.repositoryOwner?.projectsV2?.nodes ?? []).filter(
      (project): project is GitHubProject => project !== null
    );
    logger.debug({ owner: login, count: projects.length }, 'Listed projects');
    return projects;
  }

  /**
   * Case-insensitive title lookup: exact beats substring, listing order
   * breaks ties. Null when no board matches.
   */
  async findProjectByName(name: string, owner?: string): Promise<GitHubProject | null> {
    const projects = await this.listProjects(owner);
    const project = matchByName(projects, name, (p) => [p.title]);
    if (!project) {
      logger.warn({ name, owner: owner || this.owner }, 'Project not found');
    }
    return project;
  }

  async getProjectItems(projectId: string, first = 50): Promise<GitHubProjectItem[]> {
    const data = await this.graphql<ProjectItemsResponse>(PROJECT_ITEMS_QUERY, { projectId, first });
    return (data.node?.items?.nodes ?? [])
      .filter((item): item is ProjectItemNode => item !== null)
      .map((item) => ({
        id: item.id,
        type: item.type,
        title: item.content?.title ?? '',
        number: item.content?.number ?? null,
        state: item.content?.state ?? null,
        url: item.content?.url ?? null,
        status: item.fieldValueByName?.name ?? null,
      }));
  }

  async addIssueToProject(projectId: string, repo: string, issueNumber: number): Promise<{ itemId: string }> {
    const issue = await this.getIssue(repo, issueNumber);
    if (!issue.node_id) {
      throw new GitHubApiError(`Issue #${issueNumber} has no node id`, 0);
    }

    const data = await this.graphql<AddProjectItemResponse>(ADD_PROJECT_ITEM_MUTATION, {
      projectId,
      contentId: issue.node_id,
    });
    const itemId = data.addProjectV2ItemById?.item?.id;
    if (!itemId) {
      throw new GitHubGraphqlError('addProjectV2ItemById returned no item');
    }
    logger.info({ projectId, repo: this.fullRepo(repo), issueNumber, itemId }, 'Added issue to project');
    return { itemId };
  }
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Decode GitHub's base64 file content, which is wrapped with newlines
 */
export function decodeBase64Content(content: string): string {
  return Buffer.from(content.replace(/\n/g, ''), 'base64').toString('utf8');
}

function toGitHubError(error: unknown, route: string): Error {
  if (error instanceof GraphqlResponseError) {
    const message = error.errors?.[0]?.message ?? error.message;
    logger.warn({ route, message }, 'GitHub GraphQL error');
    return new GitHubGraphqlError(message, { cause: error });
  }

  if (error instanceof RequestError) {
    // No response at all (DNS, reset, timeout) is reported as status 0
    const status = error.response ? error.status : 0;
    logger.warn({ route, status }, 'GitHub API request failed');
    return new GitHubApiError(`GitHub ${route} failed (${status}): ${error.message}`, status, { cause: error });
  }

  logger.error({ route, error: errorMessage(error) }, 'GitHub API request error');
  return new GitHubApiError(`GitHub ${route} failed: ${errorMessage(error)}`, 0, { cause: error });
}
