/**
 * GitHub tools: repositories, commits, pull requests, issues, contents,
 * Actions runs and Projects (v2) boards.
 *
 * Repository arguments accept `owner/name` or a bare name completed with the
 * configured owner.
 */

import { z } from 'zod';
import type { GitHubClient, GitHubIssue, GitHubLabel } from '../clients/github/index.js';
import { ToolBuilder, parseArgs, splitList, type PropertySpec, type RegisteredTool } from './base.js';

/** Commit diff patches are cut to this many characters per file */
export const PATCH_PREVIEW_LENGTH = 500;

const repoArg: PropertySpec = {
  type: 'string',
  description: 'Repository (owner/repo, or a bare name for the default owner)',
  required: true,
};
const stateArg: PropertySpec = { type: 'string', description: 'State filter', enum: ['open', 'closed', 'all'] };

const perPage = (fallback: number) => z.number().int().positive().max(100).default(fallback);

function labelName(label: string | GitHubLabel): string {
  return typeof label === 'string' ? label : label.name ?? '';
}

function issueSummary(issue: GitHubIssue) {
  return {
    number: issue.number,
    title: issue.title,
    state: issue.state,
    user: issue.user?.login ?? '',
    assignees: (issue.assignees ?? []).map((assignee) => assignee.login),
    labels: (issue.labels ?? []).map(labelName),
    created_at: issue.created_at,
    html_url: issue.html_url,
  };
}

export function createGitHubTools(client: GitHubClient): RegisteredTool[] {
  return new ToolBuilder()
    // =========================================================================
    // REPOSITORIES
    // =========================================================================
    .add(
      'github_list_repos',
      'List your recently updated repositories, or search repositories by keyword',
      {
        search: { type: 'string', description: 'Search keywords; empty lists your own repositories' },
      },
      async (args) => {
        const { search } = parseArgs(z.object({ search: z.string().optional() }), args);
        const repos = search ? await client.searchRepos(search) : await client.listRepos();
        return repos.map((repo) => ({
          full_name: repo.full_name,
          description: repo.description ?? '',
          html_url: repo.html_url,
          default_branch: repo.default_branch ?? 'main',
          language: repo.language ?? '',
          updated_at: repo.updated_at ?? '',
          private: repo.private ?? false,
        }));
      }
    )

    // =========================================================================
    // COMMITS
    // =========================================================================
    .add(
      'github_get_commits',
      'List commits of a repository, newest first',
      {
        repo: repoArg,
        branch: { type: 'string', description: 'Branch name; default branch when empty' },
        since: { type: 'string', description: 'Only commits after this ISO 8601 timestamp' },
        until: { type: 'string', description: 'Only commits before this ISO 8601 timestamp' },
        per_page: { type: 'number', description: 'Number of commits (default 20)' },
      },
      async (args) => {
        const params = parseArgs(
          z.object({
            repo: z.string().min(1),
            branch: z.string().optional(),
            since: z.string().optional(),
            until: z.string().optional(),
            per_page: perPage(20),
          }),
          args
        );
        const commits = await client.getCommits(params.repo, {
          branch: params.branch,
          since: params.since,
          until: params.until,
          perPage: params.per_page,
        });
        return commits.map((commit) => ({
          sha: commit.sha.slice(0, 8),
          message: commit.commit.message.trim(),
          author: commit.commit.author?.name ?? '',
          date: commit.commit.author?.date ?? '',
          html_url: commit.html_url ?? '',
        }));
      }
    )
    .add(
      'github_get_commit_diff',
      'Show the files changed by a commit with a preview of each patch',
      {
        repo: repoArg,
        sha: { type: 'string', description: 'Commit SHA', required: true },
      },
      async (args) => {
        const { repo, sha } = parseArgs(z.object({ repo: z.string().min(1), sha: z.string().min(1) }), args);
        const detail = await client.getCommitDetail(repo, sha);
        return (detail.files ?? []).map((file) => ({
          filename: file.filename,
          status: file.status ?? '',
          additions: file.additions ?? 0,
          deletions: file.deletions ?? 0,
          patch: (file.patch ?? '').slice(0, PATCH_PREVIEW_LENGTH),
        }));
      }
    )

    // =========================================================================
    // PULL REQUESTS & ISSUES
    // =========================================================================
    .add(
      'github_get_pull_requests',
      'List pull requests of a repository',
      {
        repo: repoArg,
        state: stateArg,
        per_page: { type: 'number', description: 'Number of pull requests (default 20)' },
      },
      async (args) => {
        const params = parseArgs(
          z.object({
            repo: z.string().min(1),
            state: z.enum(['open', 'closed', 'all']).default('open'),
            per_page: perPage(20),
          }),
          args
        );
        const pulls = await client.getPullRequests(params.repo, { state: params.state, perPage: params.per_page });
        return pulls.map((pr) => ({
          number: pr.number,
          title: pr.title,
          state: pr.state,
          user: pr.user?.login ?? '',
          head: pr.head?.ref ?? '',
          base: pr.base?.ref ?? '',
          created_at: pr.created_at,
          html_url: pr.html_url,
        }));
      }
    )
    .add(
      'github_get_issues',
      'List issues of a repository (pull requests excluded)',
      {
        repo: repoArg,
        state: stateArg,
        labels: { type: 'string', description: 'Comma-separated label filter' },
        per_page: { type: 'number', description: 'Number of issues (default 20)' },
      },
      async (args) => {
        const params = parseArgs(
          z.object({
            repo: z.string().min(1),
            state: z.enum(['open', 'closed', 'all']).default('open'),
            labels: z.string().optional(),
            per_page: perPage(20),
          }),
          args
        );
        const issues = await client.getIssues(params.repo, {
          state: params.state,
          labels: params.labels,
          perPage: params.per_page,
        });
        return issues.map(issueSummary);
      }
    )
    .add(
      'github_create_issue',
      'Open a new issue',
      {
        repo: repoArg,
        title: { type: 'string', description: 'Issue title', required: true },
        body: { type: 'string', description: 'Issue body (Markdown)' },
        labels: { type: 'string', description: 'Comma-separated labels, e.g. "bug,urgent"' },
        assignees: { type: 'string', description: 'Comma-separated GitHub logins' },
      },
      async (args) => {
        const params = parseArgs(
          z.object({
            repo: z.string().min(1),
            title: z.string().min(1),
            body: z.string().optional(),
            labels: z.string().optional(),
            assignees: z.string().optional(),
          }),
          args
        );
        const issue = await client.createIssue(params.repo, {
          title: params.title,
          body: params.body,
          labels: splitList(params.labels),
          assignees: splitList(params.assignees),
        });
        return {
          number: issue.number,
          title: issue.title,
          state: issue.state,
          html_url: issue.html_url,
          message: `Issue #${issue.number} created: ${params.title}`,
        };
      }
    )
    .add(
      'github_update_issue',
      'Update an existing issue; empty arguments leave the field unchanged',
      {
        repo: repoArg,
        issue_number: { type: 'number', description: 'Issue number', required: true },
        title: { type: 'string', description: 'New title' },
        body: { type: 'string', description: 'New body' },
        state: { type: 'string', description: 'New state', enum: ['open', 'closed'] },
        labels: { type: 'string', description: 'Comma-separated labels replacing the current ones' },
      },
      async (args) => {
        const params = parseArgs(
          z.object({
            repo: z.string().min(1),
            issue_number: z.number().int().positive(),
            title: z.string().optional(),
            body: z.string().optional(),
            state: z.enum(['open', 'closed', '']).optional(),
            labels: z.string().optional(),
          }),
          args
        );
        const issue = await client.updateIssue(params.repo, params.issue_number, {
          title: params.title || undefined,
          body: params.body || undefined,
          state: params.state || undefined,
          labels: splitList(params.labels),
        });
        return {
          number: issue.number,
          title: issue.title,
          state: issue.state,
          html_url: issue.html_url,
          message: `Issue #${issue.number} updated`,
        };
      }
    )

    // =========================================================================
    // CONTENTS & SEARCH
    // =========================================================================
    .add(
      'github_get_file',
      'Read a file from a repository',
      {
        repo: repoArg,
        file_path: { type: 'string', description: 'Path inside the repository, e.g. src/index.ts', required: true },
        ref: { type: 'string', description: 'Branch, tag or commit SHA; default branch when empty' },
      },
      async (args) => {
        const params = parseArgs(
          z.object({ repo: z.string().min(1), file_path: z.string().min(1), ref: z.string().optional() }),
          args
        );
        const file = await client.getFile(params.repo, params.file_path, params.ref);
        return {
          name: file.name,
          path: file.path,
          size: file.size,
          content: file.content ?? '',
        };
      }
    )
    .add(
      'github_list_directory',
      'List the entries of a repository directory',
      {
        repo: repoArg,
        path: { type: 'string', description: 'Directory path; repository root when empty' },
        ref: { type: 'string', description: 'Branch, tag or commit SHA' },
      },
      async (args) => {
        const params = parseArgs(
          z.object({ repo: z.string().min(1), path: z.string().optional(), ref: z.string().optional() }),
          args
        );
        const entries = await client.getRepositoryTree(params.repo, params.path, params.ref);
        return entries.map((entry) => ({
          name: entry.name,
          path: entry.path,
          type: entry.type,
          size: entry.size,
        }));
      }
    )
    .add(
      'github_search_code',
      'Search code inside one repository',
      {
        repo: repoArg,
        query: { type: 'string', description: 'Search keywords', required: true },
      },
      async (args) => {
        const { repo, query } = parseArgs(z.object({ repo: z.string().min(1), query: z.string().min(1) }), args);
        const items = await client.searchCode(repo, query);
        return items.map((item) => ({ name: item.name, path: item.path, html_url: item.html_url }));
      }
    )

    // =========================================================================
    // ACTIONS
    // =========================================================================
    .add(
      'github_get_actions',
      'List GitHub Actions workflow runs',
      {
        repo: repoArg,
        status: { type: 'string', description: 'Run status filter, e.g. completed, in_progress, queued' },
        per_page: { type: 'number', description: 'Number of runs (default 10)' },
      },
      async (args) => {
        const params = parseArgs(
          z.object({ repo: z.string().min(1), status: z.string().optional(), per_page: perPage(10) }),
          args
        );
        const runs = await client.getWorkflowRuns(params.repo, { status: params.status, perPage: params.per_page });
        return runs.map((run) => ({
          id: run.id,
          name: run.name ?? '',
          status: run.status ?? '',
          conclusion: run.conclusion ?? '',
          branch: run.head_branch ?? '',
          created_at: run.created_at,
          html_url: run.html_url,
        }));
      }
    )

    // =========================================================================
    // PROJECTS
    // =========================================================================
    .add(
      'github_list_projects',
      'List the Projects (v2) boards of a user or organization',
      {
        owner: { type: 'string', description: 'User or organization; default owner when empty' },
      },
      async (args) => {
        const { owner } = parseArgs(z.object({ owner: z.string().optional() }), args);
        const projects = await client.listProjects(owner || undefined);
        return projects.map((project) => ({
          id: project.id,
          number: project.number,
          title: project.title,
          url: project.url,
          closed: project.closed,
        }));
      }
    )
    .add(
      'github_get_project_items',
      'List the items of a project board, found by name',
      {
        project: { type: 'string', description: 'Board name (exact or partial)', required: true },
        owner: { type: 'string', description: 'User or organization; default owner when empty' },
      },
      async (args) => {
        const params = parseArgs(z.object({ project: z.string().min(1), owner: z.string().optional() }), args);
        const project = await client.findProjectByName(params.project, params.owner || undefined);
        if (!project) {
          return { success: false, error: `Project "${params.project}" not found` };
        }
        const items = await client.getProjectItems(project.id);
        return { project: project.title, items };
      }
    )
    .add(
      'github_add_issue_to_project',
      'Add an issue to a project board, found by name',
      {
        project: { type: 'string', description: 'Board name (exact or partial)', required: true },
        repo: repoArg,
        issue_number: { type: 'number', description: 'Issue number', required: true },
        owner: { type: 'string', description: 'Board owner; default owner when empty' },
      },
      async (args) => {
        const params = parseArgs(
          z.object({
            project: z.string().min(1),
            repo: z.string().min(1),
            issue_number: z.number().int().positive(),
            owner: z.string().optional(),
          }),
          args
        );
        const project = await client.findProjectByName(params.project, params.owner || undefined);
        if (!project) {
          return { success: false, error: `Project "${params.project}" not found` };
        }
        const { itemId } = await client.addIssueToProject(project.id, params.repo, params.issue_number);
        return {
          success: true,
          itemId,
          project: project.title,
          message: `Issue #${params.issue_number} added to ${project.title}`,
        };
      }
    )
    .build();
}
