import { describe, it, expect, vi, beforeEach } from 'vitest';
import { GitHubClient } from '../clients/github/index.js';
import { createGitHubTools, PATCH_PREVIEW_LENGTH } from './github-tools.js';
import { ToolArgumentError, type RegisteredTool } from './base.js';

const fetchMock = vi.fn<typeof fetch>();

function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), { status, headers: { 'content-type': 'application/json' } });
}

function find(tools: RegisteredTool[], name: string): RegisteredTool {
  const tool = tools.find((candidate) => candidate.definition.name === name);
  if (!tool) throw new Error(`Tool not registered: ${name}`);
  return tool;
}

describe('GitHub tools', () => {
  let tools: RegisteredTool[];

  beforeEach(() => {
    fetchMock.mockReset();
    tools = createGitHubTools(new GitHubClient({ token: 'test-token', owner: 'acme', fetch: fetchMock }));
  });

  it('should register every GitHub tool', () => {
    expect(tools.map((tool) => tool.definition.name)).toEqual([
      'github_list_repos',
      'github_get_commits',
      'github_get_commit_diff',
      'github_get_pull_requests',
      'github_get_issues',
      'github_create_issue',
      'github_update_issue',
      'github_get_file',
      'github_list_directory',
      'github_search_code',
      'github_get_actions',
      'github_list_projects',
      'github_get_project_items',
      'github_add_issue_to_project',
    ]);
    expect(find(tools, 'github_get_commit_diff').definition.inputSchema.required).toEqual(['repo', 'sha']);
  });

  it('should summarize commits', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse([
        {
          sha: '0123456789abcdef',
          html_url: 'https://github.com/acme/widgets/commit/0123456789abcdef',
          commit: { message: 'Fix login\n\n', author: { name: 'Dev One', date: '2025-02-01T09:00:00Z' } },
        },
      ])
    );

    const result = await find(tools, 'github_get_commits').handler({ repo: 'widgets' });

    expect(result).toEqual([
      {
        sha: '01234567',
        message: 'Fix login',
        author: 'Dev One',
        date: '2025-02-01T09:00:00Z',
        html_url: 'https://github.com/acme/widgets/commit/0123456789abcdef',
      },
    ]);
  });

  it('should cut long patches in commit diffs', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        sha: 'abc',
        commit: { message: 'Big change' },
        files: [{ filename: 'src/a.ts', status: 'modified', additions: 900, deletions: 0, patch: 'x'.repeat(900) }],
      })
    );

    const result = await find(tools, 'github_get_commit_diff').handler({ repo: 'widgets', sha: 'abc' });

    expect(result).toEqual([
      { filename: 'src/a.ts', status: 'modified', additions: 900, deletions: 0, patch: 'x'.repeat(PATCH_PREVIEW_LENGTH) },
    ]);
  });

  it('should split comma-separated labels and assignees', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse(
        { number: 12, title: 'Flaky test', state: 'open', created_at: '2025-01-01T00:00:00Z', html_url: 'https://github.com/acme/widgets/issues/12' },
        201
      )
    );

    const result = await find(tools, 'github_create_issue').handler({
      repo: 'widgets',
      title: 'Flaky test',
      labels: 'bug, ci ,,',
      assignees: '',
    });

    const [, init] = fetchMock.mock.calls[0] ?? [];
    expect(typeof init?.body === 'string' ? JSON.parse(init.body) : null).toEqual({ title: 'Flaky test', labels: ['bug', 'ci'] });
    expect(result).toEqual({
      number: 12,
      title: 'Flaky test',
      state: 'open',
      html_url: 'https://github.com/acme/widgets/issues/12',
      message: 'Issue #12 created: Flaky test',
    });
  });

  it('should report an unknown project board without failing', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ data: { repositoryOwner: { projectsV2: { nodes: [] } } } }));

    const result = await find(tools, 'github_get_project_items').handler({ project: 'Backlog' });

    expect(result).toEqual({ success: false, error: 'Project "Backlog" not found' });
  });

  it('should reject invalid arguments before calling GitHub', async () => {
    const call = find(tools, 'github_update_issue').handler({ repo: 'widgets', issue_number: 'seven' });

    await expect(call).rejects.toBeInstanceOf(ToolArgumentError);
    await expect(call).rejects.toThrow('Invalid arguments: issue_number: Expected number, received string');
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
