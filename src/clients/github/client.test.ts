import { describe, it, expect, vi, beforeEach } from 'vitest';
import { GitHubClient, decodeBase64Content } from './client.js';
import { GitHubApiError, GitHubGraphqlError } from '../../lib/errors.js';

const fetchMock = vi.fn<typeof fetch>();

function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'content-type': 'application/json; charset=utf-8' },
  });
}

function requestAt(index: number) {
  const call = fetchMock.mock.calls[index];
  if (!call) throw new Error(`No request #${index}`);
  const [input, init] = call;
  return {
    url: new URL(String(input)),
    method: init?.method,
    headers: new Headers(init?.headers),
    body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
  };
}

const issue = (number: number, extra: Record<string, unknown> = {}) => ({
  number,
  title: `Issue ${number}`,
  state: 'open',
  created_at: '2025-01-01T00:00:00Z',
  html_url: `https://github.com/acme/widgets/issues/${number}`,
  ...extra,
});

const project = (id: string, title: string) => ({
  id,
  number: Number(id.slice(1)),
  title,
  url: `https://github.com/orgs/acme/projects/${id.slice(1)}`,
  closed: false,
  shortDescription: null,
});

describe('GitHubClient', () => {
  let client: GitHubClient;

  beforeEach(() => {
    fetchMock.mockReset();
    client = new GitHubClient({ token: 'test-token', owner: 'acme', fetch: fetchMock });
  });

  describe('fullRepo', () => {
    it('should prefix bare names with the default owner', () => {
      expect(client.fullRepo('widgets')).toBe('acme/widgets');
    });

    it('should keep qualified names unchanged', () => {
      expect(client.fullRepo('other/gadgets')).toBe('other/gadgets');
    });

    it('should leave bare names alone without a default owner', () => {
      const ownerless = new GitHubClient({ token: 'test-token', fetch: fetchMock });
      expect(ownerless.fullRepo('widgets')).toBe('widgets');
    });

    it('should refuse a repository call for a bare name without a default owner', async () => {
      const ownerless = new GitHubClient({ token: 'test-token', fetch: fetchMock });

      await expect(ownerless.getRepo('widgets')).rejects.toThrow('Repository "widgets" has no owner');
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('requests', () => {
    it('should send bearer auth and the API version header', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse([]));

      await client.listRepos();

      const request = requestAt(0);
      expect(request.url.pathname).toBe('/user/repos');
      expect(request.headers.get('authorization')).toBe('Bearer test-token');
      expect(request.headers.get('x-github-api-version')).toBe('2022-11-28');
      expect(request.url.searchParams.get('sort')).toBe('updated');
    });

    it('should omit empty commit filters from the query', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse([]));

      await client.getCommits('widgets', { branch: '', since: undefined });

      const request = requestAt(0);
      expect(request.url.pathname).toBe('/repos/acme/widgets/commits');
      expect([...request.url.searchParams.keys()]).toEqual(['per_page']);
      expect(request.url.searchParams.get('per_page')).toBe('20');
    });

    it('should map the branch filter to sha', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse([]));

      await client.getCommits('widgets', { branch: 'develop', perPage: 5 });

      const request = requestAt(0);
      expect(request.url.searchParams.get('sha')).toBe('develop');
      expect(request.url.searchParams.get('per_page')).toBe('5');
    });
  });

  describe('getIssues', () => {
    it('should drop pull requests and keep the order of issues', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse([issue(1), issue(2, { pull_request: { url: 'x' } }), issue(3)])
      );

      const issues = await client.getIssues('widgets');

      expect(issues.map((entry) => entry.number)).toEqual([1, 3]);
    });

    it('should not send a labels filter when none is given', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse([]));

      await client.getIssues('widgets', { state: 'closed' });

      const request = requestAt(0);
      expect(request.url.searchParams.get('state')).toBe('closed');
      expect(request.url.searchParams.has('labels')).toBe(false);
    });
  });

  describe('createIssue', () => {
    it('should send only the title when optional fields are empty', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(issue(9), 201));

      const created = await client.createIssue('widgets', { title: 'Broken build', labels: [], assignees: [] });

      expect(created.number).toBe(9);
      expect(requestAt(0).method).toBe('POST');
      expect(requestAt(0).body).toEqual({ title: 'Broken build' });
    });

    it('should include labels and assignees when given', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(issue(10), 201));

      await client.createIssue('widgets', { title: 'Broken build', body: 'CI is red', labels: ['bug'], assignees: ['dev'] });

      expect(requestAt(0).body).toEqual({
        title: 'Broken build',
        body: 'CI is red',
        labels: ['bug'],
        assignees: ['dev'],
      });
    });
  });

  describe('updateIssue', () => {
    it('should send only the changed fields', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(issue(4, { state: 'closed' })));

      await client.updateIssue('widgets', 4, { state: 'closed' });

      expect(requestAt(0).method).toBe('PATCH');
      expect(requestAt(0).url.pathname).toBe('/repos/acme/widgets/issues/4');
      expect(requestAt(0).body).toEqual({ state: 'closed' });
    });
  });

  describe('getFile', () => {
    it('should decode base64 content wrapped with newlines', async () => {
      const encoded = Buffer.from('hello\nworld ✓', 'utf8').toString('base64').replace(/(.{4})/g, '$1\n');
      fetchMock.mockResolvedValueOnce(
        jsonResponse({ type: 'file', name: 'a.txt', path: 'docs/a.txt', size: 15, encoding: 'base64', content: encoded })
      );

      const file = await client.getFile('widgets', 'docs/a.txt', 'main');

      expect(file.content).toBe('hello\nworld ✓');
      expect(requestAt(0).url.pathname).toBe('/repos/acme/widgets/contents/docs/a.txt');
      expect(requestAt(0).url.searchParams.get('ref')).toBe('main');
    });

    it('should escape spaces in the file path', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({ type: 'file', name: 'Release Notes.md', path: 'docs/Release Notes.md', size: 0, content: '' })
      );

      await client.getFile('widgets', 'docs/Release Notes.md');

      expect(requestAt(0).url.pathname).toBe('/repos/acme/widgets/contents/docs/Release%20Notes.md');
      expect(requestAt(0).url.searchParams.has('ref')).toBe(false);
    });

    it('should replace invalid UTF-8 with the replacement character', () => {
      const encoded = Buffer.from([0xff, 0x41]).toString('base64');

      expect(decodeBase64Content(encoded)).toBe('\uFFFDA');
    });
  });

  describe('getRepositoryTree', () => {
    it('should wrap a single entry in a list', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ type: 'file', name: 'README.md', path: 'README.md', size: 10 }));

      const entries = await client.getRepositoryTree('widgets', 'README.md');

      expect(entries).toHaveLength(1);
      expect(entries[0]?.name).toBe('README.md');
    });

    it('should keep braces in a directory path literal', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse([]));

      await client.getRepositoryTree('widgets', 'templates/{name}');

      expect(requestAt(0).url.pathname).toBe('/repos/acme/widgets/contents/templates/%7Bname%7D');
    });

    it('should list the repository root without a path', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse([]));

      await client.getRepositoryTree('other/gadgets', undefined, 'develop');

      expect(requestAt(0).url.pathname).toBe('/repos/other/gadgets/contents');
      expect(requestAt(0).url.searchParams.get('ref')).toBe('develop');
    });
  });

  describe('errors', () => {
    it('should raise GitHubApiError with the HTTP status', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ message: 'Not Found' }, 404));

      const error = await client.getRepo('missing').catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(GitHubApiError);
      expect(error).toMatchObject({ status: 404, kind: 'transport', service: 'github' });
    });

    it('should report a transport failure as status 0', async () => {
      fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

      const error = await client.getRepo('widgets').catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(GitHubApiError);
      expect(error).toMatchObject({ status: 0 });
    });

    it('should raise GitHubGraphqlError with the first GraphQL error message', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({
          data: null,
          errors: [{ message: 'Could not resolve to a node with the global id' }, { message: 'second error' }],
        })
      );

      const error = await client.getProjectItems('P_missing').catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(GitHubGraphqlError);
      expect(error).toMatchObject({ message: 'Could not resolve to a node with the global id', kind: 'backend' });
    });
  });

  describe('projects', () => {
    beforeEach(() => {
      fetchMock.mockImplementation(async () =>
        jsonResponse({
          data: {
            repositoryOwner: {
              projectsV2: { nodes: [project('P1', 'Roadmap 2025'), null, project('P2', 'Roadmap')] },
            },
          },
        })
      );
    });

    it('should list boards of the default owner', async () => {
      const projects = await client.listProjects();

      expect(projects.map((p) => p.id)).toEqual(['P1', 'P2']);
      expect(requestAt(0).url.pathname).toBe('/graphql');
      expect(requestAt(0).body.variables).toEqual({ owner: 'acme', first: 20 });
    });

    it('should prefer an exact title over an earlier partial one', async () => {
      expect((await client.findProjectByName('roadmap'))?.id).toBe('P2');
    });

    it('should fall back to a partial title match', async () => {
      expect((await client.findProjectByName('road'))?.id).toBe('P1');
    });

    it('should return null when no board matches', async () => {
      expect(await client.findProjectByName('backlog')).toBeNull();
    });

    it('should require an owner', async () => {
      const ownerless = new GitHubClient({ token: 'test-token', fetch: fetchMock });

      await expect(ownerless.listProjects()).rejects.toThrow('No project owner given');
    });
  });

  describe('getProjectItems', () => {
    it('should normalize items and skip null nodes', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({
          data: {
            node: {
              items: {
                nodes: [
                  {
                    id: 'I1',
                    type: 'ISSUE',
                    content: { title: 'Login fails', number: 12, state: 'OPEN', url: 'https://github.com/acme/widgets/issues/12' },
                    fieldValueByName: { name: 'In Progress' },
                  },
                  null,
                  { id: 'I2', type: 'DRAFT_ISSUE', content: { title: 'Idea' }, fieldValueByName: null },
                ],
              },
            },
          },
        })
      );

      const items = await client.getProjectItems('P1');

      expect(items).toEqual([
        {
          id: 'I1',
          type: 'ISSUE',
          title: 'Login fails',
          number: 12,
          state: 'OPEN',
          url: 'https://github.com/acme/widgets/issues/12',
          status: 'In Progress',
        },
        { id: 'I2', type: 'DRAFT_ISSUE', title: 'Idea', number: null, state: null, url: null, status: null },
      ]);
    });
  });

  describe('addIssueToProject', () => {
    it('should add the issue by its node id', async () => {
      fetchMock
        .mockResolvedValueOnce(jsonResponse(issue(7, { node_id: 'I_kwDO7' })))
        .mockResolvedValueOnce(jsonResponse({ data: { addProjectV2ItemById: { item: { id: 'PVTI_1' } } } }));

      const result = await client.addIssueToProject('P1', 'widgets', 7);

      expect(result).toEqual({ itemId: 'PVTI_1' });
      expect(requestAt(0).url.pathname).toBe('/repos/acme/widgets/issues/7');
      expect(requestAt(1).body.variables).toEqual({ projectId: 'P1', contentId: 'I_kwDO7' });
    });
  });
});
