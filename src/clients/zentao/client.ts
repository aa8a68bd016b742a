/**
 * ZenTao Client
 *
 * REST API v1 access with a lazily acquired session token. The token is
 * reused until a request comes back 401; that request is then resent once
 * after a fresh login.
 */

import { z } from 'zod';
import { createLogger } from '../../lib/logger.js';
import { compact } from '../../lib/params.js';
import { ZentaoApiError, ZentaoAuthError, errorMessage } from '../../lib/errors.js';
import { personName } from './person.js';
import {
  rawBugSchema,
  rawExecutionSchema,
  rawProductSchema,
  rawProjectSchema,
  rawStorySchema,
  rawTaskSchema,
  zentaoRecordSchema,
  type BugFilters,
  type BugSummary,
  type CreateBugInput,
  type CreateTaskInput,
  type ExecutionSummary,
  type HttpMethod,
  type ProductSummary,
  type ProjectSummary,
  type QueryParams,
  type StatusFilters,
  type StorySummary,
  type TaskSummary,
  type ZentaoRecord,
} from './types.js';

const logger = createLogger('zentao');

export const REQUEST_TIMEOUT_MS = 30_000;
export const API_PREFIX = '/api.php/v1';
export const TOKEN_HEADER = 'Token';

const tokenResponseSchema = z.object({ token: z.string().min(1) });

const productsSchema = z.object({ products: z.array(rawProductSchema).optional() });
const projectsSchema = z.object({ projects: z.array(rawProjectSchema).optional() });
const executionsSchema = z.object({ executions: z.array(rawExecutionSchema).optional() });
const bugsSchema = z.object({ bugs: z.array(rawBugSchema).optional() });
const tasksSchema = z.object({ tasks: z.array(rawTaskSchema).optional() });
const storiesSchema = z.object({ stories: z.array(rawStorySchema).optional() });

type BodySchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface ZentaoClientOptions {
  /** Install root, e.g. https://zentao.example.com/zentao */
  url: string;
  account: string;
  password: string;
  fetch?: typeof fetch;
}

interface RequestOptions {
  params?: QueryParams;
  body?: unknown;
}

export class ZentaoClient {
  readonly apiUrl: string;
  private readonly account: string;
  private readonly password: string;
  private readonly fetchImpl: typeof fetch;
  private token: string | null = null;
  private loginInFlight: Promise<string> | null = null;

  constructor(options: ZentaoClientOptions) {
    this.apiUrl = `${options.url.replace(/\/+$/, '')}${API_PREFIX}`;
    this.account = options.account;
    this.password = options.password;
    this.fetchImpl = options.fetch ?? fetch;
  }

  get authenticated(): boolean {
    return this.token !== null;
  }

  // ===========================================================================
  // SESSION
  // ===========================================================================

  private async ensureToken(): Promise<string> {
    if (this.token) return this.token;
    if (!this.loginInFlight) {
      this.loginInFlight = this.login().finally(() => {
        this.loginInFlight = null;
      });
    }
    return this.loginInFlight;
  }

  private async login(): Promise<string> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.apiUrl}/tokens`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ account: this.account, password: this.password }),
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      });
    } catch (error) {
      logger.error({ account: this.account, error: errorMessage(error) }, 'ZenTao login failed');
      throw new ZentaoAuthError(`ZenTao login failed: ${errorMessage(error)}`, { cause: error });
    }

    const text = await response.text();
    if (!response.ok) {
      const cause = new ZentaoApiError(`POST /tokens failed (${response.status}): ${text}`, response.status);
      logger.error({ account: this.account, status: response.status }, 'ZenTao login failed');
      throw new ZentaoAuthError(`ZenTao login failed (${response.status})`, { cause });
    }

    const parsed = tokenResponseSchema.safeParse(parseBody(text));
    if (!parsed.success) {
      logger.error({ account: this.account }, 'ZenTao login returned no token');
      throw new ZentaoAuthError('ZenTao login returned no token', { cause: parsed.error });
    }

    this.token = parsed.data.token;
    logger.info({ account: this.account }, 'ZenTao login succeeded');
    return this.token;
  }

  // ===========================================================================
  // TRANSPORT
  // ===========================================================================

  private async send(method: HttpMethod, path: string, token: string, options: RequestOptions): Promise<Response> {
    const url = new URL(`${this.apiUrl}${path}`);
    for (const [key, value] of Object.entries(options.params ?? {})) {
      if (value !== undefined && value !== '') {
        url.searchParams.set(key, String(value));
      }
    }

    const init: RequestInit = {
      method,
      headers: { 'Content-Type': 'application/json', [TOKEN_HEADER]: token },
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    };
    if (options.body !== undefined && method !== 'GET') {
      init.body = JSON.stringify(options.body);
    }

    const startTime = Date.now();
    try {
      const response = await this.fetchImpl(url, init);
      logger.debug({ method, path, status: response.status, durationMs: Date.now() - startTime }, 'ZenTao request');
      return response;
    } catch (error) {
      logger.error({ method, path, error: errorMessage(error) }, 'ZenTao request error');
      throw new ZentaoApiError(`ZenTao ${method} ${path} failed: ${errorMessage(error)}`, 0, { cause: error });
    }
  }

  /**
   * Non-2xx, unparseable JSON and a body that does not match `schema` all
   * raise ZentaoApiError with the response status.
   */
  private async read<T>(schema: BodySchema<T>, response: Response, method: HttpMethod, path: string): Promise<T> {
    const text = await response.text();
    if (!response.ok) {
      logger.warn({ method, path, status: response.status }, 'ZenTao request failed');
      throw new ZentaoApiError(`ZenTao ${method} ${path} failed (${response.status}): ${text}`, response.status);
    }

    let body: unknown;
    try {
      body = JSON.parse(text || '{}');
    } catch (error) {
      throw new ZentaoApiError(`ZenTao ${method} ${path} returned malformed JSON`, response.status, { cause: error });
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      logger.warn({ method, path, issues: parsed.error.issues.length }, 'ZenTao response did not match');
      throw new ZentaoApiError(`ZenTao ${method} ${path} returned an unexpected body`, response.status, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  /**
   * ensure token -> send -> on 401 log in again and resend the identical
   * request once. A failed re-login surfaces the original 401.
   */
  private async request<T>(
    schema: BodySchema<T>,
    method: HttpMethod,
    path: string,
    options: RequestOptions = {}
  ): Promise<T> {
    const token = await this.ensureToken();
    const response = await this.send(method, path, token, options);
    if (response.status !== 401) {
      return this.read(schema, response, method, path);
    }

    logger.warn({ method, path }, 'ZenTao token rejected, logging in again');
    const unauthorized = new ZentaoApiError(
      `ZenTao ${method} ${path} failed (401): ${await response.text()}`,
      401
    );
    if (this.token === token) {
      this.token = null;
    }

    let fresh: string;
    try {
      fresh = await this.ensureToken();
    } catch (error) {
      logger.error({ method, path, error: errorMessage(error) }, 'ZenTao re-login failed');
      throw unauthorized;
    }

    const retried = await this.send(method, path, fresh, options);
    return this.read(schema, retried, method, path);
  }

  // ===========================================================================
  // PRODUCTS & PROJECTS
  // ===========================================================================

  async listProducts(limit = 50): Promise<ProductSummary[]> {
    const data = await this.request(productsSchema, 'GET', '/products', { params: { limit } });
    const products = (data.products ?? []).map((p) => ({
      id: p.id,
      name: p.name,
      status: p.status ?? '',
      bugs: p.bugs ?? 0,
      unResolved: p.unResolved ?? 0,
    }));
    logger.info({ count: products.length }, 'Listed products');
    return products;
  }

  async listProjects(limit = 50): Promise<ProjectSummary[]> {
    const data = await this.request(projectsSchema, 'GET', '/projects', { params: { limit } });
    const projects = (data.projects ?? []).map((p) => ({
      id: p.id,
      name: p.name,
      status: p.status ?? '',
      begin: p.begin ?? '',
      end: p.end ?? '',
      PM: personName(p.PM),
    }));
    logger.info({ count: projects.length }, 'Listed projects');
    return projects;
  }

  /**
   * Executions (sprints) of a project; tasks hang off execution IDs
   */
  async listExecutions(projectId: number, limit = 50): Promise<ExecutionSummary[]> {
    const data = await this.request(executionsSchema, 'GET', `/projects/${projectId}/executions`, {
      params: { limit },
    });
    const executions = (data.executions ?? []).map((e) => ({
      id: e.id,
      name: e.name,
      status: e.status ?? '',
      project: e.project ?? null,
      begin: e.begin ?? '',
      end: e.end ?? '',
    }));
    logger.info({ projectId, count: executions.length }, 'Listed executions');
    return executions;
  }

  // ===========================================================================
  // BUGS
  // ===========================================================================

  async listBugs(productId: number, filters: BugFilters = {}): Promise<BugSummary[]> {
    const data = await this.request(bugsSchema, 'GET', `/products/${productId}/bugs`, {
      params: { limit: filters.limit ?? 20, status: filters.status, assignedTo: filters.assignedTo },
    });
    const bugs = (data.bugs ?? []).map((b) => ({
      id: b.id,
      title: b.title,
      status: b.status ?? '',
      severity: b.severity ?? '',
      pri: b.pri ?? '',
      assignedTo: personName(b.assignedTo),
      openedBy: personName(b.openedBy),
      openedDate: b.openedDate ?? '',
    }));
    logger.info({ productId, count: bugs.length }, 'Listed bugs');
    return bugs;
  }

  async getBug(bugId: number): Promise<ZentaoRecord> {
    const bug = await this.request(zentaoRecordSchema, 'GET', `/bugs/${bugId}`);
    logger.info({ bugId }, 'Fetched bug');
    return bug;
  }

  async createBug(productId: number, input: CreateBugInput): Promise<ZentaoRecord> {
    const body = {
      product: productId,
      title: input.title,
      severity: input.severity ?? 3,
      pri: input.pri ?? 3,
      type: input.type || 'codeerror',
      openedBuild: ['trunk'],
      ...compact({ steps: input.steps, assignedTo: input.assignedTo }),
    };
    const bug = await this.request(zentaoRecordSchema, 'POST', `/products/${productId}/bugs`, { body });
    logger.info({ productId, bugId: bug.id, title: input.title }, 'Bug created');
    return bug;
  }

  /**
   * Fields are sent as given (status, assignedTo, severity, ...)
   */
  async updateBug(bugId: number, fields: Record<string, unknown>): Promise<ZentaoRecord> {
    const bug = await this.request(zentaoRecordSchema, 'PUT', `/bugs/${bugId}`, { body: fields });
    logger.info({ bugId, fields: Object.keys(fields) }, 'Bug updated');
    return bug;
  }

  // ===========================================================================
  // TASKS
  // ===========================================================================

  async getTask(taskId: number): Promise<ZentaoRecord> {
    const task = await this.request(zentaoRecordSchema, 'GET', `/tasks/${taskId}`);
    logger.info({ taskId }, 'Fetched task');
    return task;
  }

  async listTasks(executionId: number, filters: StatusFilters = {}): Promise<TaskSummary[]> {
    const data = await this.request(tasksSchema, 'GET', `/executions/${executionId}/tasks`, {
      params: { limit: filters.limit ?? 20, status: filters.status },
    });
    const tasks = (data.tasks ?? []).map((t) => ({
      id: t.id,
      name: t.name,
      status: t.status ?? '',
      pri: t.pri ?? '',
      assignedTo: personName(t.assignedTo),
      deadline: t.deadline ?? '',
      estimate: t.estimate ?? 0,
    }));
    logger.info({ executionId, count: tasks.length }, 'Listed tasks');
    return tasks;
  }

  async createTask(executionId: number, input: CreateTaskInput): Promise<ZentaoRecord> {
    const body = {
      name: input.name,
      pri: input.pri ?? 3,
      estimate: input.estimate ?? 0,
      type: 'devel',
      ...compact({ assignedTo: input.assignedTo, desc: input.desc, deadline: input.deadline }),
    };
    const task = await this.request(zentaoRecordSchema, 'POST', `/executions/${executionId}/tasks`, { body });
    logger.info({ executionId, taskId: task.id, name: input.name }, 'Task created');
    return task;
  }

  // ===========================================================================
  // STORIES
  // ===========================================================================

  async listStories(productId: number, filters: StatusFilters = {}): Promise<StorySummary[]> {
    const data = await this.request(storiesSchema, 'GET', `/products/${productId}/stories`, {
      params: { limit: filters.limit ?? 20, status: filters.status },
    });
    const stories = (data.stories ?? []).map((s) => ({
      id: s.id,
      title: s.title,
      status: s.status ?? '',
      pri: s.pri ?? '',
      stage: s.stage ?? '',
      assignedTo: personName(s.assignedTo),
    }));
    logger.info({ productId, count: stories.length }, 'Listed stories');
    return stories;
  }
}

function parseBody(text: string): unknown {
  try {
    return text ? JSON.parse(text) : null;
  } catch {
    return null;
  }
}
