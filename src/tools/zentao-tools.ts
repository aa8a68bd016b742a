/**
 * ZenTao tools: products, projects, executions, bugs, tasks and stories.
 * Registered only when a ZenTao instance is configured.
 */

import { z } from 'zod';
import type { ZentaoClient } from '../clients/zentao/index.js';
import { ToolBuilder, parseArgs, type RegisteredTool } from './base.js';

const id = z.number().int().positive();
const level = z.number().int().min(1).max(4);
const limit = (fallback: number) => z.number().int().positive().max(500).default(fallback);

export function createZentaoTools(client: ZentaoClient): RegisteredTool[] {
  return new ToolBuilder()
    // =========================================================================
    // PRODUCTS & PROJECTS
    // =========================================================================
    .add(
      'zentao_list_products',
      'List ZenTao products',
      {
        per_page: { type: 'number', description: 'Number of products (default 50)' },
      },
      async (args) => {
        const { per_page } = parseArgs(z.object({ per_page: limit(50) }), args);
        return client.listProducts(per_page);
      }
    )
    .add(
      'zentao_list_projects',
      'List ZenTao projects',
      {
        per_page: { type: 'number', description: 'Number of projects (default 50)' },
      },
      async (args) => {
        const { per_page } = parseArgs(z.object({ per_page: limit(50) }), args);
        return client.listProjects(per_page);
      }
    )
    .add(
      'zentao_list_executions',
      'List the executions (sprints) of a project; tasks belong to executions',
      {
        project_id: { type: 'number', description: 'Project ID (see zentao_list_projects)', required: true },
        per_page: { type: 'number', description: 'Number of executions (default 50)' },
      },
      async (args) => {
        const params = parseArgs(z.object({ project_id: id, per_page: limit(50) }), args);
        return client.listExecutions(params.project_id, params.per_page);
      }
    )

    // =========================================================================
    // BUGS
    // =========================================================================
    .add(
      'zentao_list_bugs',
      'List bugs of a product',
      {
        product_id: { type: 'number', description: 'Product ID (see zentao_list_products)', required: true },
        status: { type: 'string', description: 'active, resolved or closed; all when empty' },
        assignedTo: { type: 'string', description: 'Assignee account; everyone when empty' },
        per_page: { type: 'number', description: 'Number of bugs (default 20)' },
      },
      async (args) => {
        const params = parseArgs(
          z.object({
            product_id: id,
            status: z.string().optional(),
            assignedTo: z.string().optional(),
            per_page: limit(20),
          }),
          args
        );
        return client.listBugs(params.product_id, {
          status: params.status,
          assignedTo: params.assignedTo,
          limit: params.per_page,
        });
      }
    )
    .add(
      'zentao_get_bug',
      'Get the full record of a bug',
      {
        bug_id: { type: 'number', description: 'Bug ID', required: true },
      },
      async (args) => {
        const { bug_id } = parseArgs(z.object({ bug_id: id }), args);
        return client.getBug(bug_id);
      }
    )
    .add(
      'zentao_create_bug',
      'Report a bug against a product',
      {
        product_id: { type: 'number', description: 'Product ID', required: true },
        title: { type: 'string', description: 'Bug title', required: true },
        steps: { type: 'string', description: 'Reproduction steps (HTML allowed)' },
        severity: { type: 'number', description: '1 fatal, 2 serious, 3 normal (default), 4 minor' },
        pri: { type: 'number', description: '1 urgent, 2 high, 3 medium (default), 4 low' },
        bug_type: {
          type: 'string',
          description: 'Bug type (default codeerror)',
          enum: ['codeerror', 'designdefect', 'config', 'install', 'security', 'performance', 'standard', 'automation', 'other'],
        },
        assignedTo: { type: 'string', description: 'Assignee account' },
      },
      async (args) => {
        const params = parseArgs(
          z.object({
            product_id: id,
            title: z.string().min(1),
            steps: z.string().optional(),
            severity: level.optional(),
            pri: level.optional(),
            bug_type: z.string().optional(),
            assignedTo: z.string().optional(),
          }),
          args
        );
        return client.createBug(params.product_id, {
          title: params.title,
          steps: params.steps,
          severity: params.severity,
          pri: params.pri,
          type: params.bug_type,
          assignedTo: params.assignedTo,
        });
      }
    )
    .add(
      'zentao_update_bug',
      'Update fields of a bug (status, assignedTo, severity, ...)',
      {
        bug_id: { type: 'number', description: 'Bug ID', required: true },
        fields: { type: 'object', description: 'Field/value pairs sent as the update', required: true },
      },
      async (args) => {
        const params = parseArgs(
          z.object({
            bug_id: id,
            fields: z.record(z.unknown()).refine((fields) => Object.keys(fields).length > 0, 'at least one field'),
          }),
          args
        );
        return client.updateBug(params.bug_id, params.fields);
      }
    )

    // =========================================================================
    // TASKS
    // =========================================================================
    .add(
      'zentao_list_tasks',
      'List tasks of an execution',
      {
        execution_id: { type: 'number', description: 'Execution ID (see zentao_list_executions)', required: true },
        status: { type: 'string', description: 'wait, doing, done or closed; all when empty' },
        per_page: { type: 'number', description: 'Number of tasks (default 20)' },
      },
      async (args) => {
        const params = parseArgs(
          z.object({ execution_id: id, status: z.string().optional(), per_page: limit(20) }),
          args
        );
        return client.listTasks(params.execution_id, { status: params.status, limit: params.per_page });
      }
    )
    .add(
      'zentao_get_task',
      'Get the full record of a task',
      {
        task_id: { type: 'number', description: 'Task ID', required: true },
      },
      async (args) => {
        const { task_id } = parseArgs(z.object({ task_id: id }), args);
        return client.getTask(task_id);
      }
    )
    .add(
      'zentao_create_task',
      'Create a task in an execution',
      {
        execution_id: { type: 'number', description: 'Execution ID', required: true },
        name: { type: 'string', description: 'Task name', required: true },
        assignedTo: { type: 'string', description: 'Assignee account' },
        estimate: { type: 'number', description: 'Estimated hours (default 0)' },
        pri: { type: 'number', description: '1 urgent, 2 high, 3 medium (default), 4 low' },
        desc: { type: 'string', description: 'Task description' },
        deadline: { type: 'string', description: 'Due date, YYYY-MM-DD' },
      },
      async (args) => {
        const params = parseArgs(
          z.object({
            execution_id: id,
            name: z.string().min(1),
            assignedTo: z.string().optional(),
            estimate: z.number().min(0).optional(),
            pri: level.optional(),
            desc: z.string().optional(),
            deadline: z.string().regex(/^(\d{4}-\d{2}-\d{2})?$/, 'expected YYYY-MM-DD').optional(),
          }),
          args
        );
        return client.createTask(params.execution_id, {
          name: params.name,
          assignedTo: params.assignedTo,
          estimate: params.estimate,
          pri: params.pri,
          desc: params.desc,
          deadline: params.deadline,
        });
      }
    )

    // =========================================================================
    // STORIES
    // =========================================================================
    .add(
      'zentao_list_stories',
      'List stories (requirements) of a product',
      {
        product_id: { type: 'number', description: 'Product ID (see zentao_list_products)', required: true },
        status: { type: 'string', description: 'draft, active, closed or changed; all when empty' },
        per_page: { type: 'number', description: 'Number of stories (default 20)' },
      },
      async (args) => {
        const params = parseArgs(
          z.object({ product_id: id, status: z.string().optional(), per_page: limit(20) }),
          args
        );
        return client.listStories(params.product_id, { status: params.status, limit: params.per_page });
      }
    )
    .build();
}
