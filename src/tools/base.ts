/**
 * Tool definitions, result helpers and argument parsing shared by the
 * GitHub, Slack and ZenTao tool sets.
 */

import { z } from 'zod';

// ============================================
// TYPES
// ============================================

export interface MCPPropertySchema {
  type: 'string' | 'number' | 'boolean' | 'array' | 'object';
  description: string;
  enum?: string[];
  items?: Omit<MCPPropertySchema, 'description'> & { description?: string };
  default?: unknown;
}

export interface MCPTool {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, MCPPropertySchema>;
    required?: string[];
  };
}

export interface MCPToolResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

/** Receives the raw tool arguments; returns data serialized into the result */
export type ToolHandler = (args: Record<string, unknown>) => Promise<unknown>;

export interface RegisteredTool {
  definition: MCPTool;
  handler: ToolHandler;
}

export type PropertySpec = MCPPropertySchema & { required?: boolean };

// ============================================
// TOOL BUILDER
// ============================================

/**
 * Collects tool definitions together with their handlers
 */
export class ToolBuilder {
  private tools: RegisteredTool[] = [];

  add(
    name: string,
    description: string,
    properties: Record<string, PropertySpec>,
    handler: ToolHandler
  ): this {
    const required: string[] = [];
    const props: Record<string, MCPPropertySchema> = {};

    for (const [key, { required: isRequired, ...prop }] of Object.entries(properties)) {
      if (isRequired) {
        required.push(key);
      }
      props[key] = prop;
    }

    this.tools.push({
      definition: {
        name,
        description,
        inputSchema: {
          type: 'object',
          properties: props,
          required: required.length > 0 ? required : undefined,
        },
      },
      handler,
    });

    return this;
  }

  build(): RegisteredTool[] {
    return this.tools;
  }
}

// ============================================
// RESULT HELPERS
// ============================================

export function successResult(data: unknown): MCPToolResult {
  return {
    content: [{
      type: 'text',
      text: JSON.stringify(data, null, 2),
    }],
  };
}

export function errorResult(message: string, details: Record<string, unknown> = {}): MCPToolResult {
  return {
    content: [{
      type: 'text',
      text: JSON.stringify({ success: false, error: message, ...details }, null, 2),
    }],
    isError: true,
  };
}

// ============================================
// ARGUMENT HELPERS
// ============================================

/**
 * Split a comma-separated list, dropping blanks. Undefined when nothing is left.
 */
export function splitList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  const items = value.split(',').map((item) => item.trim()).filter(Boolean);
  return items.length > 0 ? items : undefined;
}

export class ToolArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToolArgumentError';
  }
}

/**
 * Validate tool arguments, reporting every failing field in one message
 */
export function parseArgs<T extends z.ZodTypeAny>(schema: T, args: Record<string, unknown>): z.infer<T> {
  const result = schema.safeParse(args);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
      .join('; ');
    throw new ToolArgumentError(`Invalid arguments: ${issues}`);
  }
  return result.data;
}
