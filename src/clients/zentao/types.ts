/**
 * ZenTao API v1 payload schemas (only the fields read here) and the normalized
 * summaries returned by list operations.
 */

import { z } from 'zod';

export type HttpMethod = 'GET' | 'POST' | 'PUT';

export type QueryParams = Record<string, string | number | undefined>;

const level = z.union([z.number(), z.string()]).nullish();

const rawRecord = z.object({
  id: z.number(),
  status: z.string().nullish(),
});

export const rawProductSchema = rawRecord.extend({
  name: z.string(),
  bugs: z.number().nullish(),
  unResolved: z.number().nullish(),
});

export const rawProjectSchema = rawRecord.extend({
  name: z.string(),
  begin: z.string().nullish(),
  end: z.string().nullish(),
  PM: z.unknown(),
});

export const rawExecutionSchema = rawRecord.extend({
  name: z.string(),
  project: z.number().nullish(),
  begin: z.string().nullish(),
  end: z.string().nullish(),
});

export const rawBugSchema = rawRecord.extend({
  title: z.string(),
  severity: level,
  pri: level,
  assignedTo: z.unknown(),
  openedBy: z.unknown(),
  openedDate: z.string().nullish(),
});

export const rawTaskSchema = rawRecord.extend({
  name: z.string(),
  pri: level,
  assignedTo: z.unknown(),
  deadline: z.string().nullish(),
  estimate: z.number().nullish(),
});

export const rawStorySchema = rawRecord.extend({
  title: z.string(),
  pri: level,
  stage: z.string().nullish(),
  assignedTo: z.unknown(),
});

export type RawProduct = z.infer<typeof rawProductSchema>;
export type RawProject = z.infer<typeof rawProjectSchema>;
export type RawExecution = z.infer<typeof rawExecutionSchema>;
export type RawBug = z.infer<typeof rawBugSchema>;
export type RawTask = z.infer<typeof rawTaskSchema>;
export type RawStory = z.infer<typeof rawStorySchema>;

/** Full record as returned by a detail or create endpoint */
export const zentaoRecordSchema = z.record(z.unknown());

export type ZentaoRecord = z.infer<typeof zentaoRecordSchema>;

export interface ProductSummary {
  id: number;
  name: string;
  status: string;
  bugs: number;
  unResolved: number;
}

export interface ProjectSummary {
  id: number;
  name: string;
  status: string;
  begin: string;
  end: string;
  PM: string;
}

export interface ExecutionSummary {
  id: number;
  name: string;
  status: string;
  project: number | null;
  begin: string;
  end: string;
}

export interface BugSummary {
  id: number;
  title: string;
  status: string;
  severity: number | string;
  pri: number | string;
  assignedTo: string;
  openedBy: string;
  openedDate: string;
}

export interface TaskSummary {
  id: number;
  name: string;
  status: string;
  pri: number | string;
  assignedTo: string;
  deadline: string;
  estimate: number;
}

export interface StorySummary {
  id: number;
  title: string;
  status: string;
  pri: number | string;
  stage: string;
  assignedTo: string;
}

export interface BugFilters {
  /** active | resolved | closed */
  status?: string;
  /** Account name */
  assignedTo?: string;
  limit?: number;
}

export interface StatusFilters {
  status?: string;
  limit?: number;
}

export interface CreateBugInput {
  title: string;
  /** Reproduction steps, HTML allowed */
  steps?: string;
  /** 1 (fatal) .. 4 (minor) */
  severity?: number;
  /** 1 (urgent) .. 4 (low) */
  pri?: number;
  /** codeerror | designdefect | config | install | security | performance | standard | automation | other */
  type?: string;
  assignedTo?: string;
}

export interface CreateTaskInput {
  name: string;
  assignedTo?: string;
  /** Hours */
  estimate?: number;
  pri?: number;
  desc?: string;
  /** YYYY-MM-DD */
  deadline?: string;
}
